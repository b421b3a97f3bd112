import { readFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { AssembleResult, CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
import type { Artifact } from './formats/types.js';
import { parseProgram } from './frontend/parser.js';
import { emitProgram } from './lowering/emit.js';
import { sanitize } from './semantics/symbols.js';

function withDefaults(
  options: CompilerOptions,
): Required<Pick<CompilerOptions, 'emitBin' | 'emitHex' | 'emitSymbols' | 'emitListing'>> {
  const anyPrimaryEmitSpecified = [options.emitBin, options.emitHex, options.emitSymbols].some(
    (v) => v !== undefined,
  );

  const emitBin = anyPrimaryEmitSpecified ? (options.emitBin ?? false) : true;
  const emitHex = anyPrimaryEmitSpecified ? (options.emitHex ?? false) : true;
  const emitSymbols = anyPrimaryEmitSpecified ? (options.emitSymbols ?? false) : true;

  // Listing is a sidecar artifact: default to on unless explicitly suppressed.
  const emitListing = options.emitListing ?? true;

  return { emitBin, emitHex, emitSymbols, emitListing };
}

/**
 * Sibling path for an artifact of `outputPath` (the ROM path): `out.ch8` -> `out.hex`.
 */
export function artifactPath(outputPath: string, suffix: string): string {
  const resolved = resolve(outputPath);
  const ext = extname(resolved);
  const stem = ext.length > 0 ? resolved.slice(0, -ext.length) : resolved;
  return `${stem}${suffix}`;
}

const ARTIFACT_SUFFIX: Record<Artifact['kind'], string> = {
  bin: '.ch8',
  hex: '.hex',
  lst: '.lst',
  sym: '.sym.json',
};

/**
 * Assemble one in-memory source buffer: lex, parse, sanitize, order, lay out and encode.
 *
 * Every stage stops at its first error, and later stages only run when earlier ones succeeded,
 * so a failed result holds exactly one error diagnostic.
 */
export function assembleSource(path: string, text: string): AssembleResult {
  const diagnostics: Diagnostic[] = [];

  const program = parseProgram(path, text, diagnostics);
  if (!program || hasErrors(diagnostics)) return { diagnostics, symbols: [] };

  const table = sanitize(program, diagnostics);
  if (!table || hasErrors(diagnostics)) return { diagnostics, symbols: [] };

  const emitted = emitProgram(program, table, diagnostics);
  if (!emitted || hasErrors(diagnostics)) return { diagnostics, symbols: [] };

  return { diagnostics, image: emitted.image, symbols: emitted.symbols };
}

/**
 * Compile a source file into artifacts.
 *
 * Reads the entry file, assembles it and runs the configured format writers. Defaults to emitting
 * ROM + HEX + symbol map (plus listing) unless an emit flag is explicitly provided. When
 * `options.outputPath` is set, each artifact carries the sibling path it should be written to.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);

  let sourceText: string;
  try {
    sourceText = await readFile(entryPath, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryPath,
        },
      ],
      artifacts: [],
    };
  }

  const assembled = assembleSource(entryPath, sourceText);
  const { diagnostics } = assembled;
  if (!assembled.image || hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const { image, symbols } = assembled;
  const emit = withDefaults(options);
  const artifacts: Artifact[] = [];

  if (emit.emitBin) {
    artifacts.push(deps.formats.writeBin(image, symbols));
  }
  if (emit.emitHex) {
    artifacts.push(deps.formats.writeHex(image, symbols));
  }
  if (emit.emitSymbols) {
    artifacts.push(deps.formats.writeSymbols(image, symbols, { rootDir: dirname(entryPath) }));
  }
  if (emit.emitListing) {
    if (deps.formats.writeListing) {
      artifacts.push(deps.formats.writeListing(image, symbols));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file: entryPath,
      });
    }
  }

  const { outputPath } = options;
  if (outputPath !== undefined) {
    for (const artifact of artifacts) {
      artifact.path = artifactPath(outputPath, ARTIFACT_SUFFIX[artifact.kind]);
    }
  }

  return { diagnostics, artifacts };
};
