import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, EmittedImage, FormatWriters, SymbolEntry } from './formats/types.js';

/**
 * Options that select which artifacts are produced.
 */
export interface CompilerOptions {
  /** Primary output path used to derive sibling artifacts. */
  outputPath?: string;
  /** Emit the raw ROM image (`.ch8`). */
  emitBin?: boolean;
  /** Emit Intel HEX (`.hex`). */
  emitHex?: boolean;
  /** Emit the symbol map (`.sym.json`). */
  emitSymbols?: boolean;
  /** Emit listing (`.lst`). */
  emitListing?: boolean;
}

/**
 * Result of assembling one source buffer in memory.
 *
 * `image` is present only when no error was reported.
 */
export interface AssembleResult {
  diagnostics: Diagnostic[];
  image?: EmittedImage;
  symbols: SymbolEntry[];
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can stay in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
