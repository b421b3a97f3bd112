#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath: string;
  emitHex: boolean;
  emitSymbols: boolean;
  emitListing: boolean;
};

function usage(): string {
  return [
    'c8asm [options] <entry.c8s>',
    '',
    'Options:',
    '  -o, --output <file>   ROM output path (must end with .ch8; default: entry stem + .ch8)',
    '  -n, --nolist          Suppress .lst',
    '      --nohex           Suppress .hex',
    '      --nosym           Suppress .sym.json',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <entry.c8s> must be the last argument (assembler-style).',
    '  - Sidecar artifacts are written next to the ROM using its base name.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts sits one level below the package root; dist/src/cli.js two levels.
  for (const candidate of [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')]) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
    if (typeof pkg !== 'object' || pkg === null || !('name' in pkg) || pkg.name !== 'c8asm') continue;
    return 'version' in pkg ? String(pkg.version) : '0.0.0';
  }
  return '0.0.0';
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let emitHex = true;
  let emitSymbols = true;
  let emitListing = true;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      const v = a.startsWith('--output=') ? a.slice('--output='.length) : argv[++i];
      if (!v) fail(`${a.startsWith('--output=') ? '--output' : a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '-n' || a === '--nolist') {
      emitListing = false;
      continue;
    }
    if (a === '--nohex') {
      emitHex = false;
      continue;
    }
    if (a === '--nosym') {
      emitSymbols = false;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <entry.c8s> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.c8s> argument (and it must be last)`);
  }

  if (outputPath && extname(outputPath).toLowerCase() !== '.ch8') {
    fail(`--output must end with ".ch8"`);
  }

  return {
    entryFile,
    outputPath: outputPath ?? defaultOutputPath(entryFile),
    emitHex,
    emitSymbols,
    emitListing,
  };
}

function defaultOutputPath(entryFile: string): string {
  const entry = resolve(entryFile);
  const ext = extname(entry);
  const stem = ext.length > 0 ? entry.slice(0, -ext.length) : entry;
  return `${stem}.ch8`;
}

async function writeArtifacts(artifacts: Artifact[]): Promise<void> {
  const writes: Array<Promise<void>> = [];
  for (const artifact of artifacts) {
    const { path } = artifact;
    if (path === undefined) continue;
    await mkdir(dirname(path), { recursive: true });
    switch (artifact.kind) {
      case 'bin':
        writes.push(writeFile(path, artifact.bytes));
        break;
      case 'hex':
      case 'lst':
        writes.push(writeFile(path, artifact.text, 'utf8'));
        break;
      case 'sym':
        writes.push(writeFile(path, JSON.stringify(artifact.json, null, 2) + '\n', 'utf8'));
        break;
    }
  }
  await Promise.all(writes);
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.localeCompare(b.file);
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  return a.id.localeCompare(b.id) || a.message.localeCompare(b.message);
}

/**
 * One-line rendering of a diagnostic: `file:line:column: severity: [ID] message`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc = d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      {
        outputPath: parsed.outputPath,
        emitBin: true,
        emitHex: parsed.emitHex,
        emitSymbols: parsed.emitSymbols,
        emitListing: parsed.emitListing,
      },
      { formats: defaultFormatWriters },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(res.artifacts);
    process.stdout.write(`${resolve(parsed.outputPath)}\n`);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`c8asm: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
