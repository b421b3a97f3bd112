import { isAbsolute, relative, resolve } from 'node:path';

import type {
  EmittedImage,
  SerializedSymbol,
  SymbolEntry,
  SymbolsArtifact,
  WriteSymbolsOptions,
} from './types.js';

function normalizeSymbolPath(file: string, rootDir?: string): string {
  const withSlashes = file.replace(/\\/g, '/');
  if (!rootDir) return withSlashes;
  const absFile = resolve(file);
  const absRoot = resolve(rootDir);
  const rel = relative(absRoot, absFile);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    return absFile.replace(/\\/g, '/');
  }
  return rel.replace(/\\/g, '/');
}

function toSerializedSymbol(symbol: SymbolEntry, rootDir?: string): SerializedSymbol {
  const where = {
    ...(symbol.file !== undefined ? { file: normalizeSymbolPath(symbol.file, rootDir) } : {}),
    ...(symbol.line !== undefined ? { line: symbol.line } : {}),
  };
  if (symbol.kind === 'constant') {
    return { name: symbol.name, kind: 'constant', origin: symbol.origin, value: symbol.value, ...where };
  }
  return {
    name: symbol.name,
    kind: symbol.kind,
    address: symbol.address,
    ...where,
    ...(symbol.size !== undefined ? { size: symbol.size } : {}),
  };
}

function compareSerializedSymbols(a: SerializedSymbol, b: SerializedSymbol): number {
  const aClass = a.kind === 'constant' ? 1 : 0;
  const bClass = b.kind === 'constant' ? 1 : 0;
  if (aClass !== bClass) return aClass - bClass;

  const aKey = a.kind === 'constant' ? a.value : a.address;
  const bKey = b.kind === 'constant' ? b.value : b.address;
  if (aKey !== bKey) return aKey - bKey;

  return a.name.toLowerCase().localeCompare(b.name.toLowerCase()) || a.kind.localeCompare(b.kind);
}

/**
 * Create the `.sym.json` symbol map: every declared name with its address or constant value.
 *
 * Address symbols come first in address order, then constants in value order.
 */
export function writeSymbols(
  image: EmittedImage,
  symbols: SymbolEntry[],
  opts?: WriteSymbolsOptions,
): SymbolsArtifact {
  return {
    kind: 'sym',
    json: {
      format: 'c8asm-symbols',
      version: 1,
      arch: 'chip8',
      base: image.base,
      size: image.byteLength,
      symbols: symbols.map((s) => toSerializedSymbol(s, opts?.rootDir)).sort(compareSerializedSymbols),
    },
  };
}
