import type {
  EmittedImage,
  EmittedTraceEntry,
  ListingArtifact,
  SymbolEntry,
  WriteListingOptions,
} from './types.js';
import { imageRange, toHexByte, toHexWord } from './bytes.js';

function formatSymbol(s: SymbolEntry): string {
  if (s.kind === 'constant') {
    return `${s.origin} ${s.name} = $${toHexWord(s.value)} (${s.value})`;
  }
  return `${s.kind} ${s.name} = $${toHexWord(s.address)}`;
}

function sortSymbols(a: SymbolEntry, b: SymbolEntry): number {
  const key = (s: SymbolEntry): string =>
    s.kind === 'constant'
      ? `1\n${toHexWord(s.value)}\n${s.name.toLowerCase()}`
      : `0\n${toHexWord(s.address)}\n${s.name.toLowerCase()}`;
  return key(a).localeCompare(key(b));
}

function formatEntry(entry: EmittedTraceEntry): string {
  switch (entry.kind) {
    case 'label':
      return `${entry.name}:`;
    case 'instruction':
      return `${toHexWord(entry.offset)}: ${toHexWord(entry.word)}  ${entry.text}`;
    case 'raw':
      return `${toHexWord(entry.offset)}: ${toHexWord(entry.word)}  raw(${entry.word})`;
    case 'sprite':
      return `${toHexWord(entry.offset)}: ${entry.rows.map(toHexByte).join(' ')}  sprite ${entry.name}`;
  }
}

/**
 * Create a deterministic `.lst` listing: one line per emitted item, then the symbol table.
 */
export function writeListing(
  image: EmittedImage,
  symbols: SymbolEntry[],
  opts?: WriteListingOptions,
): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const { start, end } = imageRange(image);

  const lines: string[] = [];
  lines.push('; c8asm listing');
  lines.push(`; range: $${toHexWord(start)}..$${toHexWord(end)} (end exclusive)`);
  lines.push('');

  for (const entry of image.trace) {
    lines.push(formatEntry(entry));
  }

  lines.push('');
  lines.push('; symbols:');
  for (const s of [...symbols].sort(sortSymbols)) {
    lines.push(`; ${formatSymbol(s)}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
