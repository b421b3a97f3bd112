import type { EmittedImage, HexArtifact, SymbolEntry, WriteHexOptions } from './types.js';
import { imageBytes, toHexByte } from './bytes.js';

function checksum(bytes: number[]): number {
  const sum = bytes.reduce((acc, b) => acc + (b & 0xff), 0) & 0xff;
  return ((0x100 - sum) & 0xff) >>> 0;
}

/**
 * Create an Intel HEX artifact from the emitted image.
 *
 * Emits only type-00 data records (16 bytes each) and a type-01 EOF record.
 */
export function writeHex(
  image: EmittedImage,
  _symbols: SymbolEntry[],
  opts?: WriteHexOptions,
): HexArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const bytes = imageBytes(image);
  const recordSize = 16;
  const lines: string[] = [];

  for (let offset = 0; offset < bytes.length; offset += recordSize) {
    const addr = image.base + offset;
    const data = Array.from(bytes.subarray(offset, offset + recordSize));
    const count = data.length;
    const hi = (addr >> 8) & 0xff;
    const lo = addr & 0xff;
    const header = [count, hi, lo, 0x00, ...data];
    const hexData = data.map(toHexByte).join('');
    lines.push(`:${toHexByte(count)}${toHexByte(hi)}${toHexByte(lo)}00${hexData}${toHexByte(checksum(header))}`);
  }

  lines.push(':00000001FF');
  return { kind: 'hex', text: lines.join(lineEnding) + lineEnding };
}
