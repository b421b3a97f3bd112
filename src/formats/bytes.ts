import type { AddressRange, EmittedImage } from './types.js';

/**
 * Image words as big-endian bytes, padding byte included.
 */
export function imageBytes(image: EmittedImage): Uint8Array {
  const out = new Uint8Array(image.words.length * 2);
  image.words.forEach((word, i) => {
    out[i * 2] = (word >> 8) & 0xff;
    out[i * 2 + 1] = word & 0xff;
  });
  return out;
}

/**
 * Address range covered by the image words (end exclusive).
 */
export function imageRange(image: EmittedImage): AddressRange {
  return { start: image.base, end: image.base + image.words.length * 2 };
}

export function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

export function toHexWord(n: number): string {
  return (n & 0xffff).toString(16).toUpperCase().padStart(4, '0');
}
