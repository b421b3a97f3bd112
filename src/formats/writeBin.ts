import type { BinArtifact, EmittedImage, SymbolEntry } from './types.js';
import { imageBytes } from './bytes.js';

/**
 * Create a `.ch8` ROM artifact: the image words as big-endian bytes, ready to load at the base.
 */
export function writeBin(image: EmittedImage, _symbols: SymbolEntry[]): BinArtifact {
  return { kind: 'bin', bytes: imageBytes(image) };
}
