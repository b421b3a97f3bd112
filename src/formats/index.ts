import type { FormatWriters } from './types.js';
import { writeBin } from './writeBin.js';
import { writeHex } from './writeHex.js';
import { writeListing } from './writeListing.js';
import { writeSymbols } from './writeSymbols.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeBin,
  writeHex,
  writeSymbols,
  writeListing,
};
