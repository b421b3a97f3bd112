/**
 * Half-open address range in the 12-bit CHIP-8 address space.
 */
export interface AddressRange {
  /** Inclusive start address. */
  start: number;
  /** Exclusive end address. */
  end: number;
}

/**
 * Program image produced by the generator.
 */
export interface EmittedImage {
  /** Address of the first word (the load base). */
  base: number;
  /** Program words in memory order, big-endian on the target. */
  words: number[];
  /** Number of meaningful bytes; `words` may end with one padding byte. */
  byteLength: number;
  /**
   * Deterministic trace of what was emitted where, in address order.
   *
   * Used by the listing writer to show source next to the words without a disassembler.
   */
  trace: EmittedTraceEntry[];
}

/**
 * Trace entry; `offset` is an absolute address.
 */
export type EmittedTraceEntry =
  | { kind: 'label'; offset: number; name: string }
  | { kind: 'instruction'; offset: number; text: string; word: number; line: number }
  | { kind: 'raw'; offset: number; word: number; line: number }
  | { kind: 'sprite'; offset: number; name: string; rows: number[]; line: number };

/**
 * A symbol entry for symbol maps and listings.
 */
export type SymbolEntry =
  | {
      kind: 'constant';
      name: string;
      /** Constant value (not an address). */
      value: number;
      /** `define` or `config`. */
      origin: 'define' | 'config';
      file?: string;
      line?: number;
    }
  | {
      kind: 'label' | 'procedure' | 'sprite';
      name: string;
      address: number;
      file?: string;
      line?: number;
      /** Size in bytes, for sprites. */
      size?: number;
    };

/**
 * Options for Intel HEX writing.
 */
export interface WriteHexOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for symbol map writing.
 */
export interface WriteSymbolsOptions {
  /**
   * Base directory used to normalize file paths in symbol entries.
   * When provided, file paths are made project-relative and use `/` separators.
   */
  rootDir?: string;
}

/**
 * In-memory Intel HEX artifact.
 */
export interface HexArtifact {
  kind: 'hex';
  path?: string;
  text: string;
}

/**
 * In-memory ROM artifact (`.ch8`): the image bytes with no header.
 */
export interface BinArtifact {
  kind: 'bin';
  path?: string;
  bytes: Uint8Array;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * In-memory symbol map artifact.
 */
export interface SymbolsArtifact {
  kind: 'sym';
  path?: string;
  json: SymbolsJson;
}

/**
 * Union of all artifact kinds produced by the assembler.
 */
export type Artifact = HexArtifact | BinArtifact | ListingArtifact | SymbolsArtifact;

/**
 * Symbol as serialized in the symbol map. Paths use `/` separators.
 */
export type SerializedSymbol =
  | { name: string; kind: 'constant'; origin: 'define' | 'config'; value: number; file?: string; line?: number }
  | {
      name: string;
      kind: 'label' | 'procedure' | 'sprite';
      address: number;
      file?: string;
      line?: number;
      size?: number;
    };

/**
 * Symbol map JSON shape.
 */
export type SymbolsJson = {
  format: 'c8asm-symbols';
  version: 1;
  arch: 'chip8';
  /** Load address of the image. */
  base: number;
  /** Image size in bytes (without padding). */
  size: number;
  symbols: SerializedSymbol[];
};

/**
 * Format writers used by the pipeline to turn the emitted image and symbols into artifacts.
 */
export interface FormatWriters {
  writeBin(image: EmittedImage, symbols: SymbolEntry[]): BinArtifact;
  writeHex(image: EmittedImage, symbols: SymbolEntry[], opts?: WriteHexOptions): HexArtifact;
  writeSymbols(image: EmittedImage, symbols: SymbolEntry[], opts?: WriteSymbolsOptions): SymbolsArtifact;
  writeListing?(
    image: EmittedImage,
    symbols: SymbolEntry[],
    opts?: WriteListingOptions,
  ): ListingArtifact;
}
