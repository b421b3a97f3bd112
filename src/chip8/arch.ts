/**
 * Fixed description of the CHIP-8 target: registers, immediate field formats and the values
 * `default` resolves to.
 */

/** Program load address used when no `config LOAD_ADDRESS` is given. */
export const LOAD_BASE = 0x200;

/** Size of the addressable memory, in bytes. */
export const MEMORY_SIZE = 0x1000;

/** Maximum number of rows (bytes) in a sprite. */
export const MAX_SPRITE_ROWS = 15;

/** Size of one instruction word, in bytes. */
export const WORD_BYTES = 2;

/**
 * Width families of immediate instruction fields.
 */
export type ImmFormat = 'imm4' | 'imm8' | 'imm12';

const FORMAT_BITS: Record<ImmFormat, number> = {
  imm4: 4,
  imm8: 8,
  imm12: 12,
};

export function formatMax(format: ImmFormat): number {
  return (1 << FORMAT_BITS[format]) - 1;
}

export function immMatchesFormat(value: number, format: ImmFormat): boolean {
  return Number.isInteger(value) && value >= 0 && value <= formatMax(format);
}

/**
 * Register operands: the sixteen general purpose `V` registers plus the special ones.
 */
export type RegisterName =
  | { kind: 'v'; index: number }
  | { kind: 'i' }
  | { kind: 'dt' }
  | { kind: 'st' };

/**
 * Classify a register lexeme (case-insensitive). Returns `undefined` for non-registers.
 */
export function parseRegister(text: string): RegisterName | undefined {
  const t = text.toLowerCase();
  if (t === 'i' || t === 'dt' || t === 'st') return { kind: t };
  const m = /^v([0-9a-f])$/.exec(t);
  if (!m || m[1] === undefined) return undefined;
  return { kind: 'v', index: Number.parseInt(m[1], 16) };
}

export function isRegisterName(text: string): boolean {
  return parseRegister(text) !== undefined;
}

/**
 * Values that `define NAME default` and `config NAME = default` resolve to.
 */
export const ARCH_DEFAULTS: ReadonlyMap<string, number> = new Map([
  ['LOAD_ADDRESS', LOAD_BASE],
  ['MEMORY_SIZE', MEMORY_SIZE],
  ['SCREEN_WIDTH', 64],
  ['SCREEN_HEIGHT', 32],
  ['FONT_ADDRESS', 0x50],
  ['FONT_HEIGHT', 5],
  ['STACK_DEPTH', 16],
  ['SPRITE_MAX_ROWS', MAX_SPRITE_ROWS],
]);

export function archDefault(name: string): number | undefined {
  return ARCH_DEFAULTS.get(name);
}
