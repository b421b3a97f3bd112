/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * An assembler diagnostic with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `C8A101`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs, grouped by pipeline stage.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'C8A000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'C8A001',

  /** A digit that is not valid for the numeric base of its literal. */
  InvalidDigitForBase: 'C8A101',

  /** A numeric literal whose value does not fit in 16 bits. */
  NumericConstantTooLarge: 'C8A102',

  /** A character that cannot start any token. */
  UndefinedCharacterToken: 'C8A103',

  /** A token that cannot appear at this point of a statement. */
  UnexpectedToken: 'C8A200',

  /** `proc X ... endp Y` with `X !== Y`. */
  UnmatchingProcedureNames: 'C8A201',

  /** `proc` found inside a procedure body. */
  NestedProcedure: 'C8A202',

  /** End of input inside a procedure body. */
  UnexpectedEof: 'C8A203',

  /** Sprite with more rows than the architecture allows. */
  SpriteTooLarge: 'C8A204',

  /** Sprite row that does not fit in a byte. */
  SpriteRowOutOfRange: 'C8A205',

  /** Two declarations share a name. */
  SymbolConflict: 'C8A300',

  /** Reference to a name that is never declared. */
  UndefinedSymbol: 'C8A301',

  /** Reference to a declared name of the wrong category. */
  SymbolKindMismatch: 'C8A302',

  /** `default` requested for a name without an architecture default. */
  NoDefaultValue: 'C8A303',

  /** Operand count/kinds do not match any form of the mnemonic. */
  OperandMismatch: 'C8A400',

  /** Immediate (or resolved address) wider than its instruction field. */
  ImmediateOutOfRange: 'C8A401',

  /** Program image does not fit in target memory. */
  ProgramTooLarge: 'C8A402',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * True when at least one diagnostic is an error.
 */
export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
