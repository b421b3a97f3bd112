import type { SourceSpan } from './ast.js';
import type { SourceFile } from './source.js';
import { formatPosition, SourceCursor, span } from './source.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { isRegisterName } from '../chip8/arch.js';
import { isMnemonic } from '../chip8/isa.js';

export type TokenKind =
  | 'Eof'
  | 'Number'
  | 'Define'
  | 'Config'
  | 'Default'
  | 'Sprite'
  | 'Raw'
  | 'Proc'
  | 'Endp'
  | 'Identifier'
  | 'Instruction'
  | 'Register'
  | 'LBracket'
  | 'RBracket'
  | 'LParen'
  | 'RParen'
  | 'Colon'
  | 'Comma'
  | 'Equals'
  | 'Dot'
  | 'At'
  | 'Dollar'
  | 'Hash';

export interface Token {
  kind: TokenKind;
  /** Lexeme as written (for `Eof`, the empty string). */
  text: string;
  /** Numeric payload of `Number` tokens (0..0xFFFF). */
  value?: number;
  span: SourceSpan;
}

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
  ['define', 'Define'],
  ['config', 'Config'],
  ['default', 'Default'],
  ['sprite', 'Sprite'],
  ['raw', 'Raw'],
  ['proc', 'Proc'],
  ['endp', 'Endp'],
]);

const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map([
  ['[', 'LBracket'],
  [']', 'RBracket'],
  ['(', 'LParen'],
  [')', 'RParen'],
  [':', 'Colon'],
  [',', 'Comma'],
  ['=', 'Equals'],
  ['.', 'Dot'],
  ['@', 'At'],
  ['$', 'Dollar'],
  ['#', 'Hash'],
]);

const BASE_PREFIXES: ReadonlyMap<string, number> = new Map([
  ['x', 16],
  ['b', 2],
  ['o', 8],
]);

/**
 * Human-readable token kind names used in parser messages.
 */
export function describeTokenKind(kind: TokenKind): string {
  switch (kind) {
    case 'Eof':
      return 'end of input';
    case 'Number':
      return 'number';
    case 'Define':
    case 'Config':
    case 'Default':
    case 'Sprite':
    case 'Raw':
    case 'Proc':
    case 'Endp':
      return `"${kind.toLowerCase()}"`;
    case 'Identifier':
      return 'identifier';
    case 'Instruction':
      return 'instruction';
    case 'Register':
      return 'register';
    case 'LBracket':
      return '"["';
    case 'RBracket':
      return '"]"';
    case 'LParen':
      return '"("';
    case 'RParen':
      return '")"';
    case 'Colon':
      return '":"';
    case 'Comma':
      return '","';
    case 'Equals':
      return '"="';
    case 'Dot':
      return '"."';
    case 'At':
      return '"@"';
    case 'Dollar':
      return '"$"';
    case 'Hash':
      return '"#"';
  }
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isAlpha(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isAlphaNumeric(ch: string): boolean {
  return isAlpha(ch) || isDigit(ch);
}

function printable(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return ch.length === 1 && code >= 0x20 && code <= 0x7e;
}

class LexError extends Error {
  constructor(
    readonly id: DiagnosticId,
    message: string,
    readonly where: SourceSpan,
  ) {
    super(message);
  }
}

/**
 * Single-pass scanner driving a {@link SourceCursor}.
 */
class Lexer {
  private readonly cursor: SourceCursor;

  constructor(private readonly file: SourceFile) {
    this.cursor = new SourceCursor(file);
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.nextToken();
      tokens.push(token);
      if (token.kind === 'Eof') return tokens;
    }
  }

  private make(kind: TokenKind, start: number, value?: number): Token {
    const token: Token = { kind, text: this.cursor.textFrom(start), span: this.cursor.spanFrom(start) };
    if (value !== undefined) token.value = value;
    return token;
  }

  private skipTrivia(): void {
    const c = this.cursor;
    while (!c.atEnd()) {
      if (c.peek() === ';') {
        c.advanceWhile((ch) => ch !== '\n');
      } else if (/\s/.test(c.peek())) {
        c.advance();
      } else {
        return;
      }
    }
  }

  private nextToken(): Token {
    this.skipTrivia();
    const c = this.cursor;
    const start = c.pos;
    const ch = c.peek();

    if (ch === '') return this.make('Eof', start);
    if (isDigit(ch)) return this.readNumber(start);
    if (ch === "'") return this.readCharLiteral(start);
    if (isAlpha(ch)) return this.readWord(start);

    c.advance();
    const punct = PUNCTUATION.get(ch);
    if (punct) return this.make(punct, start);

    throw new LexError(
      DiagnosticIds.UndefinedCharacterToken,
      `Character "${ch}" cannot match any token at ${formatPosition(c.spanFrom(start))}.`,
      c.spanFrom(start),
    );
  }

  private readNumber(start: number): Token {
    const c = this.cursor;
    let base = 10;
    const prefix = BASE_PREFIXES.get(c.peek(1).toLowerCase());
    if (c.peek() === '0' && prefix !== undefined) {
      base = prefix;
      c.advance(2);
    }

    const digitsStart = c.pos;
    c.advanceWhile(isAlphaNumeric);
    const digits = c.textFrom(digitsStart);

    if (digits.length === 0) {
      // `0x` with nothing after it: blame the prefix letter.
      const at = digitsStart - 1;
      const badSpan = span(this.file, at, digitsStart);
      throw new LexError(
        DiagnosticIds.InvalidDigitForBase,
        `Invalid digit "${this.file.text[at] ?? ''}" for numeric base ${base} at ${formatPosition(badSpan)}.`,
        badSpan,
      );
    }

    let value = 0;
    for (let i = 0; i < digits.length; i++) {
      const digit = digits[i] ?? '';
      const n = Number.parseInt(digit, 36);
      if (Number.isNaN(n) || n >= base) {
        const badSpan = span(this.file, digitsStart + i, digitsStart + i + 1);
        throw new LexError(
          DiagnosticIds.InvalidDigitForBase,
          `Invalid digit "${digit}" for numeric base ${base} at ${formatPosition(badSpan)}.`,
          badSpan,
        );
      }
      value = value * base + n;
    }

    if (value > 0xffff) {
      throw new LexError(
        DiagnosticIds.NumericConstantTooLarge,
        `Numeric constant "${c.textFrom(start)}" at ${formatPosition(c.spanFrom(start))} is too large for a 16-bit value.`,
        c.spanFrom(start),
      );
    }

    return this.make('Number', start, value);
  }

  private readCharLiteral(start: number): Token {
    const c = this.cursor;
    const inner = c.peek(1);
    if (!printable(inner) || inner === "'" || c.peek(2) !== "'") {
      c.advance();
      throw new LexError(
        DiagnosticIds.UndefinedCharacterToken,
        `Character "'" cannot match any token at ${formatPosition(c.spanFrom(start))}.`,
        c.spanFrom(start),
      );
    }
    c.advance(3);
    return this.make('Number', start, inner.charCodeAt(0));
  }

  private readWord(start: number): Token {
    this.cursor.advanceWhile(isAlphaNumeric);
    const lower = this.cursor.textFrom(start).toLowerCase();

    const keyword = KEYWORDS.get(lower);
    if (keyword) return this.make(keyword, start);
    if (isRegisterName(lower)) return this.make('Register', start);
    if (isMnemonic(lower)) return this.make('Instruction', start);
    return this.make('Identifier', start);
  }
}

/**
 * Scan the whole file into tokens, always terminated by an `Eof` token.
 *
 * Lexical errors are fatal: the first one is pushed to `diagnostics` and `undefined` is returned.
 */
export function tokenize(file: SourceFile, diagnostics: Diagnostic[]): Token[] | undefined {
  try {
    return new Lexer(file).tokenize();
  } catch (err) {
    if (!(err instanceof LexError)) throw err;
    diagnostics.push({
      id: err.id,
      severity: 'error',
      message: err.message,
      file: file.path,
      line: err.where.start.line,
      column: err.where.start.column,
    });
    return undefined;
  }
}
