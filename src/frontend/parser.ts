import type {
  ConfigNode,
  DeclValue,
  DefineNode,
  ImmValueNode,
  InstructionNode,
  LabelNode,
  OperandNode,
  ProcedureNode,
  ProgramNode,
  RawNode,
  SourceSpan,
  SpriteNode,
  StatementNode,
} from './ast.js';
import type { Token, TokenKind } from './lexer.js';
import { describeTokenKind, tokenize } from './lexer.js';
import { makeSourceFile, span } from './source.js';
import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { MAX_SPRITE_ROWS, immMatchesFormat } from '../chip8/arch.js';

class ParseFailure extends Error {
  constructor(
    readonly id: DiagnosticId,
    message: string,
    readonly where: SourceSpan,
  ) {
    super(message);
  }
}

const OPERAND_STARTERS: readonly TokenKind[] = [
  'Register',
  'Identifier',
  'Number',
  'At',
  'Dollar',
  'Hash',
  'LBracket',
];

function joinSpans(a: SourceSpan, b: SourceSpan): SourceSpan {
  return { file: a.file, start: a.start, end: b.end };
}

/** Lexeme suffix for kinds whose description does not already spell out the text. */
function tokenText(t: Token): string {
  switch (t.kind) {
    case 'Identifier':
    case 'Number':
    case 'Instruction':
    case 'Register':
      return ` "${t.text}"`;
    default:
      return '';
  }
}

function unexpected(t: Token, expected: readonly TokenKind[]): ParseFailure {
  const want = expected.map(describeTokenKind).join(', ');
  return new ParseFailure(
    DiagnosticIds.UnexpectedToken,
    `Unexpected ${describeTokenKind(t.kind)}${tokenText(t)} at ${t.span.start.line}:${t.span.start.column}; expected one of: ${want}.`,
    t.span,
  );
}

/**
 * Recursive-descent parser with one token of lookahead.
 */
class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  /** Current token. The token list always ends with `Eof`, which is never consumed. */
  private get current(): Token {
    const t = this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
    if (!t) throw new Error('parser: empty token list');
    return t;
  }

  private at(...kinds: TokenKind[]): boolean {
    return kinds.includes(this.current.kind);
  }

  private advance(): Token {
    const t = this.current;
    if (t.kind !== 'Eof') this.index++;
    return t;
  }

  private expect(...kinds: TokenKind[]): Token {
    if (!this.at(...kinds)) throw unexpected(this.current, kinds);
    return this.advance();
  }

  private advanceIf(kind: TokenKind): boolean {
    if (!this.at(kind)) return false;
    this.advance();
    return true;
  }

  private previousSpan(): SourceSpan {
    return (this.tokens[this.index - 1] ?? this.current).span;
  }

  parseProgram(path: string, fileSpan: SourceSpan): ProgramNode {
    const statements: StatementNode[] = [];
    while (!this.at('Eof')) {
      statements.push(this.parsePrimaryStatement());
    }
    return { kind: 'Program', span: fileSpan, path, statements };
  }

  private parsePrimaryStatement(): StatementNode {
    switch (this.current.kind) {
      case 'Define':
        return this.parseDefine();
      case 'Config':
        return this.parseConfig();
      case 'Sprite':
        return this.parseSprite();
      case 'Raw':
        return this.parseRaw();
      case 'Dot':
        return this.parseLabel();
      case 'Proc':
        return this.parseProcedure();
      case 'Instruction':
        return this.parseInstruction();
      default:
        throw unexpected(this.current, ['Define', 'Config', 'Sprite', 'Raw', 'Dot', 'Proc', 'Instruction']);
    }
  }

  private parseDeclValue(): DeclValue {
    const t = this.expect('Number', 'Default');
    return t.kind === 'Default' ? 'default' : (t.value ?? 0);
  }

  private parseDefine(): DefineNode {
    const start = this.expect('Define');
    const name = this.expect('Identifier');
    const value = this.parseDeclValue();
    return { kind: 'Define', span: joinSpans(start.span, this.previousSpan()), name: name.text, value };
  }

  private parseConfig(): ConfigNode {
    const start = this.expect('Config');
    const name = this.expect('Identifier');
    this.expect('Equals');
    const value = this.parseDeclValue();
    return { kind: 'Config', span: joinSpans(start.span, this.previousSpan()), name: name.text, value };
  }

  private parseSprite(): SpriteNode {
    const start = this.expect('Sprite');
    const name = this.expect('Identifier');
    this.expect('LBracket');

    const rows: number[] = [];
    do {
      const row = this.expect('Number');
      const value = row.value ?? 0;
      if (rows.length >= MAX_SPRITE_ROWS) {
        throw new ParseFailure(
          DiagnosticIds.SpriteTooLarge,
          `Sprite "${name.text}" has too many rows (${rows.length + 1} > ${MAX_SPRITE_ROWS}).`,
          row.span,
        );
      }
      if (!immMatchesFormat(value, 'imm8')) {
        throw new ParseFailure(
          DiagnosticIds.SpriteRowOutOfRange,
          `Sprite "${name.text}" row ${rows.length} value ${value} does not fit in a byte (0..255).`,
          row.span,
        );
      }
      rows.push(value);
    } while (this.advanceIf('Comma'));

    this.expect('RBracket');
    return { kind: 'Sprite', span: joinSpans(start.span, this.previousSpan()), name: name.text, rows };
  }

  private immValue(t: Token): ImmValueNode {
    return t.kind === 'Number'
      ? { kind: 'ImmLiteral', span: t.span, value: t.value ?? 0 }
      : { kind: 'ImmName', span: t.span, name: t.text };
  }

  private parseRaw(): RawNode {
    const start = this.expect('Raw');
    this.expect('LParen');
    const value = this.immValue(this.expect('Number', 'Identifier'));
    this.expect('RParen');
    return { kind: 'Raw', span: joinSpans(start.span, this.previousSpan()), value };
  }

  private parseInstruction(): InstructionNode {
    const mnemonic = this.expect('Instruction');
    const operands: OperandNode[] = [];
    if (this.at(...OPERAND_STARTERS)) {
      do {
        operands.push(this.parseOperand());
      } while (this.advanceIf('Comma'));
    }
    return {
      kind: 'Instruction',
      span: joinSpans(mnemonic.span, this.previousSpan()),
      mnemonic: mnemonic.text.toLowerCase(),
      operands,
    };
  }

  private parseOperand(): OperandNode {
    const t = this.expect(...OPERAND_STARTERS);
    switch (t.kind) {
      case 'Register':
        return { kind: 'Reg', span: t.span, name: t.text.toLowerCase() };
      case 'At': {
        const name = this.expect('Identifier');
        return { kind: 'LabelRef', span: joinSpans(t.span, name.span), name: name.text };
      }
      case 'Dollar': {
        const name = this.expect('Identifier');
        return { kind: 'ProcRef', span: joinSpans(t.span, name.span), name: name.text };
      }
      case 'Hash': {
        const name = this.expect('Identifier');
        return { kind: 'SpriteRef', span: joinSpans(t.span, name.span), name: name.text };
      }
      case 'LBracket': {
        const target = this.immValue(this.expect('Identifier', 'Number'));
        const close = this.expect('RBracket');
        return { kind: 'Indirect', span: joinSpans(t.span, close.span), target };
      }
      default:
        return { kind: 'Imm', span: t.span, value: this.immValue(t) };
    }
  }

  private parseLabel(): LabelNode {
    const start = this.expect('Dot');
    const name = this.expect('Identifier');
    this.expect('Colon');

    const body: StatementNode[] = [];
    for (;;) {
      const t = this.current;
      if (t.kind === 'Eof' || t.kind === 'Dot' || t.kind === 'Endp') break;
      switch (t.kind) {
        case 'Define':
          body.push(this.parseDefine());
          break;
        case 'Config':
          body.push(this.parseConfig());
          break;
        case 'Raw':
          body.push(this.parseRaw());
          break;
        case 'Instruction':
          body.push(this.parseInstruction());
          break;
        default:
          throw unexpected(t, ['Define', 'Config', 'Raw', 'Instruction', 'Dot', 'Endp', 'Eof']);
      }
    }

    return { kind: 'Label', span: joinSpans(start.span, this.previousSpan()), name: name.text, body };
  }

  private parseProcedure(): ProcedureNode {
    const start = this.expect('Proc');
    const name = this.expect('Identifier');

    const body: StatementNode[] = [];
    for (;;) {
      const t = this.current;
      if (t.kind === 'Endp') break;
      switch (t.kind) {
        case 'Eof':
          throw new ParseFailure(
            DiagnosticIds.UnexpectedEof,
            `Unexpected end of input inside procedure "${name.text}"; expected "endp ${name.text}".`,
            t.span,
          );
        case 'Proc':
          throw new ParseFailure(
            DiagnosticIds.NestedProcedure,
            `Cannot define a procedure inside procedure "${name.text}".`,
            t.span,
          );
        case 'Define':
          body.push(this.parseDefine());
          break;
        case 'Config':
          body.push(this.parseConfig());
          break;
        case 'Raw':
          body.push(this.parseRaw());
          break;
        case 'Instruction':
          body.push(this.parseInstruction());
          break;
        case 'Dot':
          body.push(this.parseLabel());
          break;
        default:
          throw unexpected(t, ['Define', 'Config', 'Raw', 'Instruction', 'Dot', 'Endp']);
      }
    }

    this.expect('Endp');
    const endName = this.expect('Identifier');
    if (endName.text !== name.text) {
      throw new ParseFailure(
        DiagnosticIds.UnmatchingProcedureNames,
        `Procedure "${name.text}" is closed by unmatching name "${endName.text}".`,
        endName.span,
      );
    }

    return {
      kind: 'Procedure',
      span: joinSpans(start.span, endName.span),
      name: name.text,
      endName: endName.text,
      body,
    };
  }
}

/**
 * Parse a token list into a {@link ProgramNode}.
 *
 * Syntax errors are fatal: the first one is pushed to `diagnostics` and `undefined` is returned.
 */
export function parseTokens(
  path: string,
  tokens: Token[],
  fileSpan: SourceSpan,
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  try {
    return new Parser(tokens).parseProgram(path, fileSpan);
  } catch (err) {
    if (!(err instanceof ParseFailure)) throw err;
    diagnostics.push({
      id: err.id,
      severity: 'error',
      message: err.message,
      file: path,
      line: err.where.start.line,
      column: err.where.start.column,
    });
    return undefined;
  }
}

/**
 * Lex and parse a single source file.
 */
export function parseProgram(
  path: string,
  text: string,
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  const file = makeSourceFile(path, text);
  const tokens = tokenize(file, diagnostics);
  if (!tokens) return undefined;
  return parseTokens(path, tokens, span(file, 0, text.length), diagnostics);
}
