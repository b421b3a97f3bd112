import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  ImmValueNode,
  InstructionNode,
  OperandNode,
  ProgramNode,
  StatementNode,
} from '../frontend/ast.js';
import type { EmittedImage, EmittedTraceEntry, SymbolEntry } from '../formats/types.js';
import type { SymbolTable } from '../semantics/symbols.js';
import { LOAD_BASE, MEMORY_SIZE, WORD_BYTES } from '../chip8/arch.js';
import type { EncodeContext } from '../chip8/encode.js';
import { encodeInstruction, rawValue } from '../chip8/encode.js';
import { orderStatements } from './order.js';

/**
 * Load address of the image: `config LOAD_ADDRESS` when present, else the architecture base.
 */
export function loadBase(symbols: SymbolTable): number {
  const sym = symbols.symbols.get('LOAD_ADDRESS');
  return sym?.kind === 'config' ? sym.value : LOAD_BASE;
}

function immText(value: ImmValueNode): string {
  return value.kind === 'ImmLiteral' ? String(value.value) : value.name;
}

function operandText(op: OperandNode): string {
  switch (op.kind) {
    case 'Reg':
      return op.name;
    case 'Imm':
      return immText(op.value);
    case 'LabelRef':
      return `@${op.name}`;
    case 'ProcRef':
      return `$${op.name}`;
    case 'SpriteRef':
      return `#${op.name}`;
    case 'Indirect':
      return `[${immText(op.target)}]`;
  }
}

/**
 * Canonical one-line rendering of an instruction (lower-case mnemonic, `, ` separators).
 */
export function formatInstruction(node: InstructionNode): string {
  if (node.operands.length === 0) return node.mnemonic;
  return `${node.mnemonic} ${node.operands.map(operandText).join(', ')}`;
}

/**
 * Assign addresses to every label, procedure and sprite.
 *
 * Instructions and raw words take one word each; sprites take one byte per row. Labels and
 * procedures take the address of whatever is emitted next. Returns the end address (exclusive).
 */
export function layoutStatements(
  statements: readonly StatementNode[],
  base: number,
  addresses: Map<string, number>,
): number {
  let addr = base;
  const walk = (list: readonly StatementNode[]): void => {
    for (const stmt of list) {
      switch (stmt.kind) {
        case 'Label':
        case 'Procedure':
          addresses.set(stmt.name, addr);
          walk(stmt.body);
          break;
        case 'Instruction':
        case 'Raw':
          addr += WORD_BYTES;
          break;
        case 'Sprite':
          addresses.set(stmt.name, addr);
          addr += stmt.rows.length;
          break;
        case 'Define':
        case 'Config':
          break;
      }
    }
  };
  walk(statements);
  return addr;
}

function symbolEntries(
  symbols: SymbolTable,
  addresses: ReadonlyMap<string, number>,
  trace: readonly EmittedTraceEntry[],
): SymbolEntry[] {
  const spriteSizes = new Map<string, number>();
  for (const entry of trace) {
    if (entry.kind === 'sprite') spriteSizes.set(entry.name, entry.rows.length);
  }

  const out: SymbolEntry[] = [];
  for (const sym of symbols.symbols.values()) {
    const where = { file: sym.span.file, line: sym.span.start.line };
    if (sym.kind === 'define' || sym.kind === 'config') {
      out.push({ kind: 'constant', name: sym.name, value: sym.value, origin: sym.kind, ...where });
      continue;
    }
    const address = addresses.get(sym.name);
    if (address === undefined) continue;
    const size = spriteSizes.get(sym.name);
    out.push({ kind: sym.kind, name: sym.name, address, ...where, ...(size !== undefined ? { size } : {}) });
  }
  return out;
}

/**
 * Lower a sanitized program into its memory image.
 *
 * Statements are ordered by priority, laid out from the load base and encoded. On the first error
 * a diagnostic is pushed and `undefined` is returned.
 */
export function emitProgram(
  program: ProgramNode,
  symbols: SymbolTable,
  diagnostics: Diagnostic[],
): { image: EmittedImage; symbols: SymbolEntry[] } | undefined {
  const ordered = orderStatements(program.statements);
  const base = loadBase(symbols);
  const addresses = new Map<string, number>();
  const end = layoutStatements(ordered, base, addresses);

  if (end > MEMORY_SIZE) {
    diagnostics.push({
      id: DiagnosticIds.ProgramTooLarge,
      severity: 'error',
      message: `Program occupies $${base.toString(16).toUpperCase()}..$${end.toString(16).toUpperCase()}, beyond the $${MEMORY_SIZE.toString(16).toUpperCase()}-byte memory.`,
      file: program.path,
    });
    return undefined;
  }

  const ctx: EncodeContext = { symbols, addresses };
  const bytes: number[] = [];
  const trace: EmittedTraceEntry[] = [];
  const here = (): number => base + bytes.length;
  const pushWord = (word: number): void => {
    bytes.push((word >> 8) & 0xff, word & 0xff);
  };

  const emit = (list: readonly StatementNode[]): boolean => {
    for (const stmt of list) {
      switch (stmt.kind) {
        case 'Label':
        case 'Procedure':
          trace.push({ kind: 'label', offset: here(), name: stmt.name });
          if (!emit(stmt.body)) return false;
          break;
        case 'Instruction': {
          const word = encodeInstruction(stmt, ctx, diagnostics);
          if (word === undefined) return false;
          trace.push({
            kind: 'instruction',
            offset: here(),
            text: formatInstruction(stmt),
            word,
            line: stmt.span.start.line,
          });
          pushWord(word);
          break;
        }
        case 'Raw': {
          const word = rawValue(stmt.value, ctx);
          if (word === undefined) {
            diagnostics.push({
              id: DiagnosticIds.UndefinedSymbol,
              severity: 'error',
              message: `raw value "${immText(stmt.value)}" has no value.`,
              file: stmt.span.file,
              line: stmt.span.start.line,
              column: stmt.span.start.column,
            });
            return false;
          }
          trace.push({ kind: 'raw', offset: here(), word, line: stmt.span.start.line });
          pushWord(word);
          break;
        }
        case 'Sprite':
          trace.push({
            kind: 'sprite',
            offset: here(),
            name: stmt.name,
            rows: [...stmt.rows],
            line: stmt.span.start.line,
          });
          bytes.push(...stmt.rows);
          break;
        case 'Define':
        case 'Config':
          break;
      }
    }
    return true;
  };

  if (!emit(ordered)) return undefined;

  const byteLength = bytes.length;
  if (bytes.length % WORD_BYTES !== 0) bytes.push(0);
  const words: number[] = [];
  for (let i = 0; i < bytes.length; i += WORD_BYTES) {
    words.push(((bytes[i] ?? 0) << 8) | (bytes[i + 1] ?? 0));
  }

  return {
    image: { base, words, byteLength, trace },
    symbols: symbolEntries(symbols, addresses, trace),
  };
}
