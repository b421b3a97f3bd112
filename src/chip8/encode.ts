import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { ImmValueNode, InstructionNode, OperandNode } from '../frontend/ast.js';
import type { SymbolTable } from '../semantics/symbols.js';
import { constantValue } from '../semantics/symbols.js';
import type { ImmFormat } from './arch.js';
import { formatMax, parseRegister } from './arch.js';
import type { InstructionForm, OperandSlot } from './isa.js';
import { describeForm, formsFor } from './isa.js';

/**
 * What the encoder needs to turn names into numbers.
 */
export interface EncodeContext {
  symbols: SymbolTable;
  /** Laid-out addresses of labels, procedures and sprites. */
  addresses: ReadonlyMap<string, number>;
}

function diag(
  diagnostics: Diagnostic[],
  node: { span: { file: string; start: { line: number; column: number } } },
  id: Diagnostic['id'],
  message: string,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file: node.span.file,
    line: node.span.start.line,
    column: node.span.start.column,
  });
}

function vIndex(op: OperandNode): number | undefined {
  if (op.kind !== 'Reg') return undefined;
  const reg = parseRegister(op.name);
  return reg?.kind === 'v' ? reg.index : undefined;
}

function fitsSlot(op: OperandNode, slot: OperandSlot): boolean {
  switch (slot) {
    case 'vx':
    case 'vy':
      return vIndex(op) !== undefined;
    case 'i':
    case 'dt':
    case 'st':
      return op.kind === 'Reg' && op.name === slot;
    case 'imm4':
    case 'imm8':
      return op.kind === 'Imm';
    case 'addr':
      return op.kind === 'Imm' || op.kind === 'LabelRef' || op.kind === 'ProcRef';
    case 'spriteAddr':
      return (
        op.kind === 'Imm' || op.kind === 'LabelRef' || op.kind === 'ProcRef' || op.kind === 'SpriteRef'
      );
    case 'indirect':
      return op.kind === 'Indirect';
  }
}

function slotFormat(slot: OperandSlot): ImmFormat | undefined {
  switch (slot) {
    case 'imm4':
    case 'imm8':
      return slot;
    case 'addr':
    case 'spriteAddr':
    case 'indirect':
      return 'imm12';
    case 'vx':
    case 'vy':
    case 'i':
    case 'dt':
    case 'st':
      return undefined;
  }
}

/**
 * Short description of an operand's addressing mode, used in diagnostics.
 */
export function describeOperand(op: OperandNode): string {
  switch (op.kind) {
    case 'Reg':
      return `register ${op.name}`;
    case 'Imm':
      return 'immediate';
    case 'LabelRef':
      return 'label';
    case 'ProcRef':
      return 'procedure';
    case 'SpriteRef':
      return 'sprite';
    case 'Indirect':
      return 'indirect';
  }
}

/**
 * Find the form of `node.mnemonic` whose slots accept `node.operands`.
 */
export function selectForm(node: InstructionNode): InstructionForm | undefined {
  return formsFor(node.mnemonic).find(
    (f) =>
      f.slots.length === node.operands.length &&
      f.slots.every((slot, i) => {
        const op = node.operands[i];
        return op !== undefined && fitsSlot(op, slot);
      }),
  );
}

function immNodeValue(value: ImmValueNode, ctx: EncodeContext): number | undefined {
  if (value.kind === 'ImmLiteral') return value.value;
  return constantValue(ctx.symbols, value.name) ?? ctx.addresses.get(value.name);
}

/**
 * Numeric value an operand contributes to its field (register index, immediate or address).
 */
export function operandValue(op: OperandNode, ctx: EncodeContext): number | undefined {
  switch (op.kind) {
    case 'Reg':
      return vIndex(op);
    case 'Imm':
      return immNodeValue(op.value, ctx);
    case 'Indirect':
      return immNodeValue(op.target, ctx);
    case 'LabelRef':
    case 'ProcRef':
    case 'SpriteRef':
      return ctx.addresses.get(op.name);
  }
}

/**
 * Resolve a `raw(...)` value.
 */
export function rawValue(value: ImmValueNode, ctx: EncodeContext): number | undefined {
  return immNodeValue(value, ctx);
}

/**
 * Encode a single instruction into its 16-bit word.
 *
 * On an operand shape no form accepts, or a value wider than its field, appends an error
 * diagnostic and returns `undefined`.
 */
export function encodeInstruction(
  node: InstructionNode,
  ctx: EncodeContext,
  diagnostics: Diagnostic[],
): number | undefined {
  const chosen = selectForm(node);
  if (!chosen) {
    const given = node.operands.map(describeOperand).join(', ');
    const accepted = formsFor(node.mnemonic).map(describeForm).join('; ');
    diag(
      diagnostics,
      node,
      DiagnosticIds.OperandMismatch,
      `No form of "${node.mnemonic}" accepts (${given}); expected one of: ${accepted}.`,
    );
    return undefined;
  }

  let word = chosen.opcode;
  for (let i = 0; i < chosen.slots.length; i++) {
    const slot = chosen.slots[i];
    const op = node.operands[i];
    if (slot === undefined || op === undefined) return undefined;
    if (slot === 'i' || slot === 'dt' || slot === 'st') continue;

    const value = operandValue(op, ctx);
    if (value === undefined) {
      diag(diagnostics, op, DiagnosticIds.OperandMismatch, `Operand ${i + 1} of "${node.mnemonic}" has no value.`);
      return undefined;
    }

    if (slot === 'vx') {
      word |= value << 8;
      continue;
    }
    if (slot === 'vy') {
      word |= value << 4;
      continue;
    }

    const format = slotFormat(slot);
    if (format === undefined) continue;
    const max = formatMax(format);
    if (value < 0 || value > max) {
      diag(
        diagnostics,
        op,
        DiagnosticIds.ImmediateOutOfRange,
        `Immediate ${value} exceeds ${format} (0..${max}) for "${node.mnemonic}".`,
      );
      return undefined;
    }
    word |= value;
  }

  return word & 0xffff;
}
