/**
 * Instruction forms of the CHIP-8 target.
 *
 * Each form is an opcode template plus the operand slots it accepts. Slot kinds decide which
 * operand addressing modes fit and where the operand lands in the 16-bit word:
 * - `vx` / `vy`: a `V` register in bits 8-11 / 4-7
 * - `i`, `dt`, `st`: that exact register, no field
 * - `imm4` / `imm8`: immediate in the low 4 / 8 bits
 * - `addr`: 12-bit immediate, `@label` or `$proc` in the low 12 bits
 * - `spriteAddr`: like `addr`, and also `#sprite`
 * - `indirect`: `[address]` in the low 12 bits
 */
export type OperandSlot =
  | 'vx'
  | 'vy'
  | 'i'
  | 'dt'
  | 'st'
  | 'imm4'
  | 'imm8'
  | 'addr'
  | 'spriteAddr'
  | 'indirect';

export interface InstructionForm {
  mnemonic: string;
  slots: readonly OperandSlot[];
  opcode: number;
}

function form(mnemonic: string, opcode: number, ...slots: OperandSlot[]): InstructionForm {
  return { mnemonic, slots, opcode };
}

export const INSTRUCTION_FORMS: readonly InstructionForm[] = [
  form('cls', 0x00e0),
  form('ret', 0x00ee),
  form('sys', 0x0000, 'addr'),
  form('jmp', 0x1000, 'addr'),
  form('jmp', 0xb000, 'indirect'),
  form('call', 0x2000, 'addr'),
  form('se', 0x3000, 'vx', 'imm8'),
  form('se', 0x5000, 'vx', 'vy'),
  form('sne', 0x4000, 'vx', 'imm8'),
  form('sne', 0x9000, 'vx', 'vy'),
  form('mov', 0x6000, 'vx', 'imm8'),
  form('mov', 0x8000, 'vx', 'vy'),
  form('mov', 0xf007, 'vx', 'dt'),
  form('mov', 0xf015, 'dt', 'vx'),
  form('mov', 0xf018, 'st', 'vx'),
  form('add', 0x7000, 'vx', 'imm8'),
  form('add', 0x8004, 'vx', 'vy'),
  form('add', 0xf01e, 'i', 'vx'),
  form('or', 0x8001, 'vx', 'vy'),
  form('and', 0x8002, 'vx', 'vy'),
  form('xor', 0x8003, 'vx', 'vy'),
  form('sub', 0x8005, 'vx', 'vy'),
  form('shr', 0x8006, 'vx'),
  form('shr', 0x8006, 'vx', 'vy'),
  form('subn', 0x8007, 'vx', 'vy'),
  form('shl', 0x800e, 'vx'),
  form('shl', 0x800e, 'vx', 'vy'),
  form('ldi', 0xa000, 'spriteAddr'),
  form('rnd', 0xc000, 'vx', 'imm8'),
  form('drw', 0xd000, 'vx', 'vy', 'imm4'),
  form('skp', 0xe09e, 'vx'),
  form('sknp', 0xe0a1, 'vx'),
  form('wkey', 0xf00a, 'vx'),
  form('font', 0xf029, 'vx'),
  form('bcd', 0xf033, 'vx'),
  form('stor', 0xf055, 'vx'),
  form('load', 0xf065, 'vx'),
];

const FORMS_BY_MNEMONIC = new Map<string, InstructionForm[]>();
for (const f of INSTRUCTION_FORMS) {
  const list = FORMS_BY_MNEMONIC.get(f.mnemonic);
  if (list) list.push(f);
  else FORMS_BY_MNEMONIC.set(f.mnemonic, [f]);
}

export function isMnemonic(text: string): boolean {
  return FORMS_BY_MNEMONIC.has(text.toLowerCase());
}

export function formsFor(mnemonic: string): readonly InstructionForm[] {
  return FORMS_BY_MNEMONIC.get(mnemonic.toLowerCase()) ?? [];
}

/**
 * `mov vx, imm8`-style rendering of a form, used in diagnostics.
 */
export function describeForm(f: InstructionForm): string {
  return f.slots.length === 0 ? f.mnemonic : `${f.mnemonic} ${f.slots.join(', ')}`;
}
