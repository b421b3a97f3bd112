import { describe, expect, it } from 'vitest';

import { assembleSource } from '../src/compile.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { describeForm, formsFor, INSTRUCTION_FORMS, isMnemonic } from '../src/chip8/isa.js';

function words(text: string): number[] {
  const res = assembleSource('isa.c8s', text);
  expect(res.diagnostics).toEqual([]);
  return res.image?.words ?? [];
}

function failure(text: string): Diagnostic | undefined {
  const res = assembleSource('isa.c8s', text);
  expect(res.image).toBeUndefined();
  expect(res.diagnostics).toHaveLength(1);
  return res.diagnostics[0];
}

const hex = (ws: number[]): string[] => ws.map((w) => w.toString(16).toUpperCase().padStart(4, '0'));

describe('instruction encoding', () => {
  it('encodes every instruction form', () => {
    const source = [
      'cls',
      'ret',
      'sys 0x123',
      'jmp 0x456',
      'jmp [0x300]',
      'call 0x789',
      'se v1, 0x22',
      'se v1, v2',
      'sne v3, 0x44',
      'sne v3, v4',
      'mov v5, 0x66',
      'mov v5, v6',
      'mov v7, dt',
      'mov dt, v8',
      'mov st, v9',
      'add va, 0x10',
      'add va, vb',
      'add i, vc',
      'or v1, v2',
      'and v1, v2',
      'xor v1, v2',
      'sub v1, v2',
      'shr v1',
      'shr v1, v2',
      'subn v1, v2',
      'shl v1',
      'shl v1, v2',
      'ldi 0xABC',
      'rnd vd, 0xFF',
      'drw v1, v2, 15',
      'skp ve',
      'sknp ve',
      'wkey vf',
      'font v0',
      'bcd v1',
      'stor v2',
      'load v3',
    ].join('\n');

    expect(hex(words(source))).toEqual([
      '00E0', '00EE', '0123', '1456', 'B300', '2789', '3122', '5120', '4344', '9340',
      '6566', '8560', 'F707', 'F815', 'F918', '7A10', '8AB4', 'FC1E', '8121', '8122',
      '8123', '8125', '8106', '8126', '8127', '810E', '812E', 'AABC', 'CDFF', 'D12F',
      'EE9E', 'EEA1', 'FF0A', 'F029', 'F133', 'F255', 'F365',
    ]);
  });

  it('takes character literals as immediates', () => {
    expect(words("mov v0, 'A'")).toEqual([0x6041]);
  });

  it('resolves defines and configs in immediate fields', () => {
    expect(words('define SPEED 3\nconfig SCREEN_WIDTH = default\nadd v2, SPEED\nse v1, SCREEN_WIDTH')).toEqual([
      0x7203, 0x3140,
    ]);
  });

  it('accepts labels, procedures and sprites as load targets', () => {
    expect(words('proc p\nret\nendp p\nsprite s [0xFF]\n.top:\nldi @top\nldi $p\nldi #s')).toEqual([
      0x00ee, 0xa202, 0xa200, 0xa208, 0xff00,
    ]);
  });

  it('accepts values at the top of each field', () => {
    expect(words('mov v0, 255\ndrw v0, v1, 15\njmp 4095\nraw(0xFFFF)')).toEqual([0x60ff, 0xd01f, 0x1fff, 0xffff]);
  });

  it('rejects values one past the top of each field', () => {
    const imm8 = failure('mov v0, 256');
    expect(imm8?.id).toBe(DiagnosticIds.ImmediateOutOfRange);
    expect(imm8?.message).toBe('Immediate 256 exceeds imm8 (0..255) for "mov".');
    expect([imm8?.line, imm8?.column]).toEqual([1, 9]);

    expect(failure('drw v0, v1, 16')?.message).toBe('Immediate 16 exceeds imm4 (0..15) for "drw".');
    expect(failure('jmp 4096')?.message).toBe('Immediate 4096 exceeds imm12 (0..4095) for "jmp".');
    expect(failure('jmp [0x1000]')?.message).toBe('Immediate 4096 exceeds imm12 (0..4095) for "jmp".');
  });

  it('checks the width of named constants at the use site', () => {
    const d = failure('define BIG 300\nadd v0, BIG');
    expect(d?.id).toBe(DiagnosticIds.ImmediateOutOfRange);
    expect(d?.message).toBe('Immediate 300 exceeds imm8 (0..255) for "add".');
    expect([d?.line, d?.column]).toEqual([2, 9]);
  });

  it('lists the accepted forms when no form matches', () => {
    const d = failure('mov i, v0');
    expect(d?.id).toBe(DiagnosticIds.OperandMismatch);
    expect(d?.message).toBe(
      'No form of "mov" accepts (register i, register v0); expected one of: mov vx, imm8; mov vx, vy; mov vx, dt; mov dt, vx; mov st, vx.',
    );
    expect([d?.line, d?.column]).toEqual([1, 1]);

    expect(failure('cls v0')?.message).toBe('No form of "cls" accepts (register v0); expected one of: cls.');
    expect(failure('drw v0, v1')?.message).toBe(
      'No form of "drw" accepts (register v0, register v1); expected one of: drw vx, vy, imm4.',
    );
    expect(failure('sprite s [1]\njmp #s')?.message).toBe(
      'No form of "jmp" accepts (sprite); expected one of: jmp addr; jmp indirect.',
    );
    expect(failure('define X 1\nldi [X]')?.message).toBe(
      'No form of "ldi" accepts (indirect); expected one of: ldi spriteAddr.',
    );
  });

  it('rejects sprites where only code addresses fit', () => {
    expect(failure('sprite s [1]\ncall #s')?.id).toBe(DiagnosticIds.OperandMismatch);
  });

  it('describes forms and mnemonics', () => {
    expect(isMnemonic('DRW')).toBe(true);
    expect(isMnemonic('nop')).toBe(false);
    expect(formsFor('shr').map(describeForm)).toEqual(['shr vx', 'shr vx, vy']);
    expect(new Set(INSTRUCTION_FORMS.map((f) => f.mnemonic)).size).toBe(26);
  });
});
