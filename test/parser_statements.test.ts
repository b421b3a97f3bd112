import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type {
  InstructionNode,
  LabelNode,
  ProcedureNode,
  ProgramNode,
  StatementNode,
} from '../src/frontend/ast.js';
import { parseProgram } from '../src/frontend/parser.js';

function parse(text: string): { program: ProgramNode | undefined; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const program = parseProgram('parse.c8s', text, diagnostics);
  return { program, diagnostics };
}

function labelNode(stmt: StatementNode | undefined): LabelNode {
  if (stmt?.kind !== 'Label') throw new Error(`expected a label, got ${stmt?.kind ?? 'nothing'}`);
  return stmt;
}

function procNode(stmt: StatementNode | undefined): ProcedureNode {
  if (stmt?.kind !== 'Procedure') throw new Error(`expected a procedure, got ${stmt?.kind ?? 'nothing'}`);
  return stmt;
}

function instrNode(stmt: StatementNode | undefined): InstructionNode {
  if (stmt?.kind !== 'Instruction') throw new Error(`expected an instruction, got ${stmt?.kind ?? 'nothing'}`);
  return stmt;
}

function firstError(text: string): Diagnostic | undefined {
  const { program, diagnostics } = parse(text);
  expect(program).toBeUndefined();
  expect(diagnostics).toHaveLength(1);
  return diagnostics[0];
}

const tour = `
define X 5
config LOAD_ADDRESS = default
sprite ball [0x18, 0x3C]
raw(0x1234)
proc draw
  ldi #ball
  drw v0, v1, 2
  jmp [0x300]
  call $draw
  ret
endp draw
.start:
  mov v0, X
  jmp @start
`;

describe('parser', () => {
  it('parses every statement kind', () => {
    const { program, diagnostics } = parse(tour);
    expect(diagnostics).toEqual([]);
    expect(program?.statements.map((s) => s.kind)).toEqual([
      'Define',
      'Config',
      'Sprite',
      'Raw',
      'Procedure',
      'Label',
    ]);

    const [define, config, sprite, raw] = program?.statements ?? [];
    expect(define).toMatchObject({ kind: 'Define', name: 'X', value: 5 });
    expect(config).toMatchObject({ kind: 'Config', name: 'LOAD_ADDRESS', value: 'default' });
    expect(sprite).toMatchObject({ kind: 'Sprite', name: 'ball', rows: [0x18, 0x3c] });
    expect(raw).toMatchObject({ kind: 'Raw', value: { kind: 'ImmLiteral', value: 0x1234 } });
  });

  it('runs a label body to the end of input', () => {
    const { program } = parse(tour);
    const label = labelNode(program?.statements[5]);
    expect(label.name).toBe('start');
    expect(label.body.map((s) => instrNode(s).mnemonic)).toEqual(['mov', 'jmp']);

    const proc = procNode(program?.statements[4]);
    expect(proc.name).toBe('draw');
    expect(proc.endName).toBe('draw');
    expect(proc.body).toHaveLength(5);
  });

  it('rejects a procedure after a label', () => {
    const d = firstError('.m:\n cls\nproc p\nendp p');
    expect(d?.id).toBe(DiagnosticIds.UnexpectedToken);
    expect(d?.message).toBe(
      'Unexpected "proc" at 3:1; expected one of: "define", "config", "raw", instruction, ".", "endp", end of input.',
    );
    expect([d?.line, d?.column]).toEqual([3, 1]);
  });

  it('rejects a sprite after a label', () => {
    const d = firstError('.m:\nsprite s [1]');
    expect(d?.id).toBe(DiagnosticIds.UnexpectedToken);
    expect(d?.message).toBe(
      'Unexpected "sprite" at 2:1; expected one of: "define", "config", "raw", instruction, ".", "endp", end of input.',
    );
  });

  it('builds one operand node per addressing mode', () => {
    const { program } = parse(tour);
    const proc = procNode(program?.statements[4]);
    const ops = proc.body.map((s) => instrNode(s).operands);

    expect(ops[0]).toMatchObject([{ kind: 'SpriteRef', name: 'ball' }]);
    expect(ops[1]).toMatchObject([
      { kind: 'Reg', name: 'v0' },
      { kind: 'Reg', name: 'v1' },
      { kind: 'Imm', value: { kind: 'ImmLiteral', value: 2 } },
    ]);
    expect(ops[2]).toMatchObject([{ kind: 'Indirect', target: { kind: 'ImmLiteral', value: 0x300 } }]);
    expect(ops[3]).toMatchObject([{ kind: 'ProcRef', name: 'draw' }]);
    expect(ops[4]).toEqual([]);

    const label = labelNode(program?.statements[5]);
    const mov = instrNode(label.body[0]);
    expect(mov.operands[1]).toMatchObject({ kind: 'Imm', value: { kind: 'ImmName', name: 'X' } });
    const jmp = instrNode(label.body[1]);
    expect(jmp.operands).toMatchObject([{ kind: 'LabelRef', name: 'start' }]);
  });

  it('lower-cases mnemonics and registers', () => {
    const { program } = parse('MOV VA, DT');
    const instr = instrNode(program?.statements[0]);
    expect(instr.mnemonic).toBe('mov');
    expect(instr.operands).toMatchObject([
      { kind: 'Reg', name: 'va' },
      { kind: 'Reg', name: 'dt' },
    ]);
  });

  it('records statement spans', () => {
    const { program } = parse('cls\n  add v1, 2');
    expect(program?.statements[1]?.span.start).toEqual({ line: 2, column: 3, offset: 6 });
    expect(program?.statements[1]?.span.end).toEqual({ line: 2, column: 12, offset: 15 });
  });

  it('allows a label inside a procedure', () => {
    const { program, diagnostics } = parse('proc a\n.inner:\n  cls\nendp a');
    expect(diagnostics).toEqual([]);
    const proc = procNode(program?.statements[0]);
    expect(proc.body).toHaveLength(1);
    expect(proc.body[0]).toMatchObject({ kind: 'Label', name: 'inner' });
    expect(labelNode(proc.body[0]).body).toHaveLength(1);
  });

  it('keeps consecutive labels as siblings', () => {
    const { program } = parse('.a:\n.b:\n  cls');
    expect(program?.statements.map((s) => s.kind)).toEqual(['Label', 'Label']);
    expect(labelNode(program?.statements[0]).body).toEqual([]);
  });

  it('rejects unmatching procedure names, naming both', () => {
    const d = firstError('proc foo\n  ret\nendp bar');
    expect(d?.id).toBe(DiagnosticIds.UnmatchingProcedureNames);
    expect(d?.message).toBe('Procedure "foo" is closed by unmatching name "bar".');
    expect([d?.line, d?.column]).toEqual([3, 6]);
  });

  it('rejects a procedure nested in another', () => {
    const d = firstError('proc a\nproc b\nendp b\nendp a');
    expect(d?.id).toBe(DiagnosticIds.NestedProcedure);
    expect(d?.message).toBe('Cannot define a procedure inside procedure "a".');
    expect([d?.line, d?.column]).toEqual([2, 1]);
  });

  it('rejects a procedure opened inside a label body within a procedure', () => {
    const d = firstError('proc a\n.l:\n  cls\nproc b\nendp b\nendp a');
    expect(d?.id).toBe(DiagnosticIds.UnexpectedToken);
    expect([d?.line, d?.column]).toEqual([4, 1]);
  });

  it('rejects end of input inside a procedure', () => {
    const d = firstError('proc a\n cls');
    expect(d?.id).toBe(DiagnosticIds.UnexpectedEof);
    expect(d?.message).toBe('Unexpected end of input inside procedure "a"; expected "endp a".');
    expect([d?.line, d?.column]).toEqual([2, 5]);
  });

  it('rejects a sprite declared inside a procedure', () => {
    const d = firstError('proc a\nsprite s [1]\nendp a');
    expect(d?.id).toBe(DiagnosticIds.UnexpectedToken);
    expect(d?.message).toBe(
      'Unexpected "sprite" at 2:1; expected one of: "define", "config", "raw", instruction, ".", "endp".',
    );
  });

  it('rejects tokens that cannot start a statement', () => {
    const d = firstError('X 5');
    expect(d?.id).toBe(DiagnosticIds.UnexpectedToken);
    expect(d?.message).toBe(
      'Unexpected identifier "X" at 1:1; expected one of: "define", "config", "sprite", "raw", ".", "proc", instruction.',
    );
  });

  it('requires an operand after a comma', () => {
    const d = firstError('mov v0,');
    expect(d?.message).toBe(
      'Unexpected end of input at 1:8; expected one of: register, identifier, number, "@", "$", "#", "[".',
    );
  });

  it('requires a value after define and config', () => {
    expect(firstError('define X')?.message).toBe(
      'Unexpected end of input at 1:9; expected one of: number, "default".',
    );
    expect(firstError('config X 5')?.message).toBe('Unexpected number "5" at 1:10; expected one of: "=".');
  });

  it('requires an identifier after a sigil', () => {
    expect(firstError('jmp @5')?.message).toBe('Unexpected number "5" at 1:6; expected one of: identifier.');
    expect(firstError('ldi #v0')?.message).toBe(
      'Unexpected register "v0" at 1:6; expected one of: identifier.',
    );
  });

  it('requires a closing bracket on indirect operands', () => {
    expect(firstError('jmp [0x300')?.message).toBe('Unexpected end of input at 1:11; expected one of: "]".');
  });

  it('limits sprites to 15 rows', () => {
    const fifteen = Array.from({ length: 15 }, (_, i) => i).join(', ');
    expect(parse(`sprite s [${fifteen}]`).diagnostics).toEqual([]);

    const d = firstError(`sprite s [${fifteen}, 15]`);
    expect(d?.id).toBe(DiagnosticIds.SpriteTooLarge);
    expect(d?.message).toBe('Sprite "s" has too many rows (16 > 15).');
  });

  it('limits sprite rows to a byte', () => {
    const d = firstError('sprite s [1, 256]');
    expect(d?.id).toBe(DiagnosticIds.SpriteRowOutOfRange);
    expect(d?.message).toBe('Sprite "s" row 1 value 256 does not fit in a byte (0..255).');
    expect([d?.line, d?.column]).toEqual([1, 14]);
  });

  it('rejects an empty sprite', () => {
    expect(firstError('sprite s []')?.message).toBe('Unexpected "]" at 1:11; expected one of: number.');
  });

  it('accepts raw with a name', () => {
    const { program } = parse('raw(WORD)');
    expect(program?.statements[0]).toMatchObject({ kind: 'Raw', value: { kind: 'ImmName', name: 'WORD' } });
  });

  it('reports lexical errors before any parsing', () => {
    const d = firstError('endp endp 70000');
    expect(d?.id).toBe(DiagnosticIds.NumericConstantTooLarge);
  });
});
