import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  ConfigNode,
  DefineNode,
  ImmValueNode,
  OperandNode,
  ProgramNode,
  SourceSpan,
  StatementNode,
} from '../frontend/ast.js';
import { formatPosition } from '../frontend/source.js';
import { archDefault } from '../chip8/arch.js';

export type SymbolKind = 'define' | 'config' | 'label' | 'procedure' | 'sprite';

/**
 * A declared name. Constant categories carry their resolved value; address categories get their
 * address later, from layout.
 */
export type SymbolInfo =
  | { kind: 'define' | 'config'; name: string; span: SourceSpan; value: number }
  | { kind: 'label' | 'procedure' | 'sprite'; name: string; span: SourceSpan };

/**
 * Every declared name in a program. Names are unique across all categories.
 */
export interface SymbolTable {
  symbols: Map<string, SymbolInfo>;
}

type ReferenceContext = 'label' | 'procedure' | 'sprite' | 'constant' | 'address';

const ACCEPTED: Record<ReferenceContext, readonly SymbolKind[]> = {
  label: ['label'],
  procedure: ['procedure'],
  sprite: ['sprite'],
  constant: ['define', 'config'],
  address: ['define', 'config', 'label', 'procedure'],
};

const EXPECTED_TEXT: Record<ReferenceContext, string> = {
  label: 'a label',
  procedure: 'a procedure',
  sprite: 'a sprite',
  constant: 'a define or config',
  address: 'a define, config, label or procedure',
};

class SanitizeFailure extends Error {
  constructor(
    readonly id: DiagnosticId,
    message: string,
    readonly where: SourceSpan,
  ) {
    super(message);
  }
}

function declaredName(stmt: StatementNode): { kind: SymbolKind; name: string } | undefined {
  switch (stmt.kind) {
    case 'Define':
      return { kind: 'define', name: stmt.name };
    case 'Config':
      return { kind: 'config', name: stmt.name };
    case 'Sprite':
      return { kind: 'sprite', name: stmt.name };
    case 'Label':
      return { kind: 'label', name: stmt.name };
    case 'Procedure':
      return { kind: 'procedure', name: stmt.name };
    case 'Raw':
    case 'Instruction':
      return undefined;
  }
}

function resolveDeclValue(stmt: DefineNode | ConfigNode, failures: SanitizeFailure[]): number {
  if (stmt.value !== 'default') return stmt.value;
  const fallback = archDefault(stmt.name);
  if (fallback === undefined) {
    failures.push(
      new SanitizeFailure(
        DiagnosticIds.NoDefaultValue,
        `No architecture default exists for ${stmt.kind.toLowerCase()} "${stmt.name}".`,
        stmt.span,
      ),
    );
    return 0;
  }
  return fallback;
}

// A failed declaration does not stop collection: later names must still be known so that
// references before the failure are judged against the whole program.
function collectDeclarations(
  statements: StatementNode[],
  table: SymbolTable,
  failures: SanitizeFailure[],
): void {
  for (const stmt of statements) {
    const decl = declaredName(stmt);
    const prev = decl ? table.symbols.get(decl.name) : undefined;
    if (decl && prev) {
      failures.push(
        new SanitizeFailure(
          DiagnosticIds.SymbolConflict,
          `Symbol "${decl.name}" declared as ${decl.kind} conflicts with ${prev.kind} declared at ${formatPosition(prev.span)}.`,
          stmt.span,
        ),
      );
    } else if (stmt.kind === 'Define' || stmt.kind === 'Config') {
      table.symbols.set(stmt.name, {
        kind: stmt.kind === 'Define' ? 'define' : 'config',
        name: stmt.name,
        span: stmt.span,
        value: resolveDeclValue(stmt, failures),
      });
    } else if (decl && (decl.kind === 'label' || decl.kind === 'procedure' || decl.kind === 'sprite')) {
      table.symbols.set(decl.name, { kind: decl.kind, name: decl.name, span: stmt.span });
    }
    if (stmt.kind === 'Label' || stmt.kind === 'Procedure') {
      collectDeclarations(stmt.body, table, failures);
    }
  }
}

function checkReference(
  table: SymbolTable,
  name: string,
  context: ReferenceContext,
  where: SourceSpan,
): void {
  const sym = table.symbols.get(name);
  if (!sym) {
    throw new SanitizeFailure(
      DiagnosticIds.UndefinedSymbol,
      `Undefined symbol "${name}"; expected ${EXPECTED_TEXT[context]}.`,
      where,
    );
  }
  if (!ACCEPTED[context].includes(sym.kind)) {
    throw new SanitizeFailure(
      DiagnosticIds.SymbolKindMismatch,
      `Symbol "${name}" is a ${sym.kind}, expected ${EXPECTED_TEXT[context]}.`,
      where,
    );
  }
}

function checkImmValue(table: SymbolTable, value: ImmValueNode, context: ReferenceContext): void {
  if (value.kind === 'ImmName') checkReference(table, value.name, context, value.span);
}

function checkOperand(table: SymbolTable, op: OperandNode): void {
  switch (op.kind) {
    case 'Reg':
      return;
    case 'Imm':
      checkImmValue(table, op.value, 'constant');
      return;
    case 'LabelRef':
      checkReference(table, op.name, 'label', op.span);
      return;
    case 'ProcRef':
      checkReference(table, op.name, 'procedure', op.span);
      return;
    case 'SpriteRef':
      checkReference(table, op.name, 'sprite', op.span);
      return;
    case 'Indirect':
      checkImmValue(table, op.target, 'address');
      return;
  }
}

function checkReferences(statements: StatementNode[], table: SymbolTable): void {
  for (const stmt of statements) {
    switch (stmt.kind) {
      case 'Raw':
        checkImmValue(table, stmt.value, 'constant');
        break;
      case 'Instruction':
        for (const op of stmt.operands) checkOperand(table, op);
        break;
      case 'Label':
      case 'Procedure':
        checkReferences(stmt.body, table);
        break;
      case 'Define':
      case 'Config':
      case 'Sprite':
        break;
    }
  }
}

function earliest(failures: SanitizeFailure[]): SanitizeFailure | undefined {
  let first: SanitizeFailure | undefined;
  for (const f of failures) {
    if (!first || f.where.start.offset < first.where.start.offset) first = f;
  }
  return first;
}

/**
 * Validate every declaration and reference in `program` and build its symbol table.
 *
 * Runs in two passes (declarations, then references), so names may be used before the statement
 * that declares them. Addresses are not assigned here. When anything is wrong, the error that
 * comes first in the source is pushed and `undefined` is returned.
 */
export function sanitize(program: ProgramNode, diagnostics: Diagnostic[]): SymbolTable | undefined {
  const table: SymbolTable = { symbols: new Map() };
  const failures: SanitizeFailure[] = [];
  collectDeclarations(program.statements, table, failures);
  try {
    checkReferences(program.statements, table);
  } catch (err) {
    if (!(err instanceof SanitizeFailure)) throw err;
    failures.push(err);
  }

  const failure = earliest(failures);
  if (!failure) return table;
  diagnostics.push({
    id: failure.id,
    severity: 'error',
    message: failure.message,
    file: failure.where.file,
    line: failure.where.start.line,
    column: failure.where.start.column,
  });
  return undefined;
}

/**
 * Resolved value of a `define`/`config` name, if it is one.
 */
export function constantValue(table: SymbolTable, name: string): number | undefined {
  const sym = table.symbols.get(name);
  return sym && (sym.kind === 'define' || sym.kind === 'config') ? sym.value : undefined;
}
