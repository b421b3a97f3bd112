import type { StatementNode } from '../frontend/ast.js';

/**
 * Ordering rank of a statement kind. Higher ranks are laid out first.
 *
 * Declarations come first so their values are known before anything consumes them; sprites come
 * last so their rows are packed after all code.
 */
export function statementPriority(stmt: StatementNode): number {
  switch (stmt.kind) {
    case 'Config':
      return 3;
    case 'Define':
      return 2;
    case 'Label':
    case 'Procedure':
    case 'Raw':
    case 'Instruction':
      return 0;
    case 'Sprite':
      return -1;
  }
}

/**
 * Sort statements by descending priority, keeping source order among equal priorities.
 *
 * The source index is an explicit tiebreak, so the result does not depend on the stability of
 * `Array.prototype.sort`. Label and procedure bodies are ordered the same way, recursively.
 * The input is left untouched.
 */
export function orderStatements(statements: readonly StatementNode[]): StatementNode[] {
  return statements
    .map((stmt, index) => ({ stmt: orderNested(stmt), index, priority: statementPriority(stmt) }))
    .sort((a, b) => b.priority - a.priority || a.index - b.index)
    .map((entry) => entry.stmt);
}

function orderNested(stmt: StatementNode): StatementNode {
  if (stmt.kind === 'Label' || stmt.kind === 'Procedure') {
    return { ...stmt, body: orderStatements(stmt.body) };
  }
  return stmt;
}
