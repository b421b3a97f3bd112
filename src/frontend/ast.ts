/**
 * Frontend AST contracts.
 *
 * This module defines types only. Nested statement bodies are plain owned arrays; symbolic
 * references are stored as names and resolved through the symbol table, never by node pointers.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the file. */
  offset: number;
}

/**
 * Source span with inclusive start and exclusive end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * Parsed source file.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  path: string;
  statements: StatementNode[];
}

/**
 * Value of a `define`/`config`: a literal or the architecture default.
 */
export type DeclValue = number | 'default';

export interface DefineNode extends BaseNode {
  kind: 'Define';
  name: string;
  value: DeclValue;
}

export interface ConfigNode extends BaseNode {
  kind: 'Config';
  name: string;
  value: DeclValue;
}

export interface SpriteNode extends BaseNode {
  kind: 'Sprite';
  name: string;
  /** Row bytes, top to bottom. */
  rows: number[];
}

/**
 * A single word emitted verbatim.
 */
export interface RawNode extends BaseNode {
  kind: 'Raw';
  value: ImmValueNode;
}

export interface LabelNode extends BaseNode {
  kind: 'Label';
  name: string;
  body: StatementNode[];
}

export interface ProcedureNode extends BaseNode {
  kind: 'Procedure';
  name: string;
  /** Name given after `endp`; equal to `name` once parsed. */
  endName: string;
  body: StatementNode[];
}

export interface InstructionNode extends BaseNode {
  kind: 'Instruction';
  /** Lower-cased mnemonic. */
  mnemonic: string;
  operands: OperandNode[];
}

export type StatementNode =
  | DefineNode
  | ConfigNode
  | SpriteNode
  | RawNode
  | LabelNode
  | ProcedureNode
  | InstructionNode;

/**
 * Literal number or name of a `define`/`config`.
 */
export type ImmValueNode =
  | { kind: 'ImmLiteral'; span: SourceSpan; value: number }
  | { kind: 'ImmName'; span: SourceSpan; name: string };

export interface RegOperandNode extends BaseNode {
  kind: 'Reg';
  /** Lower-cased register name (`v0`..`vf`, `i`, `dt`, `st`). */
  name: string;
}

export interface ImmOperandNode extends BaseNode {
  kind: 'Imm';
  value: ImmValueNode;
}

export interface LabelRefNode extends BaseNode {
  kind: 'LabelRef';
  name: string;
}

export interface ProcRefNode extends BaseNode {
  kind: 'ProcRef';
  name: string;
}

export interface SpriteRefNode extends BaseNode {
  kind: 'SpriteRef';
  name: string;
}

/**
 * `[target]`: a memory reference through a literal address or a name.
 */
export interface IndirectNode extends BaseNode {
  kind: 'Indirect';
  target: ImmValueNode;
}

export type OperandNode =
  | RegOperandNode
  | ImmOperandNode
  | LabelRefNode
  | ProcRefNode
  | SpriteRefNode
  | IndirectNode;
