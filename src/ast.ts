import type { Token } from "./token.js";

/** Marks `var x;` declared without an initializer. Distinct from nil. */
export const UNASSIGNED: unique symbol = Symbol("unassigned");
export type Unassigned = typeof UNASSIGNED;

/** Runtime value space; `null` is nil. */
export type Value = number | string | boolean | null | Unassigned;

export type ExprType =
  | "Literal"
  | "Variable"
  | "Assign"
  | "Unary"
  | "Binary"
  | "Logical"
  | "Grouping";

export type StmtType =
  | "Expression"
  | "Print"
  | "Var"
  | "Block"
  | "If"
  | "While";

export interface Node<T extends ExprType | StmtType> {
  readonly type: T;
}

export type Expr =
  | Literal
  | Variable
  | Assign
  | Unary
  | Binary
  | Logical
  | Grouping;

export interface Literal extends Node<"Literal"> {
  readonly value: number | string | boolean | null;
}

export interface Variable extends Node<"Variable"> {
  readonly name: Token;
}

export interface Assign extends Node<"Assign"> {
  readonly name: Token;
  readonly value: Expr;
}

export interface Unary extends Node<"Unary"> {
  readonly op: Token;
  readonly argument: Expr;
}

export interface Binary extends Node<"Binary"> {
  readonly left: Expr;
  readonly op: Token;
  readonly right: Expr;
}

export interface Logical extends Node<"Logical"> {
  readonly left: Expr;
  readonly op: Token;
  readonly right: Expr;
}

export interface Grouping extends Node<"Grouping"> {
  readonly inner: Expr;
}

export type Stmt =
  | ExpressionStmt
  | Print
  | Var
  | Block
  | If
  | While;

export interface ExpressionStmt extends Node<"Expression"> {
  readonly expr: Expr;
}

export interface Print extends Node<"Print"> {
  readonly expr: Expr;
}

export interface Var extends Node<"Var"> {
  readonly name: Token;
  readonly initializer?: Expr;
}

export interface Block extends Node<"Block"> {
  readonly body: readonly Stmt[];
}

export interface If extends Node<"If"> {
  readonly cond: Expr;
  readonly body: Stmt;
  readonly else?: Stmt;
}

export interface While extends Node<"While"> {
  readonly cond: Expr;
  readonly body: Stmt;
}
