import type { BaseNode } from "./base.ts";
import type { Expression } from "./expressions.ts";
import type { TypeNode } from "./types.ts";

/** Braced block of statements `{ ... }`. */
export interface BlockStmt extends BaseNode {
  kind: "BlockStmt";
  statements: Statement[];
}

/** Variable declaration (`let x: T = expr;`). At least one of type and initializer is present. */
export interface LetStmt extends BaseNode {
  kind: "LetStmt";
  name: string;
  typeAnnotation: TypeNode | null;
  initializer: Expression | null;
}

/** Assignment to a variable or another place (`x = v;`, `*p = v;`, `s.f = v;`). */
export interface AssignStmt extends BaseNode {
  kind: "AssignStmt";
  target: Expression;
  value: Expression;
}

/** Expression evaluated for its side effects. */
export interface ExprStmt extends BaseNode {
  kind: "ExprStmt";
  expression: Expression;
}

/** Return from the enclosing function, optionally with a value. */
export interface ReturnStmt extends BaseNode {
  kind: "ReturnStmt";
  value: Expression | null;
}

/** If statement with optional else/else-if chain. */
export interface IfStmt extends BaseNode {
  kind: "IfStmt";
  condition: Expression;
  thenBlock: BlockStmt;
  /** `null` for no else, `BlockStmt` for else, `IfStmt` for else-if. */
  elseBlock: BlockStmt | IfStmt | null;
}

export interface WhileStmt extends BaseNode {
  kind: "WhileStmt";
  condition: Expression;
  body: BlockStmt;
}

export interface BreakStmt extends BaseNode {
  kind: "BreakStmt";
}

export interface ContinueStmt extends BaseNode {
  kind: "ContinueStmt";
}

/** One arm of a match: `T name => { ... }`. */
export interface MatchArm extends BaseNode {
  kind: "MatchArm";
  type: TypeNode;
  binding: string;
  body: BlockStmt;
}

/** Dispatch on the active variant of a sum value. */
export interface MatchStmt extends BaseNode {
  kind: "MatchStmt";
  subject: Expression;
  arms: MatchArm[];
  /** Taken when no arm matches; `null` falls through to the statement after the match. */
  defaultBlock: BlockStmt | null;
}

export type Statement =
  | BlockStmt
  | LetStmt
  | AssignStmt
  | ExprStmt
  | ReturnStmt
  | IfStmt
  | WhileStmt
  | BreakStmt
  | ContinueStmt
  | MatchStmt;
