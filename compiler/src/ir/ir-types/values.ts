import type { Op } from "../../ast/nodes.ts";
import type { Span } from "../../utils/source.ts";
import type { DiscriminantId, FunId, TypeId, VarId } from "./identifiers.ts";

// ─── Expressions ─────────────────────────────────────────────────────────────

/** Fields shared by every IR expression: where it came from and its resolved type. */
interface IrExprBase {
  span: Span;
  ty: TypeId;
}

/** Binary operation on two typed operands. */
export interface IrBinaryExpr extends IrExprBase {
  kind: "binary";
  lhs: IrExpr;
  op: Op;
  rhs: IrExpr;
}

/** Unary operation: dereference, address-of, negation or complement. */
export interface IrUnaryExpr extends IrExprBase {
  kind: "unary";
  op: Op;
  operand: IrExpr;
}

export interface IrIntegerLiteral extends IrExprBase {
  kind: "integer";
  value: bigint;
}

export interface IrFloatLiteral extends IrExprBase {
  kind: "float";
  value: number;
}

export interface IrBoolLiteral extends IrExprBase {
  kind: "bool";
  value: boolean;
}

export interface IrUnitLiteral extends IrExprBase {
  kind: "unit";
}

/** Read of a local variable. */
export interface IrVarExpr extends IrExprBase {
  kind: "var";
  var: VarId;
}

/** The value passed for the enclosing function's `index`-th parameter. */
export interface IrArgExpr extends IrExprBase {
  kind: "arg";
  index: number;
}

/** Reference to a function by handle. */
export interface IrFunRef extends IrExprBase {
  kind: "fun";
  fun: FunId;
}

export interface IrCallExpr extends IrExprBase {
  kind: "call";
  callee: IrExpr;
  args: IrExpr[];
}

/** Struct field access; `field` indexes the struct's field list. */
export interface IrMemberExpr extends IrExprBase {
  kind: "member";
  object: IrExpr;
  field: number;
}

/** Element access on an array or through a pointer. */
export interface IrIndexExpr extends IrExprBase {
  kind: "index";
  object: IrExpr;
  index: IrExpr;
}

/** Conversion of `operand` to `ty`. */
export interface IrCastExpr extends IrExprBase {
  kind: "cast";
  operand: IrExpr;
}

/** The payload of a sum value whose active variant is `discriminant`. */
export interface IrPayloadExpr extends IrExprBase {
  kind: "payload";
  value: IrExpr;
  discriminant: DiscriminantId;
}

/** Struct value; `fields` follow the struct's declaration order. */
export interface IrStructLiteral extends IrExprBase {
  kind: "struct_literal";
  fields: IrExpr[];
}

export interface IrArrayLiteral extends IrExprBase {
  kind: "array_literal";
  elements: IrExpr[];
}

/** Placeholder for an expression that failed to lower. Always typed `INVALID`. */
export interface IrInvalidExpr extends IrExprBase {
  kind: "invalid";
}

export type IrExpr =
  | IrBinaryExpr
  | IrUnaryExpr
  | IrIntegerLiteral
  | IrFloatLiteral
  | IrBoolLiteral
  | IrUnitLiteral
  | IrVarExpr
  | IrArgExpr
  | IrFunRef
  | IrCallExpr
  | IrMemberExpr
  | IrIndexExpr
  | IrCastExpr
  | IrPayloadExpr
  | IrStructLiteral
  | IrArrayLiteral
  | IrInvalidExpr;

/** Any value a statement or terminator consumes. */
export type IrAnyValue = IrExpr;
