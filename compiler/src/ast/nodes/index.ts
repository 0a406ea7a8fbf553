export type { BaseNode } from "./base.ts";

export { Op } from "./operators.ts";

export type {
  NamedType,
  UnitType,
  PtrType,
  ArrayType,
  StructFieldNode,
  StructTypeNode,
  SumTypeNode,
  FunTypeArg,
  FunTypeNode,
  TypeNode,
} from "./types.ts";

export type {
  BinaryExpr,
  UnaryExpr,
  CallExpr,
  MemberExpr,
  IndexExpr,
  CastExpr,
  GroupExpr,
  Identifier,
  IntLiteral,
  FloatLiteral,
  BoolLiteral,
  UnitLiteral,
  FieldInit,
  StructLiteral,
  ArrayLiteral,
  Expression,
} from "./expressions.ts";

export type {
  BlockStmt,
  LetStmt,
  AssignStmt,
  ExprStmt,
  ReturnStmt,
  IfStmt,
  WhileStmt,
  BreakStmt,
  ContinueStmt,
  MatchArm,
  MatchStmt,
  Statement,
} from "./statements.ts";

export type { Param, FunctionDecl, TypeDecl, Declaration } from "./declarations.ts";

export type { Program } from "./program.ts";
