/**
 * Test utilities for IR lowering: AST builders and lowering harnesses.
 */

import type {
  ArrayLiteral,
  BlockStmt,
  Declaration,
  Expression,
  FunctionDecl,
  IfStmt,
  IntLiteral,
  MatchArm,
  Op,
  Program,
  Statement,
  TypeDecl,
  TypeNode,
} from "../../src/ast/nodes.ts";
import type { Diagnostic } from "../../src/errors/diagnostic.ts";
import { formatDiagnostics } from "../../src/errors/format.ts";
import { IrContext } from "../../src/ir/context.ts";
import type { FunId, IrExpr, IrFun, IrVar, TypeId, VarId } from "../../src/ir/ir-types.ts";
import { IrLowerer } from "../../src/ir/lowering.ts";
import { printIr } from "../../src/ir/printer.ts";
import { indexFromRaw } from "../../src/utils/arena.ts";
import { type FileId, SourceFiles, type Span, span } from "../../src/utils/source.ts";

const NOWHERE: Span = span(0, 0);

/** Give a node an explicit span. */
export function at<T extends { span: Span }>(node: T, start: number, end: number): T {
  return { ...node, span: span(start, end) };
}

// ─── Types ───────────────────────────────────────────────────────────────

export function named(name: string): TypeNode {
  return { kind: "NamedType", name, span: NOWHERE };
}

export function unitT(): TypeNode {
  return { kind: "UnitType", span: NOWHERE };
}

export function ptrT(pointee: TypeNode): TypeNode {
  return { kind: "PtrType", pointee, span: NOWHERE };
}

export function arrayT(element: TypeNode, length: number): TypeNode {
  return { kind: "ArrayType", element, length, span: NOWHERE };
}

export function structT(...fields: [TypeNode, string][]): TypeNode {
  return {
    kind: "StructTypeNode",
    fields: fields.map(([type, name]) => ({ kind: "StructField", name, type, span: NOWHERE })),
    span: NOWHERE,
  };
}

export function sumT(...variants: TypeNode[]): TypeNode {
  return { kind: "SumTypeNode", variants, span: NOWHERE };
}

export function funT(args: [TypeNode, string | null][], returnType: TypeNode): TypeNode {
  return {
    kind: "FunTypeNode",
    args: args.map(([type, name]) => ({ type, name })),
    returnType,
    span: NOWHERE,
  };
}

// ─── Expressions ─────────────────────────────────────────────────────────

export function int(value: number | bigint, suffix: IntLiteral["suffix"] = null): Expression {
  return { kind: "IntLiteral", value: BigInt(value), suffix, span: NOWHERE };
}

export function float(value: number, doublewide: boolean | null = null): Expression {
  return { kind: "FloatLiteral", value, doublewide, span: NOWHERE };
}

export function bool(value: boolean): Expression {
  return { kind: "BoolLiteral", value, span: NOWHERE };
}

export function unitLit(): Expression {
  return { kind: "UnitLiteral", span: NOWHERE };
}

export function ident(name: string): Expression {
  return { kind: "Identifier", name, span: NOWHERE };
}

export function bin(left: Expression, operator: Op, right: Expression): Expression {
  return { kind: "BinaryExpr", left, operator, right, span: NOWHERE };
}

export function unary(operator: Op, operand: Expression): Expression {
  return { kind: "UnaryExpr", operator, operand, span: NOWHERE };
}

export function call(callee: string | Expression, ...args: Expression[]): Expression {
  return {
    kind: "CallExpr",
    callee: typeof callee === "string" ? ident(callee) : callee,
    args,
    span: NOWHERE,
  };
}

export function member(object: Expression, property: string): Expression {
  return { kind: "MemberExpr", object, property, span: NOWHERE };
}

export function index(object: Expression, i: Expression): Expression {
  return { kind: "IndexExpr", object, index: i, span: NOWHERE };
}

export function cast(operand: Expression, targetType: TypeNode): Expression {
  return { kind: "CastExpr", operand, targetType, span: NOWHERE };
}

export function group(expression: Expression): Expression {
  return { kind: "GroupExpr", expression, span: NOWHERE };
}

export function structLit(name: string, fields: [string, Expression][]): Expression {
  return {
    kind: "StructLiteral",
    name,
    fields: fields.map(([fieldName, value]) => ({
      kind: "FieldInit",
      name: fieldName,
      value,
      span: NOWHERE,
    })),
    span: NOWHERE,
  };
}

export function arrayLit(...elements: Expression[]): ArrayLiteral {
  return { kind: "ArrayLiteral", elements, span: NOWHERE };
}

// ─── Statements ──────────────────────────────────────────────────────────

export function block(...statements: Statement[]): BlockStmt {
  return { kind: "BlockStmt", statements, span: NOWHERE };
}

export function letS(
  name: string,
  typeAnnotation: TypeNode | null,
  initializer: Expression | null
): Statement {
  return { kind: "LetStmt", name, typeAnnotation, initializer, span: NOWHERE };
}

export function assign(target: Expression, value: Expression): Statement {
  return { kind: "AssignStmt", target, value, span: NOWHERE };
}

export function exprS(expression: Expression): Statement {
  return { kind: "ExprStmt", expression, span: NOWHERE };
}

export function ret(value: Expression | null = null): Statement {
  return { kind: "ReturnStmt", value, span: NOWHERE };
}

export function ifS(
  condition: Expression,
  thenBody: Statement[],
  elseBody: Statement[] | IfStmt | null = null
): IfStmt {
  return {
    kind: "IfStmt",
    condition,
    thenBlock: block(...thenBody),
    elseBlock: elseBody === null ? null : Array.isArray(elseBody) ? block(...elseBody) : elseBody,
    span: NOWHERE,
  };
}

export function whileS(condition: Expression, body: Statement[]): Statement {
  return { kind: "WhileStmt", condition, body: block(...body), span: NOWHERE };
}

export function breakS(): Statement {
  return { kind: "BreakStmt", span: NOWHERE };
}

export function continueS(): Statement {
  return { kind: "ContinueStmt", span: NOWHERE };
}

export function arm(type: TypeNode, binding: string, body: Statement[]): MatchArm {
  return { kind: "MatchArm", type, binding, body: block(...body), span: NOWHERE };
}

export function matchS(
  subject: Expression,
  arms: MatchArm[],
  defaultBody: Statement[] | null = null
): Statement {
  return {
    kind: "MatchStmt",
    subject,
    arms,
    defaultBlock: defaultBody === null ? null : block(...defaultBody),
    span: NOWHERE,
  };
}

// ─── Declarations ────────────────────────────────────────────────────────

export function fn(
  name: string,
  params: [string, TypeNode][],
  returnType: TypeNode | null,
  body: Statement[] | null,
  flags: { isExtern?: boolean; isInline?: boolean } = {}
): FunctionDecl {
  return {
    kind: "FunctionDecl",
    name,
    params: params.map(([paramName, typeAnnotation]) => ({
      kind: "Param",
      name: paramName,
      typeAnnotation,
      span: NOWHERE,
    })),
    returnType,
    body: body === null ? null : block(...body),
    isExtern: flags.isExtern ?? false,
    isInline: flags.isInline ?? false,
    span: NOWHERE,
  };
}

export function typeDecl(name: string, type: TypeNode): TypeDecl {
  return { kind: "TypeDecl", name, type, span: NOWHERE };
}

export function program(file: FileId, ...declarations: Declaration[]): Program {
  return { kind: "Program", file, declarations, span: NOWHERE };
}

// ─── Lowering harnesses ──────────────────────────────────────────────────

export interface Lowered {
  ctx: IrContext;
  files: SourceFiles;
  file: FileId;
  funs: FunId[];
  diagnostics: Diagnostic[];
}

/** Lower declarations into a fresh context, keeping any diagnostics. */
export function lower(...declarations: Declaration[]): Lowered {
  const ctx = new IrContext();
  const files = new SourceFiles();
  const file = files.add("test.em", "");
  const lowerer = new IrLowerer(ctx, file);
  const funs = lowerer.lowerProgram(program(file, ...declarations));
  return { ctx, files, file, funs, diagnostics: lowerer.diagnostics };
}

/** Lower declarations that must produce no diagnostics. */
export function lowerOk(...declarations: Declaration[]): Lowered {
  const result = lower(...declarations);
  if (result.diagnostics.length > 0) {
    throw new Error(`Lowering errors:\n${formatDiagnostics(result.diagnostics, result.files)}`);
  }
  return result;
}

/** Lower and return the printed IR text. */
export function lowerAndPrint(...declarations: Declaration[]): string {
  const { ctx, funs } = lowerOk(...declarations);
  return printIr(ctx, funs);
}

export function funByName(lowered: Lowered, name: string): IrFun {
  const id = lowered.funs.find((f) => lowered.ctx.fun(f).name === name);
  if (id === undefined) {
    const available = lowered.funs.map((f) => lowered.ctx.fun(f).name).join(", ");
    throw new Error(`Function '${name}' not found. Available: ${available}`);
  }
  return lowered.ctx.fun(id);
}

export interface ExprHarness {
  ctx: IrContext;
  file: FileId;
  lowerer: IrLowerer;
  /** Locals declared for the expression, by name. */
  vars: Map<string, VarId>;
}

/**
 * A lowerer positioned inside a function scope: `declarations` are lowered
 * first, then each `[name, type]` local is declared.
 */
export function exprHarness(
  locals: [string, TypeNode][] = [],
  declarations: Declaration[] = []
): ExprHarness {
  const ctx = new IrContext();
  const files = new SourceFiles();
  const file = files.add("test.em", "");
  const lowerer = new IrLowerer(ctx, file);
  lowerer.lowerProgram(program(file, ...declarations));
  if (lowerer.diagnostics.length > 0) {
    throw new Error(`Lowering errors:\n${formatDiagnostics(lowerer.diagnostics, files)}`);
  }

  lowerer.pushScope();
  const vars = new Map<string, VarId>();
  for (const [name, type] of locals) {
    const ty = lowerer.lowerTypeNode(type);
    if (!ty.ok) throw new Error(ty.error.message);
    vars.set(name, lowerer.declareVar(name, ty.value));
  }
  return { ctx, file, lowerer, vars };
}

/** An already-lowered operand of type `ty` at `start..end`. */
export function operand(ty: TypeId, start = 0, end = 0): IrExpr {
  return { kind: "var", var: indexFromRaw<IrVar>(0), span: span(start, end), ty };
}
