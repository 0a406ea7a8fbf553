/**
 * Statement lowering methods for IrLowerer.
 * Extracted from lowering.ts for modularity.
 */

import {
  type AssignStmt,
  type BlockStmt,
  type BreakStmt,
  type ContinueStmt,
  type Expression,
  type ExprStmt,
  type IfStmt,
  type LetStmt,
  type ReturnStmt,
  type Statement,
  type WhileStmt,
  Op,
} from "../ast/nodes.ts";
import {
  DiagnosticCode,
  errorDiagnostic,
  primaryLabel,
  secondaryLabel,
} from "../errors/diagnostic.ts";
import { IrInvariantError } from "../errors/invariant.ts";
import { IrContext } from "./context.ts";
import type { IrExpr, TypeId } from "./ir-types.ts";
import { invalidExpr, typesAgree } from "./lowering-expr.ts";
import type { IrLowerer } from "./lowering.ts";

/** Whether an IR expression denotes a storage location that `write` may target. */
function isPlace(ctx: IrContext, expr: IrExpr): boolean {
  switch (expr.kind) {
    case "var":
      return true;
    case "unary":
      return expr.op === Op.Star;
    case "member":
      return isPlace(ctx, expr.object);
    case "index":
      return ctx.resolved(expr.object.ty).kind === "ptr" || isPlace(ctx, expr.object);
    default:
      return false;
  }
}

// ─── Blocks ──────────────────────────────────────────────────────────────

export function lowerBlock(this: IrLowerer, block: BlockStmt): void {
  for (const stmt of block.statements) {
    this.lowerStatement(stmt);
  }
}

/** Lower a block that introduces its own scope. */
export function lowerScopedBlock(this: IrLowerer, block: BlockStmt): void {
  this.pushScope();
  this.lowerBlock(block);
  this.popScope();
}

export function lowerStatement(this: IrLowerer, stmt: Statement): void {
  // Unreachable: the current block already ended.
  if (this.isBlockTerminated()) return;

  switch (stmt.kind) {
    case "BlockStmt":
      this.lowerScopedBlock(stmt);
      break;
    case "LetStmt":
      this.lowerLetStmt(stmt);
      break;
    case "AssignStmt":
      this.lowerAssignStmt(stmt);
      break;
    case "ExprStmt":
      this.lowerExprStmt(stmt);
      break;
    case "ReturnStmt":
      this.lowerReturnStmt(stmt);
      break;
    case "IfStmt":
      this.lowerIfStmt(stmt);
      break;
    case "WhileStmt":
      this.lowerWhileStmt(stmt);
      break;
    case "BreakStmt":
    case "ContinueStmt":
      this.lowerLoopExit(stmt);
      break;
    case "MatchStmt":
      this.lowerMatchStmt(stmt);
      break;
  }
}

// ─── Variables ───────────────────────────────────────────────────────────

export function lowerLetStmt(this: IrLowerer, stmt: LetStmt): void {
  let declared: TypeId | null = null;
  if (stmt.typeAnnotation !== null) {
    const ty = this.lowerTypeNode(stmt.typeAnnotation);
    if (ty.ok) {
      declared = ty.value;
    } else {
      this.report(ty.error);
      declared = IrContext.INVALID;
    }
  }

  // The initializer is lowered before the new variable is in scope.
  let init: IrExpr | null = null;
  if (stmt.initializer !== null) {
    const value = this.lowerExpr(stmt.initializer);
    if (value.ok) {
      init = value.value;
    } else {
      this.report(value.error);
      init = invalidExpr(stmt.initializer.span);
    }
  }

  if (declared === null && init === null) {
    this.report(
      errorDiagnostic(
        DiagnosticCode.MissingType,
        `Variable '${stmt.name}' needs a type annotation or an initializer`,
        [primaryLabel(this.file, stmt.span)]
      )
    );
  }

  if (declared !== null && init !== null && !typesAgree(this.ctx, declared, init.ty)) {
    const labels = [primaryLabel(this.file, init.span)];
    if (stmt.typeAnnotation !== null) {
      labels.push(secondaryLabel(this.file, stmt.typeAnnotation.span, "declared type"));
    }
    this.report(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Variable '${stmt.name}' is declared as ${this.ctx.typename(declared)} but initialized with a value of type ${this.ctx.typename(init.ty)}`,
        labels
      )
    );
    init = null;
  }

  const ty = declared ?? init?.ty ?? IrContext.INVALID;
  const varId = this.declareVar(stmt.name, ty);
  if (init !== null) {
    this.appendStmt({ kind: "store", var: varId, val: init });
  }
}

export function lowerAssignStmt(this: IrLowerer, stmt: AssignStmt): void {
  const value = this.lowerExpr(stmt.value);
  if (!value.ok) {
    this.report(value.error);
    return;
  }

  if (stmt.target.kind === "Identifier") {
    const varId = this.lookupVar(stmt.target.name);
    if (varId === null) {
      const isFunction = this.funNames.has(stmt.target.name);
      this.report(
        errorDiagnostic(
          isFunction ? DiagnosticCode.InvalidAssignment : DiagnosticCode.UnknownIdentifier,
          isFunction
            ? `Cannot assign to function '${stmt.target.name}'`
            : `Unknown identifier '${stmt.target.name}'`,
          [primaryLabel(this.file, stmt.target.span)]
        )
      );
      return;
    }

    const varTy = this.ctx.var(varId).ty;
    if (!typesAgree(this.ctx, varTy, value.value.ty)) {
      this.report(
        errorDiagnostic(
          DiagnosticCode.TypeMismatch,
          `Cannot assign a value of type ${this.ctx.typename(value.value.ty)} to '${stmt.target.name}' of type ${this.ctx.typename(varTy)}`,
          [primaryLabel(this.file, value.value.span)]
        )
      );
      return;
    }
    this.appendStmt({ kind: "store", var: varId, val: value.value });
    return;
  }

  const place = this.lowerExpr(stmt.target);
  if (!place.ok) {
    this.report(place.error);
    return;
  }
  if (place.value.ty === IrContext.INVALID) return;

  if (!isPlace(this.ctx, place.value)) {
    this.report(
      errorDiagnostic(DiagnosticCode.InvalidAssignment, "Left side of assignment is not assignable", [
        primaryLabel(this.file, stmt.target.span),
      ])
    );
    return;
  }

  if (!typesAgree(this.ctx, place.value.ty, value.value.ty)) {
    this.report(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Cannot assign a value of type ${this.ctx.typename(value.value.ty)} to a place of type ${this.ctx.typename(place.value.ty)}`,
        [
          primaryLabel(this.file, value.value.span),
          secondaryLabel(this.file, place.value.span, "assigned place"),
        ]
      )
    );
    return;
  }

  this.appendStmt({ kind: "write", place: place.value, val: value.value });
}

export function lowerExprStmt(this: IrLowerer, stmt: ExprStmt): void {
  const expr = this.lowerExpr(stmt.expression);
  if (!expr.ok) {
    this.report(expr.error);
    return;
  }
  this.appendStmt({ kind: "eval", expr: expr.value });
}

// ─── Control flow ────────────────────────────────────────────────────────

export function lowerReturnStmt(this: IrLowerer, stmt: ReturnStmt): void {
  if (this.currentFun === null) {
    throw new IrInvariantError("return lowered outside a function");
  }
  const fun = this.ctx.fun(this.currentFun);
  const expected = fun.ty.returnTy;

  let value: IrExpr;
  if (stmt.value === null) {
    value = { kind: "unit", span: stmt.span, ty: IrContext.UNIT };
  } else {
    const lowered = this.lowerExpr(stmt.value);
    if (lowered.ok) {
      value = lowered.value;
    } else {
      this.report(lowered.error);
      value = invalidExpr(stmt.value.span);
    }
  }

  if (!typesAgree(this.ctx, expected, value.ty)) {
    this.report(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Function '${fun.name}' returns ${this.ctx.typename(expected)} but this value has type ${this.ctx.typename(value.ty)}`,
        [primaryLabel(this.file, value.span)]
      )
    );
    value = invalidExpr(value.span);
  }

  this.setTerminator({ kind: "return", value });
}

/** Lower a branch condition; it must be a bool or an integer. */
export function lowerCondition(this: IrLowerer, expr: Expression): IrExpr {
  const cond = this.lowerExpr(expr);
  if (!cond.ok) {
    this.report(cond.error);
    return invalidExpr(expr.span);
  }

  const kind = this.ctx.resolved(cond.value.ty).kind;
  if (kind !== "bool" && kind !== "integer" && kind !== "invalid") {
    this.report(
      errorDiagnostic(
        DiagnosticCode.TypeMismatch,
        `Condition must be bool or an integer, found ${this.ctx.typename(cond.value.ty)}`,
        [primaryLabel(this.file, cond.value.span)]
      )
    );
    return invalidExpr(cond.value.span);
  }
  return cond.value;
}

export function lowerIfStmt(this: IrLowerer, stmt: IfStmt): void {
  const condition = this.lowerCondition(stmt.condition);

  const thenBB = this.newBlock();
  const elseBB = stmt.elseBlock !== null ? this.newBlock() : null;
  const endBB = this.newBlock();

  this.setTerminator({ kind: "jmp_if", condition, ifTrue: thenBB, ifFalse: elseBB ?? endBB });

  this.startBlock(thenBB);
  this.lowerScopedBlock(stmt.thenBlock);
  this.jumpIfOpen(endBB);

  if (stmt.elseBlock !== null && elseBB !== null) {
    this.startBlock(elseBB);
    if (stmt.elseBlock.kind === "IfStmt") {
      this.lowerIfStmt(stmt.elseBlock);
    } else {
      this.lowerScopedBlock(stmt.elseBlock);
    }
    this.jumpIfOpen(endBB);
  }

  this.startBlock(endBB);
}

export function lowerWhileStmt(this: IrLowerer, stmt: WhileStmt): void {
  const headerBB = this.newBlock();
  const bodyBB = this.newBlock();
  const endBB = this.newBlock();

  this.setTerminator({ kind: "jmp", target: headerBB });

  this.startBlock(headerBB);
  const condition = this.lowerCondition(stmt.condition);
  this.setTerminator({ kind: "jmp_if", condition, ifTrue: bodyBB, ifFalse: endBB });

  this.startBlock(bodyBB);
  this.loopStack.push({ breakTo: endBB, continueTo: headerBB });
  this.lowerScopedBlock(stmt.body);
  this.loopStack.pop();
  this.jumpIfOpen(headerBB);

  this.startBlock(endBB);
}

export function lowerLoopExit(this: IrLowerer, stmt: BreakStmt | ContinueStmt): void {
  const keyword = stmt.kind === "BreakStmt" ? "break" : "continue";
  const loop = this.loopStack.at(-1);
  if (loop === undefined) {
    this.report(
      errorDiagnostic(DiagnosticCode.InvalidControlFlow, `'${keyword}' outside of a loop`, [
        primaryLabel(this.file, stmt.span),
      ])
    );
    return;
  }
  this.setTerminator({
    kind: "jmp",
    target: stmt.kind === "BreakStmt" ? loop.breakTo : loop.continueTo,
  });
}
