/**
 * Declaration lowering methods for IrLowerer.
 * Extracted from lowering.ts for modularity.
 */

import type { BlockStmt, FunctionDecl, TypeDecl } from "../ast/nodes.ts";
import { DiagnosticCode, errorDiagnostic, primaryLabel } from "../errors/diagnostic.ts";
import { IrInvariantError } from "../errors/invariant.ts";
import { buildCfg } from "./cfg.ts";
import { IrContext } from "./context.ts";
import type { FunId, IrAliasType, IrFunArg, IrFunType, TypeId } from "./ir-types.ts";
import { invalidExpr } from "./lowering-expr.ts";
import { BUILTIN_TYPES } from "./lowering-types.ts";
import type { IrLowerer } from "./lowering.ts";
import { validateFunction } from "./validate.ts";

// ─── Type declarations ───────────────────────────────────────────────────

/**
 * Register the alias a type declaration introduces. Its underlying type is
 * filled in by `resolveTypeDecl` once every name is known.
 */
export function declareTypeName(this: IrLowerer, decl: TypeDecl): TypeId | null {
  const placeholder: IrAliasType = { kind: "alias", name: decl.name, underlying: IrContext.INVALID };
  if (BUILTIN_TYPES.has(decl.name) || this.typeNames.has(decl.name)) {
    this.report(
      errorDiagnostic(
        DiagnosticCode.DuplicateDefinition,
        `Type '${decl.name}' is already defined`,
        [primaryLabel(this.file, decl.span)]
      )
    );
    return null;
  }

  // One alias per declaration: other programs sharing the context may
  // declare the same name.
  const id = this.ctx.types.append(placeholder);
  this.typeNames.set(decl.name, id);
  return id;
}

export function resolveTypeDecl(this: IrLowerer, decl: TypeDecl, alias: TypeId): void {
  const underlying = this.lowerTypeNode(decl.type);
  if (!underlying.ok) this.report(underlying.error);
  setUnderlying(this.ctx, alias, underlying.ok ? underlying.value : IrContext.INVALID);
}

/**
 * Reject aliases that contain themselves by value. A self-reference is only
 * finite when the path to it passes through both a struct or sum and a pointer.
 */
export function checkRecursiveAlias(this: IrLowerer, decl: TypeDecl, alias: TypeId): void {
  const ctx = this.ctx;
  const seen = new Set<string>();

  const reachesUnboxed = (ty: TypeId, inAggregate: boolean, behindPtr: boolean): boolean => {
    if (ty === alias) return !(inAggregate && behindPtr);
    const key = `${ty}:${inAggregate}:${behindPtr}`;
    if (seen.has(key)) return false;
    seen.add(key);

    const t = ctx.type(ty);
    switch (t.kind) {
      case "alias":
        return reachesUnboxed(t.underlying, inAggregate, behindPtr);
      case "ptr":
        return reachesUnboxed(t.pointee, inAggregate, true);
      case "array":
        return reachesUnboxed(t.element, inAggregate, behindPtr);
      case "struct":
        return t.fields.some((f) => reachesUnboxed(f.ty, true, behindPtr));
      case "sum":
        return t.variants.some((v) => reachesUnboxed(v, true, behindPtr));
      case "fun":
        return (
          t.args.some((a) => reachesUnboxed(a.ty, inAggregate, behindPtr)) ||
          reachesUnboxed(t.returnTy, inAggregate, behindPtr)
        );
      default:
        return false;
    }
  };

  const aliasTy = ctx.type(alias);
  if (aliasTy.kind !== "alias") {
    throw new IrInvariantError(`type ${alias} is not an alias`);
  }
  if (reachesUnboxed(aliasTy.underlying, false, false)) {
    this.report(
      errorDiagnostic(
        DiagnosticCode.RecursiveType,
        `Type '${decl.name}' refers to itself without indirection`,
        [primaryLabel(this.file, decl.span)],
        ["a recursive type must reach itself through a struct or sum field of pointer type"]
      )
    );
    setUnderlying(ctx, alias, IrContext.INVALID);
  }
}

/**
 * Fill in an alias created by `declareTypeName`. Only the declaration passes
 * of `lowerProgram` call this, before any function body is lowered; the alias
 * is fixed from then on.
 */
function setUnderlying(ctx: IrContext, alias: TypeId, underlying: TypeId): void {
  const ty = ctx.type(alias);
  if (ty.kind !== "alias") {
    throw new IrInvariantError(`type ${alias} is not an alias`);
  }
  ty.underlying = underlying;
}

// ─── Functions ───────────────────────────────────────────────────────────

/** Declare a function's signature. Returns null when it cannot be declared. */
export function declareFunction(this: IrLowerer, decl: FunctionDecl): FunId | null {
  if (this.funNames.has(decl.name)) {
    this.report(
      errorDiagnostic(
        DiagnosticCode.DuplicateDefinition,
        `Function '${decl.name}' is already defined`,
        [primaryLabel(this.file, decl.span)]
      )
    );
    return null;
  }

  if (decl.isExtern && decl.body !== null) {
    this.report(
      errorDiagnostic(
        DiagnosticCode.InvalidDeclaration,
        `Extern function '${decl.name}' cannot have a body`,
        [primaryLabel(this.file, decl.span)]
      )
    );
  }

  const args: IrFunArg[] = [];
  for (const param of decl.params) {
    if (args.some((a) => a.name === param.name)) {
      this.report(
        errorDiagnostic(
          DiagnosticCode.InvalidDeclaration,
          `Parameter '${param.name}' is declared more than once`,
          [primaryLabel(this.file, param.span)]
        )
      );
    }
    const ty = this.lowerTypeNode(param.typeAnnotation);
    if (!ty.ok) this.report(ty.error);
    args.push({ ty: ty.ok ? ty.value : IrContext.INVALID, name: param.name });
  }

  let returnTy = IrContext.UNIT;
  if (decl.returnType !== null) {
    const ty = this.lowerTypeNode(decl.returnType);
    if (!ty.ok) this.report(ty.error);
    returnTy = ty.ok ? ty.value : IrContext.INVALID;
  }

  const ty: IrFunType = { kind: "fun", args, returnTy };
  this.ctx.types.insert(ty);
  const id = this.ctx.funs.insert({
    name: decl.name,
    ty,
    file: this.file,
    span: decl.span,
    body: null,
    flags: { isExtern: decl.isExtern, isInline: decl.isInline },
  });
  this.funNames.set(decl.name, id);
  return id;
}

/** Lower the body of a declared function, then verify the result. */
export function lowerFunctionBody(
  this: IrLowerer,
  funId: FunId,
  decl: FunctionDecl,
  body: BlockStmt
): void {
  const fun = this.ctx.fun(funId);

  this.currentFun = funId;
  this.scopes = [];
  this.loopStack = [];

  const entry = this.newBlock();
  this.startBlock(entry);
  this.pushScope();

  fun.ty.args.forEach((arg, index) => {
    const param = decl.params[index];
    const varId = this.declareVar(arg.name ?? `arg${index}`, arg.ty);
    this.appendStmt({
      kind: "store",
      var: varId,
      val: { kind: "arg", index, span: param.span, ty: arg.ty },
    });
  });

  this.lowerBlock(body);

  if (!this.isBlockTerminated()) {
    const end = { start: body.span.end, end: body.span.end };
    if (fun.ty.returnTy === IrContext.UNIT) {
      this.setTerminator({ kind: "return", value: { kind: "unit", span: end, ty: IrContext.UNIT } });
    } else {
      // The open block may be a join that every branch returned before.
      const reachable = buildCfg(this.ctx, { entry, parent: funId }).blockOrder;
      if (this.currentBB !== null && reachable.includes(this.currentBB)) {
        this.report(
          errorDiagnostic(
            DiagnosticCode.MissingReturn,
            `Function '${fun.name}' must return a value of type ${this.ctx.typename(fun.ty.returnTy)} on every path`,
            [primaryLabel(this.file, decl.span)]
          )
        );
      }
      this.setTerminator({ kind: "return", value: invalidExpr(end) });
    }
  }

  this.popScope();
  fun.body = { entry, parent: funId };

  this.currentFun = null;
  this.currentBB = null;

  validateFunction(this.ctx, funId);
}
