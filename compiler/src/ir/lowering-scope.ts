/**
 * Variable scope methods for IrLowerer.
 * Extracted from lowering.ts for modularity.
 */

import { IrInvariantError } from "../errors/invariant.ts";
import type { TypeId, VarId } from "./ir-types.ts";
import type { IrLowerer } from "./lowering.ts";

export function pushScope(this: IrLowerer): void {
  this.scopes.push(new Map());
}

export function popScope(this: IrLowerer): void {
  if (this.scopes.pop() === undefined) {
    throw new IrInvariantError("scope stack underflow");
  }
}

/**
 * Declare a new variable in the innermost scope, shadowing any earlier one
 * of the same name, and mark it live in the current block.
 */
export function declareVar(this: IrLowerer, name: string, ty: TypeId): VarId {
  const scope = this.scopes.at(-1);
  if (scope === undefined) {
    throw new IrInvariantError(`variable '${name}' declared outside any scope`);
  }
  const id = this.ctx.vars.insert({ ty, name });
  scope.set(name, id);
  if (this.currentBB !== null) {
    this.appendStmt({ kind: "var_live", var: id });
  }
  return id;
}

/** Innermost variable visible under `name`. */
export function lookupVar(this: IrLowerer, name: string): VarId | null {
  for (let i = this.scopes.length - 1; i >= 0; i--) {
    const id = this.scopes[i].get(name);
    if (id !== undefined) return id;
  }
  return null;
}
