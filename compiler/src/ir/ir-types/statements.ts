import type { VarId } from "./identifiers.ts";
import type { IrAnyValue, IrExpr } from "./values.ts";

// ─── Statements ──────────────────────────────────────────────────────────────

export type IrStmt = IrVarLive | IrStore | IrWrite | IrEval;

/** The variable's storage is live from this point on. */
export interface IrVarLive {
  kind: "var_live";
  var: VarId;
}

/** Store a value in a variable. */
export interface IrStore {
  kind: "store";
  var: VarId;
  val: IrAnyValue;
}

/** Store a value through a place expression (`*p`, `s.f`, `a[i]`). */
export interface IrWrite {
  kind: "write";
  place: IrExpr;
  val: IrAnyValue;
}

/** Evaluate an expression for its side effects and discard the result. */
export interface IrEval {
  kind: "eval";
  expr: IrExpr;
}
