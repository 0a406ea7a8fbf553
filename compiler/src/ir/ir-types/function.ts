import type { FileId, Span } from "../../utils/source.ts";
import type { BBId, FunId, TypeId } from "./identifiers.ts";
import type { IrStmt } from "./statements.ts";
import type { IrTerminator } from "./terminators.ts";
import type { IrFunType } from "./types.ts";

// ─── Functions ───────────────────────────────────────────────────────────────

export interface IrFunFlags {
  /** Defined outside this compilation; never has a body. */
  isExtern: boolean;
  isInline: boolean;
}

/** A declared or defined function. */
export interface IrFun {
  name: string;
  /** Signature, fixed at declaration. */
  readonly ty: IrFunType;
  file: FileId;
  span: Span;
  /** `null` until the function's body has been lowered, and forever for declarations. */
  body: IrBody | null;
  flags: IrFunFlags;
}

export interface IrBody {
  entry: BBId;
  parent: FunId;
}

// ─── Basic Block ─────────────────────────────────────────────────────────────

/**
 * A straight-line sequence of statements ending with exactly one
 * terminator. `terminator` is null only while the block is being built.
 */
export interface IrBB {
  stmts: IrStmt[];
  terminator: IrTerminator | null;
}

// ─── Variables ───────────────────────────────────────────────────────────────

/** A declared variable. Shadowing declares a new one. */
export interface IrVar {
  readonly ty: TypeId;
  readonly name: string;
}
