// ─── Identifiers ─────────────────────────────────────────────────────────────

import type { Index } from "../../utils/arena.ts";
import type { IrBB, IrFun, IrVar } from "./function.ts";
import type { IrType } from "./types.ts";

/** Handle of an interned {@link IrType}. */
export type TypeId = Index<IrType>;

/** Handle of a declared or defined {@link IrFun}. */
export type FunId = Index<IrFun>;

/** Handle of a basic block. */
export type BBId = Index<IrBB>;

/** Handle of a variable. */
export type VarId = Index<IrVar>;

/** Position of a variant within a sum type's variant list. */
export type DiscriminantId = Index<TypeId>;
