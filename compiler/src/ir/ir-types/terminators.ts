import type { BBId, DiscriminantId } from "./identifiers.ts";
import type { IrAnyValue } from "./values.ts";

// ─── Terminators ─────────────────────────────────────────────────────────────

/** Union of all block terminators. A finished basic block has exactly one. */
export type IrTerminator = IrReturn | IrJmp | IrJmpIf | IrJmpMatch;

/** Exit the current function with a value (`()` for unit functions). */
export interface IrReturn {
  kind: "return";
  value: IrAnyValue;
}

/** Unconditional jump. */
export interface IrJmp {
  kind: "jmp";
  target: BBId;
}

/** Jump to `ifTrue` when `condition` holds (is true or non-zero), else to `ifFalse`. */
export interface IrJmpIf {
  kind: "jmp_if";
  condition: IrAnyValue;
  ifTrue: BBId;
  ifFalse: BBId;
}

/** Dispatch on the active variant of a sum value. */
export interface IrJmpMatch {
  kind: "jmp_match";
  variant: IrAnyValue;
  discriminants: [DiscriminantId, BBId][];
  defaultJmp: BBId;
}
