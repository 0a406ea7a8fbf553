/**
 * IR node types. Uses discriminated unions with a `kind` field, matching
 * AST conventions.
 *
 * The IR is a control-flow graph of basic blocks with explicit
 * terminators. Functions, blocks, variables and types live in the arenas
 * of an `IrContext` and refer to each other only by handle.
 */

export type * from "./identifiers.ts";
export type * from "./types.ts";
export type * from "./values.ts";
export type * from "./statements.ts";
export type * from "./terminators.ts";
export type * from "./function.ts";
