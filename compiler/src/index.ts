/**
 * Public API of the Ember IR builder.
 *
 * Typical use: register sources in `SourceFiles`, lower each parsed
 * `Program` into one shared `IrContext`, render any diagnostics with
 * `formatDiagnostics`, and hand the context to `emitC`.
 */

export * from "./ast/nodes.ts";
export * from "./errors/index.ts";

export { Arena, Interner, indexFromRaw } from "./utils/arena.ts";
export type { Index } from "./utils/arena.ts";
export { error, ok } from "./utils/result.ts";
export type { Result } from "./utils/result.ts";
export { joinSpans, SourceFile, SourceFiles, span } from "./utils/source.ts";
export type { FileId, LineColumn, Span } from "./utils/source.ts";

export type * from "./ir/ir-types.ts";
export { IrContext } from "./ir/context.ts";
export { typename, writeTypename } from "./ir/typename.ts";
export type { TypenameSink } from "./ir/typename.ts";
export { buildCfg, layoutBlocks, terminatorTargets } from "./ir/cfg.ts";
export type { CFG } from "./ir/cfg.ts";
export { validateContext, validateFunction } from "./ir/validate.ts";
export { printExpr, printIr } from "./ir/printer.ts";
export { DEFAULT_LOWER_OPTIONS, IrLowerer, lowerProgram } from "./ir/lowering.ts";
export type { LowerOptions, LoweringResult } from "./ir/lowering.ts";
export { binaryResultType, unaryResultType } from "./ir/lowering-operators.ts";
export { isCastAllowed } from "./ir/lowering-expr.ts";

export { C_PRELUDE, DEFAULT_EMIT_OPTIONS, emitC } from "./backend/c-emitter.ts";
export type { EmitOptions } from "./backend/c-emitter.ts";
