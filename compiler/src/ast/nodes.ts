/**
 * AST node types for the Ember language, as produced by the parser.
 * Uses discriminated unions with a `kind` field.
 */

export * from "./nodes/index.ts";
