import type { Span } from "../../utils/source.ts";

/** Common fields shared by all AST nodes. */
export interface BaseNode {
  kind: string;
  span: Span;
}
