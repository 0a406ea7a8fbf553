import type { BaseNode } from "./base.ts";
import type { BlockStmt } from "./statements.ts";
import type { TypeNode } from "./types.ts";

export interface Param extends BaseNode {
  kind: "Param";
  name: string;
  typeAnnotation: TypeNode;
}

/** Function declaration; `body` is null for a prototype or an extern function. */
export interface FunctionDecl extends BaseNode {
  kind: "FunctionDecl";
  name: string;
  params: Param[];
  /** `null` means the function returns `()`. */
  returnType: TypeNode | null;
  body: BlockStmt | null;
  isExtern: boolean;
  isInline: boolean;
}

/** Named type declaration (`type Point = {i32 x, i32 y}`). */
export interface TypeDecl extends BaseNode {
  kind: "TypeDecl";
  name: string;
  type: TypeNode;
}

export type Declaration = FunctionDecl | TypeDecl;
