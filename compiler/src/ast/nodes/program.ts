import type { FileId } from "../../utils/source.ts";
import type { BaseNode } from "./base.ts";
import type { Declaration } from "./declarations.ts";

/** Root node: every declaration of one source file. */
export interface Program extends BaseNode {
  kind: "Program";
  file: FileId;
  declarations: Declaration[];
}
