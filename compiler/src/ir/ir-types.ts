export type * from "./ir-types/index.ts";
