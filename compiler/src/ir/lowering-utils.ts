/**
 * Basic block helpers for IrLowerer.
 * Extracted from lowering.ts for modularity.
 */

import { IrInvariantError } from "../errors/invariant.ts";
import type { BBId, IrBB, IrStmt, IrTerminator } from "./ir-types.ts";
import type { IrLowerer } from "./lowering.ts";

// ─── Blocks ──────────────────────────────────────────────────────────────

/** Allocate an empty, unterminated block. Lowering continues where it was. */
export function newBlock(this: IrLowerer): BBId {
  return this.ctx.bbs.insert({ stmts: [], terminator: null });
}

/** Make `id` the block new statements are appended to. */
export function startBlock(this: IrLowerer, id: BBId): void {
  this.currentBB = id;
}

export function currentBlock(this: IrLowerer): IrBB {
  if (this.currentBB === null) {
    throw new IrInvariantError("no basic block is being lowered");
  }
  return this.ctx.bb(this.currentBB);
}

export function appendStmt(this: IrLowerer, stmt: IrStmt): void {
  const block = this.currentBlock();
  if (block.terminator !== null) {
    throw new IrInvariantError(`statement '${stmt.kind}' appended to a terminated block`);
  }
  block.stmts.push(stmt);
}

export function setTerminator(this: IrLowerer, term: IrTerminator): void {
  const block = this.currentBlock();
  if (block.terminator !== null) {
    throw new IrInvariantError(`block bb${this.currentBB} is already terminated`);
  }
  block.terminator = term;
}

export function isBlockTerminated(this: IrLowerer): boolean {
  return this.currentBlock().terminator !== null;
}

/** Jump to `target` unless the current block already ended (return, break, ...). */
export function jumpIfOpen(this: IrLowerer, target: BBId): void {
  if (!this.isBlockTerminated()) {
    this.setTerminator({ kind: "jmp", target });
  }
}
