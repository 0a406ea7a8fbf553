/**
 * CFG construction. A function body only records its entry block, so the
 * rest of the graph is recovered by following terminator edges.
 */

import { IrInvariantError } from "../errors/invariant.ts";
import type { IrContext } from "./context.ts";
import type { BBId, IrBody, IrTerminator } from "./ir-types.ts";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface CFG {
  entry: BBId;
  preds: Map<BBId, BBId[]>;
  succs: Map<BBId, BBId[]>;
  /** Blocks reachable from the entry, in reverse post-order. */
  blockOrder: BBId[];
}

// ─── CFG helpers ────────────────────────────────────────────────────────────

/**
 * Build the control-flow graph of a function body.
 *
 * Blocks that are still under construction (no terminator) are treated as
 * having no successors; `validateFunction` reports them.
 */
export function buildCfg(ctx: IrContext, body: IrBody): CFG {
  const preds = new Map<BBId, BBId[]>();
  const succs = new Map<BBId, BBId[]>();
  const visited = new Set<BBId>();
  const postOrder: BBId[] = [];

  function visit(id: BBId): void {
    if (visited.has(id)) return;
    visited.add(id);
    if (!preds.has(id)) preds.set(id, []);

    const terminator = ctx.bb(id).terminator;
    const targets = terminator ? terminatorTargets(terminator) : [];
    succs.set(id, targets);
    for (const target of targets) {
      if (!ctx.bbs.has(target)) {
        throw new IrInvariantError(`block ${id} jumps to unknown block ${target}`);
      }
      const predList = preds.get(target);
      if (predList) {
        predList.push(id);
      } else {
        preds.set(target, [id]);
      }
      visit(target);
    }
    postOrder.push(id);
  }

  visit(body.entry);
  postOrder.reverse();

  return { entry: body.entry, preds, succs, blockOrder: postOrder };
}

/** Branch targets of a terminator, in the order the terminator lists them. */
export function terminatorTargets(term: IrTerminator): BBId[] {
  switch (term.kind) {
    case "jmp":
      return [term.target];
    case "jmp_if":
      return [term.ifTrue, term.ifFalse];
    case "jmp_match": {
      const targets = term.discriminants.map(([, target]) => target);
      targets.push(term.defaultJmp);
      return targets;
    }
    case "return":
      return [];
  }
}

/** Reachable blocks for display and emission: the entry first, the rest in handle order. */
export function layoutBlocks(cfg: CFG): BBId[] {
  const rest = cfg.blockOrder.filter((id) => id !== cfg.entry).sort((a, b) => a - b);
  return [cfg.entry, ...rest];
}
