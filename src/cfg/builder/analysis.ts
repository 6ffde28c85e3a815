/**
 * CFG Analysis - Reachability, dominator and back edge analysis
 *
 * These run over a completed graph and only read it.
 */

import type { BlockId, EdgeId, CFGEdge } from '../../types/index.js';

/**
 * Group edges by source block
 */
export function outgoingEdges(
  blocks: Iterable<BlockId>,
  edges: ReadonlyMap<EdgeId, CFGEdge>
): Map<BlockId, CFGEdge[]> {
  const outgoing = new Map<BlockId, CFGEdge[]>();
  for (const id of blocks) outgoing.set(id, []);
  for (const [, edge] of edges) {
    outgoing.get(edge.source)?.push(edge);
  }
  return outgoing;
}

/**
 * Blocks reachable from the entry, in depth-first preorder
 */
export function computeReachable(
  successors: ReadonlyMap<BlockId, readonly BlockId[]>,
  entry: BlockId
): BlockId[] {
  const order: BlockId[] = [];
  const seen = new Set<BlockId>();
  const stack = [entry];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    order.push(id);
    const succs = successors.get(id) ?? [];
    for (let i = succs.length - 1; i >= 0; i--) {
      const succ = succs[i];
      if (succ !== undefined && !seen.has(succ)) stack.push(succ);
    }
  }
  return order;
}

/**
 * Identify back edges using DFS
 */
export function identifyBackEdges(
  outgoing: ReadonlyMap<BlockId, readonly CFGEdge[]>,
  entry: BlockId
): Set<EdgeId> {
  const visited = new Set<BlockId>();
  const inStack = new Set<BlockId>();
  const backEdges = new Set<EdgeId>();

  function dfs(blockId: BlockId): void {
    visited.add(blockId);
    inStack.add(blockId);

    for (const edge of outgoing.get(blockId) ?? []) {
      if (inStack.has(edge.target)) {
        backEdges.add(edge.id);
      } else if (!visited.has(edge.target)) {
        dfs(edge.target);
      }
    }

    inStack.delete(blockId);
  }

  dfs(entry);
  return backEdges;
}

/**
 * Compute dominators of the reachable blocks using iterative dataflow
 */
export function computeDominators(
  reachable: readonly BlockId[],
  predecessors: ReadonlyMap<BlockId, readonly BlockId[]>,
  entry: BlockId
): Map<BlockId, Set<BlockId>> {
  const dominators = new Map<BlockId, Set<BlockId>>();
  const reachableSet = new Set(reachable);

  // Initialize: entry dominates only itself, others dominated by all
  for (const blockId of reachable) {
    dominators.set(blockId, blockId === entry ? new Set([blockId]) : new Set(reachable));
  }

  // Iterate until fixed point
  let changed = true;
  while (changed) {
    changed = false;
    for (const blockId of reachable) {
      if (blockId === entry) continue;

      let newDom: Set<BlockId> | null = null;
      for (const pred of predecessors.get(blockId) ?? []) {
        if (!reachableSet.has(pred)) continue;
        const predDom = dominators.get(pred);
        if (!predDom) continue;
        if (newDom === null) {
          newDom = new Set(predDom);
        } else {
          // Intersection
          for (const d of newDom) {
            if (!predDom.has(d)) newDom.delete(d);
          }
        }
      }

      const next: Set<BlockId> = newDom ?? new Set();
      next.add(blockId);

      const oldDom = dominators.get(blockId);
      if (!oldDom || next.size !== oldDom.size || ![...next].every((d) => oldDom.has(d))) {
        dominators.set(blockId, next);
        changed = true;
      }
    }
  }

  return dominators;
}
