/**
 * Structural fingerprint of a CFG
 *
 * Blocks are numbered breadth-first from the entry following terminator
 * order, then the blocks no path reaches in creation order. Two CFGs are
 * isomorphic when their shapes are equal.
 */

import type { BlockId, CFG, EdgeKind, TerminatorKind } from '../types/index.js';
import { terminatorTargets } from './validate.js';

export interface CFGShape {
  readonly blockCount: number;
  /** Terminator kind per block, in numbering order */
  readonly terminators: readonly TerminatorKind[];
  /** `[source, target, kind]` per edge, by source number then terminator order */
  readonly edges: readonly (readonly [number, number, EdgeKind])[];
  readonly reachable: readonly boolean[];
}

function numberBlocks(cfg: CFG): BlockId[] {
  const order: BlockId[] = [];
  const seen = new Set<BlockId>();
  const queue: BlockId[] = [cfg.entry];
  seen.add(cfg.entry);

  for (let i = 0; i < queue.length; i++) {
    const id = queue[i];
    if (id === undefined) continue;
    order.push(id);
    const block = cfg.blocks.get(id);
    if (!block) continue;
    for (const target of terminatorTargets(block.terminator)) {
      if (!seen.has(target)) {
        seen.add(target);
        queue.push(target);
      }
    }
  }

  for (const id of cfg.blocks.keys()) {
    if (!seen.has(id)) order.push(id);
  }
  return order;
}

export function cfgShape(cfg: CFG): CFGShape {
  const order = numberBlocks(cfg);
  const index = new Map(order.map((id, i) => [id, i]));

  const edgesBySource = new Map<BlockId, (readonly [number, number, EdgeKind])[]>();
  for (const [, edge] of cfg.edges) {
    const source = index.get(edge.source);
    const target = index.get(edge.target);
    if (source === undefined || target === undefined) continue;
    const list = edgesBySource.get(edge.source) ?? [];
    list.push([source, target, edge.kind]);
    edgesBySource.set(edge.source, list);
  }

  const terminators: TerminatorKind[] = [];
  const reachable: boolean[] = [];
  const edges: (readonly [number, number, EdgeKind])[] = [];
  for (const id of order) {
    const block = cfg.blocks.get(id);
    terminators.push(block?.terminator.kind ?? 'unreachable');
    reachable.push(block?.reachable ?? false);
    edges.push(...(edgesBySource.get(id) ?? []));
  }

  return { blockCount: order.length, terminators, edges, reachable };
}

export function shapesEqual(a: CFGShape, b: CFGShape): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}
