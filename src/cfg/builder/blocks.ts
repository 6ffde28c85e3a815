/**
 * Block Management - Create and manage CFG blocks
 *
 * This module handles creation and management of basic blocks.
 */

import type * as t from '@babel/types';
import type {
  BlockId,
  EdgeId,
  EdgeKind,
  CFGEdge,
  JumpKind,
} from '../../types/index.js';
import type { MutableBlock, BuildContext } from './types.js';

export function generateBlockId(context: BuildContext): BlockId {
  return `bb${context.nextBlockId++}`;
}

export function generateEdgeId(context: BuildContext): EdgeId {
  return `e${context.nextEdgeId++}`;
}

export function createBlock(context: BuildContext, isEntry = false, isExit = false): MutableBlock {
  const block: MutableBlock = {
    id: generateBlockId(context),
    statements: [],
    isEntry,
    isExit,
    terminator: null,
  };
  context.blocks.set(block.id, block);
  return block;
}

export function startNewBlock(context: BuildContext): MutableBlock {
  const block = createBlock(context);
  context.currentBlock = block;
  return block;
}

export function addEdge(
  context: BuildContext,
  source: BlockId,
  target: BlockId,
  kind: EdgeKind
): void {
  const edge: CFGEdge = {
    id: generateEdgeId(context),
    source,
    target,
    kind,
  };
  context.edges.set(edge.id, edge);
  if (context.live.has(source)) {
    markLive(context, target);
  }
}

/**
 * Mark a block live, along with everything it already flows into
 */
function markLive(context: BuildContext, id: BlockId): void {
  const worklist = [id];
  while (worklist.length > 0) {
    const next = worklist.pop();
    if (next === undefined || context.live.has(next)) continue;
    context.live.add(next);
    for (const [, edge] of context.edges) {
      if (edge.source === next && !context.live.has(edge.target)) {
        worklist.push(edge.target);
      }
    }
  }
}

export function isDead(context: BuildContext, block: MutableBlock): boolean {
  return !context.live.has(block.id);
}

/**
 * End `block` with an unconditional transfer to `target`
 */
export function jumpTo(
  context: BuildContext,
  block: MutableBlock,
  target: BlockId,
  kind: EdgeKind,
  jump: JumpKind | null = null
): void {
  block.terminator = { kind: 'fallthrough', next: target, jump };
  addEdge(context, block.id, target, kind);
}

/**
 * End `block` with a two-way branch on `condition`
 */
export function branchTo(
  context: BuildContext,
  block: MutableBlock,
  condition: t.Expression,
  consequent: BlockId,
  alternate: BlockId,
  consequentKind: EdgeKind = 'true-branch'
): void {
  block.terminator = { kind: 'branch', condition, consequent, alternate };
  addEdge(context, block.id, consequent, consequentKind);
  addEdge(context, block.id, alternate, 'false-branch');
}

/**
 * Fall through from the current block to `target` unless it already ended
 */
export function closeInto(context: BuildContext, target: BlockId, kind: EdgeKind = 'normal'): void {
  if (!context.currentBlock.terminator) {
    jumpTo(context, context.currentBlock, target, kind);
  }
}
