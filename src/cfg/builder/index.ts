/**
 * CFG Builder - Constructs Control Flow Graphs from subset-C function bodies
 *
 * This is the main entry point for CFG construction.
 */

import type * as t from '@babel/types';
import type { CFG, BasicBlock, BlockId, DeclaredVariable, LoopInfo, Terminator } from '../../types/index.js';
import type { BuildContext, MutableBlock } from './types.js';
import { createBlock, jumpTo } from './blocks.js';
import { LoopStack } from './scope.js';
import { processStatements } from './statements.js';
import { computeReachable, computeDominators, identifyBackEdges, outgoingEdges } from './analysis.js';

// Re-export types and utilities
export type { MutableBlock, MutableLoop, BuildContext } from './types.js';
export type { LoopContext, SwitchContext, JumpContext } from './scope.js';
export { LoopStack, NoEnclosingLoopError, LoopStackUnderflowError } from './scope.js';
export { processStatements, processStatement } from './statements.js';
export { computeReachable, computeDominators, identifyBackEdges, outgoingEdges } from './analysis.js';

/**
 * Build a CFG from a function body. `variables` are carried through for
 * analyses that need declared types.
 */
export function buildCFG(
  body: readonly t.Statement[] | t.BlockStatement,
  variables: readonly DeclaredVariable[] = []
): CFG {
  const statements = 'type' in body ? body.body : body;

  const context = createBuildContext();
  const entryBlock = context.currentBlock;
  const last = statements[statements.length - 1];
  context.finalReturn = last?.type === 'ReturnStatement' ? last : null;

  // The exit block every fall-off path reaches
  const exitBlock = createBlock(context, false, true);
  exitBlock.terminator = { kind: 'return', argument: null };

  processStatements(statements, context);

  // Finalize the current block if it doesn't have a terminator
  const open = context.currentBlock;
  if (!open.terminator) {
    if (context.live.has(open.id)) {
      jumpTo(context, open, exitBlock.id, 'normal');
    } else {
      open.terminator = { kind: 'unreachable' };
    }
  }

  // Build predecessor/successor maps
  const predecessors = new Map<BlockId, BlockId[]>();
  const successors = new Map<BlockId, BlockId[]>();

  for (const [id] of context.blocks) {
    predecessors.set(id, []);
    successors.set(id, []);
  }

  for (const [, edge] of context.edges) {
    predecessors.get(edge.target)?.push(edge.source);
    successors.get(edge.source)?.push(edge.target);
  }

  const reachable = computeReachable(successors, entryBlock.id);
  const reachableSet = new Set(reachable);
  const backEdges = identifyBackEdges(outgoingEdges(context.blocks.keys(), context.edges), entryBlock.id);
  const dominators = computeDominators(reachable, predecessors, entryBlock.id);

  // Convert mutable blocks to immutable
  const blocks = new Map<BlockId, BasicBlock>();
  const exits: BlockId[] = [];
  for (const [id, block] of context.blocks) {
    const terminator: Terminator = block.terminator ?? { kind: 'unreachable' };
    if (terminator.kind === 'return') exits.push(id);
    blocks.set(id, {
      id,
      statements: [...block.statements],
      isEntry: block.isEntry,
      isExit: block.isExit,
      reachable: reachableSet.has(id),
      terminator,
    });
  }

  const loops: LoopInfo[] = context.loops.map((loop) => ({
    ...loop,
    breakSources: [...loop.breakSources],
    continueSources: [...loop.continueSources],
    returnSources: [...loop.returnSources],
  }));

  return {
    blocks,
    edges: new Map(context.edges),
    entry: entryBlock.id,
    exit: exitBlock.id,
    exits,
    predecessors,
    successors,
    backEdges,
    dominators,
    loops,
    returns: [...context.returns],
    diagnostics: [...context.diagnostics],
    unreachable: [...context.unreachable],
    variables: [...variables],
  };
}

function createBuildContext(): BuildContext {
  const entryBlock: MutableBlock = {
    id: 'bb0',
    statements: [],
    isEntry: true,
    isExit: false,
    terminator: null,
  };

  return {
    currentBlock: entryBlock,
    blocks: new Map([[entryBlock.id, entryBlock]]),
    edges: new Map(),
    live: new Set([entryBlock.id]),
    loopStack: new LoopStack(),
    loops: [],
    returns: [],
    finalReturn: null,
    diagnostics: [],
    unreachable: [],
    inDeadRegion: false,
    nextBlockId: 1,
    nextEdgeId: 0,
    nextTemporary: 0,
  };
}
