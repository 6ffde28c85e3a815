/**
 * CFG validation - structural well-formedness checks over a completed graph
 */

import type { BlockId, CFG, Terminator } from '../types/index.js';
import { computeReachable } from './builder/analysis.js';

export type CFGValidationErrorKind =
  | 'missing-entry'
  | 'missing-exit'
  | 'dangling-target'
  | 'dangling-edge'
  | 'edge-mismatch'
  | 'reachability-mismatch'
  | 'irreducible-back-edge';

export interface CFGValidationError {
  readonly kind: CFGValidationErrorKind;
  readonly message: string;
  readonly block: BlockId | null;
}

function makeError(kind: CFGValidationErrorKind, message: string, block: BlockId | null = null): CFGValidationError {
  return { kind, message, block };
}

export function terminatorTargets(terminator: Terminator): BlockId[] {
  switch (terminator.kind) {
    case 'fallthrough':
      return [terminator.next];
    case 'branch':
      return [terminator.consequent, terminator.alternate];
    case 'return':
    case 'unreachable':
      return [];
  }
}

/**
 * Check a CFG; an empty result means the graph is well-formed
 */
export function validateCFG(cfg: CFG): CFGValidationError[] {
  const errors: CFGValidationError[] = [];

  if (!cfg.blocks.has(cfg.entry)) {
    errors.push(makeError('missing-entry', `Entry block ${cfg.entry} does not exist`));
    return errors;
  }
  if (cfg.blocks.get(cfg.exit)?.isExit !== true) {
    errors.push(makeError('missing-exit', `Exit block ${cfg.exit} does not exist or is not marked as exit`));
  }

  for (const [id, block] of cfg.blocks) {
    for (const target of terminatorTargets(block.terminator)) {
      if (!cfg.blocks.has(target)) {
        errors.push(makeError('dangling-target', `Terminator of ${id} targets unknown block ${target}`, id));
      }
    }
  }

  for (const [edgeId, edge] of cfg.edges) {
    if (!cfg.blocks.has(edge.source) || !cfg.blocks.has(edge.target)) {
      errors.push(makeError('dangling-edge', `Edge ${edgeId} connects unknown blocks ${edge.source} -> ${edge.target}`));
    }
  }

  for (const [id, block] of cfg.blocks) {
    const fromTerminator = terminatorTargets(block.terminator).sort();
    const fromEdges = [...(cfg.successors.get(id) ?? [])].sort();
    if (fromTerminator.join(',') !== fromEdges.join(',')) {
      errors.push(
        makeError(
          'edge-mismatch',
          `Block ${id} terminator targets [${fromTerminator.join(', ')}] but edges lead to [${fromEdges.join(', ')}]`,
          id
        )
      );
    }
  }

  const reachable = new Set(computeReachable(cfg.successors, cfg.entry));
  for (const [id, block] of cfg.blocks) {
    if (block.reachable !== reachable.has(id)) {
      errors.push(
        makeError(
          'reachability-mismatch',
          `Block ${id} is marked ${block.reachable ? 'reachable' : 'unreachable'} but traversal disagrees`,
          id
        )
      );
    }
  }

  // Structured lowering only produces reducible graphs
  for (const edgeId of cfg.backEdges) {
    const edge = cfg.edges.get(edgeId);
    if (!edge || !reachable.has(edge.source)) continue;
    if (cfg.dominators.get(edge.source)?.has(edge.target) !== true) {
      errors.push(
        makeError(
          'irreducible-back-edge',
          `Back edge ${edge.source} -> ${edge.target} does not target a dominator`,
          edge.source
        )
      );
    }
  }

  return errors;
}
