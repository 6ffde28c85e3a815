/**
 * CFG Builder Types - Types and interfaces for CFG construction
 *
 * This module defines the types used during CFG construction.
 */

import type * as t from '@babel/types';
import type { LoopKind, LoopStatement, SourceLocation } from '../../types/index.js';
import type {
  BlockId,
  EdgeId,
  CFGEdge,
  Terminator,
  JumpSite,
  ReturnSite,
  StructuralDiagnostic,
  UnreachableNote,
} from '../../types/index.js';
import type { LoopStack } from './scope.js';

/**
 * Mutable block during CFG construction
 */
export interface MutableBlock {
  id: BlockId;
  statements: t.Statement[];
  isEntry: boolean;
  isExit: boolean;
  terminator: Terminator | null;
}

/**
 * Loop record filled in while the loop body is lowered
 */
export interface MutableLoop {
  id: number;
  kind: LoopKind;
  statement: LoopStatement;
  location: SourceLocation;
  header: BlockId;
  body: BlockId;
  step: BlockId | null;
  exit: BlockId;
  condition: t.Expression | null;
  constantCondition: boolean | null;
  breakSources: JumpSite[];
  continueSources: JumpSite[];
  returnSources: JumpSite[];
  depth: number;
}

/**
 * Context for building one CFG. Owned by a single build; nothing in it is
 * shared between functions.
 */
export interface BuildContext {
  /** Current block being built */
  currentBlock: MutableBlock;
  /** All blocks created, in creation order */
  blocks: Map<BlockId, MutableBlock>;
  /** All edges created */
  edges: Map<EdgeId, CFGEdge>;
  /** Blocks some path from the entry reaches so far */
  live: Set<BlockId>;
  /** Active loops and switches for break/continue resolution */
  loopStack: LoopStack;
  /** Loops in source order */
  loops: MutableLoop[];
  returns: ReturnSite[];
  /** A trailing top-level `return`; the one return that is not early */
  finalReturn: t.ReturnStatement | null;
  diagnostics: StructuralDiagnostic[];
  unreachable: UnreachableNote[];
  /** Set while the rest of a statement list is already reported as unreachable */
  inDeadRegion: boolean;
  nextBlockId: number;
  nextEdgeId: number;
  nextTemporary: number;
}
