/**
 * Control Flow Graph (CFG) types
 *
 * These types represent the lowered control flow of one subset-C function.
 * The CFG is constructed from the AST and consumed by the legality checker,
 * the interpreter and the formatters.
 */

import type * as t from '@babel/types';
import type { DeclaredVariable, LoopKind, LoopStatement, SourceLocation } from './ast.js';

/**
 * Unique identifier for CFG blocks
 */
export type BlockId = string;

/**
 * Unique identifier for CFG edges
 */
export type EdgeId = string;

/**
 * A basic block in the CFG
 * Contains a sequence of statements with no branching (except at the end)
 */
export interface BasicBlock {
  readonly id: BlockId;
  /** The non-branching operations in this block */
  readonly statements: readonly t.Statement[];
  /** Entry point of the function */
  readonly isEntry: boolean;
  /** The function's single exit block */
  readonly isExit: boolean;
  /** Whether any path from the entry reaches this block */
  readonly reachable: boolean;
  /** How control leaves this block */
  readonly terminator: Terminator;
}

/**
 * How control leaves a basic block
 */
export type Terminator =
  | FallthroughTerminator
  | BranchTerminator
  | ReturnTerminator
  | UnreachableTerminator;

export type TerminatorKind = Terminator['kind'];

/** Resolved `break`/`continue` jumps are fallthroughs tagged with their origin */
export type JumpKind = 'break' | 'continue';

export interface FallthroughTerminator {
  readonly kind: 'fallthrough';
  /** The next block */
  readonly next: BlockId;
  readonly jump: JumpKind | null;
}

export interface BranchTerminator {
  readonly kind: 'branch';
  /** The condition expression */
  readonly condition: t.Expression;
  /** Block to execute if condition is non-zero */
  readonly consequent: BlockId;
  /** Block to execute if condition is zero */
  readonly alternate: BlockId;
}

export interface ReturnTerminator {
  readonly kind: 'return';
  /** The return expression (null for bare return) */
  readonly argument: t.Expression | null;
}

/** Marks a block whose end is never reached */
export interface UnreachableTerminator {
  readonly kind: 'unreachable';
}

/**
 * An edge in the CFG representing control flow
 */
export interface CFGEdge {
  readonly id: EdgeId;
  readonly source: BlockId;
  readonly target: BlockId;
  /** Type of edge for analysis purposes */
  readonly kind: EdgeKind;
}

export type EdgeKind =
  | 'normal'
  | 'true-branch'
  | 'false-branch'
  | 'back-edge' // loop latch
  | 'break'
  | 'continue';

/**
 * A block ended by a jump statement
 */
export interface JumpSite {
  readonly block: BlockId;
  readonly location: SourceLocation;
}

export interface ReturnSite extends JumpSite {
  /** The last top-level statement of the function */
  readonly isFinal: boolean;
}

/**
 * Everything the builder learned about one loop
 */
export interface LoopInfo {
  readonly id: number;
  readonly kind: LoopKind;
  readonly statement: LoopStatement;
  readonly location: SourceLocation;
  /** Block testing the condition (the cond-test block for do/while) */
  readonly header: BlockId;
  readonly body: BlockId;
  /** For-loop step block */
  readonly step: BlockId | null;
  /** Block after the loop; the break target */
  readonly exit: BlockId;
  readonly condition: t.Expression | null;
  /** Folded value of an integer-constant condition */
  readonly constantCondition: boolean | null;
  /** `break` statements that target this loop */
  readonly breakSources: readonly JumpSite[];
  /** `continue` statements that target this loop */
  readonly continueSources: readonly JumpSite[];
  /** `return` statements inside this loop */
  readonly returnSources: readonly JumpSite[];
  /** Nesting depth, 1 for an outermost loop */
  readonly depth: number;
}

/**
 * A problem the builder found while lowering; never fatal to the build
 */
export interface StructuralDiagnostic {
  readonly kind: 'no-enclosing-loop' | 'unsupported-statement';
  readonly message: string;
  readonly location: SourceLocation;
  readonly block: BlockId;
}

/**
 * First statement of a run that can never execute
 */
export interface UnreachableNote {
  readonly location: SourceLocation;
  readonly block: BlockId;
}

/**
 * The complete Control Flow Graph for one function
 */
export interface CFG {
  /** All basic blocks indexed by ID, in creation order */
  readonly blocks: ReadonlyMap<BlockId, BasicBlock>;
  /** All edges indexed by ID */
  readonly edges: ReadonlyMap<EdgeId, CFGEdge>;
  /** The entry block ID */
  readonly entry: BlockId;
  /** The synthesized exit block every fall-off path reaches */
  readonly exit: BlockId;
  /** Blocks ending in a return */
  readonly exits: readonly BlockId[];
  /** Predecessors for each block */
  readonly predecessors: ReadonlyMap<BlockId, readonly BlockId[]>;
  /** Successors for each block */
  readonly successors: ReadonlyMap<BlockId, readonly BlockId[]>;
  /** Back edges (for loop detection) */
  readonly backEdges: ReadonlySet<EdgeId>;
  /** Dominators for each reachable block */
  readonly dominators: ReadonlyMap<BlockId, ReadonlySet<BlockId>>;
  /** Loops in source order */
  readonly loops: readonly LoopInfo[];
  /** Return statements in source order */
  readonly returns: readonly ReturnSite[];
  readonly diagnostics: readonly StructuralDiagnostic[];
  readonly unreachable: readonly UnreachableNote[];
  /** Declared variables of the lowered function */
  readonly variables: readonly DeclaredVariable[];
}
