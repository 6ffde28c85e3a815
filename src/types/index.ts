/**
 * Shared types - Main exports
 */

export type {
  LoopStatement,
  LoopKind,
  SourceLocation,
  FunctionParameter,
  FunctionDefinition,
  IntegerType,
  DeclaredVariable,
  GlobalDeclaration,
} from './ast.js';

export {
  LOOP_KINDS,
  UNKNOWN_LOCATION,
  locationOf,
  compareLocations,
  loopKindOf,
} from './ast.js';

export type {
  BlockId,
  EdgeId,
  BasicBlock,
  Terminator,
  TerminatorKind,
  JumpKind,
  FallthroughTerminator,
  BranchTerminator,
  ReturnTerminator,
  UnreachableTerminator,
  CFGEdge,
  EdgeKind,
  LoopInfo,
  JumpSite,
  ReturnSite,
  StructuralDiagnostic,
  UnreachableNote,
  CFG,
} from './cfg.js';

export type { Violation, ViolationKind, Verdict } from './violation.js';
