/**
 * CFG module exports
 */

export { buildCFG, LoopStack, NoEnclosingLoopError, LoopStackUnderflowError } from './builder/index.js';
export type { LoopContext, SwitchContext, JumpContext } from './builder/index.js';
export { validateCFG } from './validate.js';
export type { CFGValidationError, CFGValidationErrorKind } from './validate.js';
export { cfgShape, shapesEqual } from './shape.js';
export type { CFGShape } from './shape.js';
