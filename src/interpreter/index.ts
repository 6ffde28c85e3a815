/**
 * Interpreter module exports
 */

export { execute, DEFAULT_EXECUTE_OPTIONS } from './interpreter.js';
export type { ExecuteOptions, ExecutionResult } from './interpreter.js';
export { evaluate, executeStatement, createMachineState } from './expressions.js';
export type { MachineState, BufferWrite } from './expressions.js';
export {
  StepLimitExceededError,
  BufferBoundsError,
  UnsupportedExpressionError,
  UndefinedVariableError,
  MalformedCFGError,
} from './errors.js';
