/**
 * Compiler module exports
 */

export { compile, compileFunction, exitCode, verdictOf, DEFAULT_COMPILE_OPTIONS } from './compile.js';
export type { CompileOptions, CompileResult, FunctionResult } from './compile.js';
