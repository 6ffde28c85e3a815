/**
 * Violations reported by the legality checker
 */

import type { SourceLocation } from './ast.js';

export type ViolationKind =
  | 'parse-error'
  | 'no-enclosing-loop'
  | 'unsupported-statement'
  | 'unbounded-loop'
  | 'iteration-limit'
  | 'disallowed-loop-kind'
  | 'multi-exit-loop'
  | 'loop-depth'
  | 'disallowed-break'
  | 'disallowed-continue'
  | 'early-return'
  | 'unreachable-code';

export interface Violation {
  readonly kind: ViolationKind;
  readonly message: string;
  /** Function the violation belongs to; null for file-level problems */
  readonly functionName: string | null;
  readonly location: SourceLocation;
}

export type Verdict = 'pass' | 'fail';
