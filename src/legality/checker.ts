/**
 * Legality checker
 *
 * Walks a completed CFG and reports every way the function departs from the
 * dialect policy. An empty result accepts the function.
 */

import type { CFG, LoopInfo, Violation, ViolationKind, SourceLocation } from '../types/index.js';
import { analyzeLoopBound } from './bounds.js';
import { DEFAULT_POLICY, type LegalityPolicy } from './policy.js';

export interface CheckedFunction {
  readonly name: string;
  readonly cfg: CFG;
}

/**
 * Check one function. Structural diagnostics come first, then the loop
 * rules loop by loop, then dead code, then early returns.
 */
export function checkLegality(
  cfg: CFG,
  functionName: string | null,
  policy: LegalityPolicy = DEFAULT_POLICY
): Violation[] {
  const violations: Violation[] = [];
  const report = (kind: ViolationKind, message: string, location: SourceLocation): void => {
    violations.push({ kind, message, functionName, location });
  };

  for (const diagnostic of cfg.diagnostics) {
    report(diagnostic.kind, diagnostic.message, diagnostic.location);
  }

  for (const loop of cfg.loops) {
    checkLoop(loop, cfg, policy, report);
  }

  if (!policy.allowDeadCode) {
    for (const note of cfg.unreachable) {
      report('unreachable-code', 'Statement can never execute', note.location);
    }
  }

  if (!policy.allowEarlyReturn) {
    for (const site of cfg.returns) {
      if (site.isFinal) continue;
      report('early-return', 'Return before the end of the function', site.location);
    }
  }

  return violations;
}

/**
 * Check every function of a program, in order
 */
export function checkProgram(
  functions: readonly CheckedFunction[],
  policy: LegalityPolicy = DEFAULT_POLICY
): Violation[] {
  return functions.flatMap((fn) => checkLegality(fn.cfg, fn.name, policy));
}

type Reporter = (kind: ViolationKind, message: string, location: SourceLocation) => void;

function checkLoop(loop: LoopInfo, cfg: CFG, policy: LegalityPolicy, report: Reporter): void {
  const label = `${loop.kind} loop`;

  if (!policy.allowedLoopKinds.includes(loop.kind)) {
    report('disallowed-loop-kind', `${label} is not allowed`, loop.location);
  }

  if (policy.maxLoopDepth !== null && loop.depth > policy.maxLoopDepth) {
    report('loop-depth', `${label} is nested ${loop.depth} deep (limit ${policy.maxLoopDepth})`, loop.location);
  }

  if (policy.requireStaticBound || policy.maxIterations !== null) {
    const bound = analyzeLoopBound(loop, cfg.variables);
    if (!bound.bounded) {
      if (policy.requireStaticBound) {
        report('unbounded-loop', `${label} has no static iteration bound: ${bound.reason}`, loop.location);
      }
    } else if (policy.maxIterations !== null && bound.iterations > policy.maxIterations) {
      report(
        'iteration-limit',
        `${label} runs ${bound.iterations} iterations (limit ${policy.maxIterations})`,
        loop.location
      );
    }
  }

  if (!policy.allowBreak) {
    for (const site of loop.breakSources) {
      report('disallowed-break', `break out of ${label} is not allowed`, site.location);
    }
  }

  if (!policy.allowContinue) {
    for (const site of loop.continueSources) {
      report('disallowed-continue', `continue in ${label} is not allowed`, site.location);
    }
  }

  if (policy.maxLoopExits !== null) {
    const exits = (loop.constantCondition === true ? 0 : 1) + loop.breakSources.length;
    if (exits > policy.maxLoopExits) {
      report('multi-exit-loop', `${label} has ${exits} exits (limit ${policy.maxLoopExits})`, loop.location);
    }
  }
}
