/**
 * Static loop bound analysis
 *
 * Proves a trip count for loops whose condition is a constant, and for
 * canonical counting `for` loops. Anything else is unbounded. Counting loops
 * are stepped in the declared type of their variable, so unsigned and
 * narrow variables wrap as they do in C.
 */

import * as t from '@babel/types';
import {
  compareLocations,
  locationOf,
  type DeclaredVariable,
  type IntegerType,
  type LoopInfo,
  type SourceLocation,
} from '../types/index.js';
import { evaluateConstant } from '../utils/constant.js';
import { INT, applyBinary, comparisonType, wrapInteger } from '../utils/integer.js';

export type LoopBound =
  | { readonly bounded: true; readonly iterations: number }
  | { readonly bounded: false; readonly reason: string };

/** Induction variable steps simulated before a loop counts as non-terminating */
export const SIMULATION_LIMIT = 1 << 20;

type ComparisonOperator = '<' | '<=' | '>' | '>=' | '!=';

const FLIPPED: Readonly<Record<ComparisonOperator, ComparisonOperator>> = {
  '<': '>',
  '<=': '>=',
  '>': '<',
  '>=': '<=',
  '!=': '!=',
};

function isComparison(op: string): op is ComparisonOperator {
  return op === '<' || op === '<=' || op === '>' || op === '>=' || op === '!=';
}

interface CountingLoop {
  readonly variable: string;
  readonly type: IntegerType;
  readonly start: number;
  readonly operator: ComparisonOperator;
  readonly limit: number;
  readonly delta: number;
}

const unbounded = (reason: string): LoopBound => ({ bounded: false, reason });

/**
 * Type of the latest declaration of `name` at or before `at`; undeclared
 * names are int
 */
export function declaredTypeAt(
  variables: readonly DeclaredVariable[],
  name: string,
  at: SourceLocation
): IntegerType | null {
  let latest: DeclaredVariable | null = null;
  for (const variable of variables) {
    if (variable.name !== name || compareLocations(variable.location, at) > 0) continue;
    if (!latest || compareLocations(variable.location, latest.location) >= 0) latest = variable;
  }
  return latest ? latest.type : INT;
}

export function analyzeLoopBound(loop: LoopInfo, variables: readonly DeclaredVariable[] = []): LoopBound {
  if (loop.constantCondition === false) {
    return { bounded: true, iterations: loop.kind === 'do-while' ? 1 : 0 };
  }
  if (loop.constantCondition === true) {
    return unbounded(loop.condition ? 'condition is always true' : 'loop has no condition');
  }
  if (loop.statement.type !== 'ForStatement') {
    return unbounded(`${loop.kind} condition is not a compile-time constant`);
  }
  return analyzeForLoop(loop.statement, variables);
}

function analyzeForLoop(stmt: t.ForStatement, variables: readonly DeclaredVariable[]): LoopBound {
  const init = matchInit(stmt.init);
  if (!init) return unbounded('initializer does not assign a constant to a single variable');

  const type = declaredTypeAt(variables, init.variable, locationOf(stmt.init));
  if (!type) return unbounded(`loop variable '${init.variable}' is not an integer`);

  const test = matchTest(stmt.test, init.variable);
  if (!test) return unbounded(`condition does not compare '${init.variable}' with a constant`);

  const delta = matchUpdate(stmt.update, init.variable);
  if (delta === null || delta === 0) {
    return unbounded(`step does not change '${init.variable}' by a non-zero constant`);
  }

  if (writesVariable(stmt.body, init.variable)) {
    return unbounded(`loop variable '${init.variable}' is modified in the loop body`);
  }

  return countIterations({ ...init, ...test, type, delta });
}

function countIterations(loop: CountingLoop): LoopBound {
  const limit = wrapInteger(loop.limit, comparisonType(loop.type));
  let value = wrapInteger(loop.start, loop.type);
  let iterations = 0;
  while (applyBinary(loop.operator, value, limit) !== 0) {
    if (iterations === SIMULATION_LIMIT) {
      return unbounded(`'${loop.variable}' does not reach its limit within ${SIMULATION_LIMIT} iterations`);
    }
    iterations++;
    value = wrapInteger(value + loop.delta, loop.type);
  }
  return { bounded: true, iterations };
}

function matchInit(init: t.ForStatement['init']): { variable: string; start: number } | null {
  if (!init) return null;

  if (init.type === 'VariableDeclaration') {
    const [declarator, ...rest] = init.declarations;
    if (!declarator || rest.length > 0) return null;
    if (declarator.id.type !== 'Identifier' || !declarator.init) return null;
    const start = evaluateConstant(declarator.init);
    return start === null ? null : { variable: declarator.id.name, start };
  }

  if (init.type === 'AssignmentExpression' && init.operator === '=' && init.left.type === 'Identifier') {
    const start = evaluateConstant(init.right);
    return start === null ? null : { variable: init.left.name, start };
  }

  return null;
}

function isVariable(node: t.Node, name: string): boolean {
  return node.type === 'Identifier' && node.name === name;
}

function matchTest(
  test: t.Expression | null | undefined,
  variable: string
): { operator: ComparisonOperator; limit: number } | null {
  if (!test || test.type !== 'BinaryExpression' || !isComparison(test.operator)) return null;
  if (test.left.type === 'PrivateName') return null;

  if (isVariable(test.left, variable)) {
    const limit = evaluateConstant(test.right);
    return limit === null ? null : { operator: test.operator, limit };
  }
  if (isVariable(test.right, variable)) {
    const limit = evaluateConstant(test.left);
    return limit === null ? null : { operator: FLIPPED[test.operator], limit };
  }
  return null;
}

function matchUpdate(update: t.Expression | null | undefined, variable: string): number | null {
  if (!update) return null;

  if (update.type === 'UpdateExpression') {
    if (!isVariable(update.argument, variable)) return null;
    return update.operator === '++' ? 1 : -1;
  }

  if (update.type !== 'AssignmentExpression' || !isVariable(update.left, variable)) return null;

  if (update.operator === '+=' || update.operator === '-=') {
    const step = evaluateConstant(update.right);
    if (step === null) return null;
    return update.operator === '+=' ? step : -step;
  }

  // v = v + c, v = c + v, v = v - c
  const right = update.right;
  if (update.operator !== '=' || right.type !== 'BinaryExpression' || right.left.type === 'PrivateName') {
    return null;
  }
  if (right.operator === '+' || right.operator === '-') {
    if (isVariable(right.left, variable)) {
      const step = evaluateConstant(right.right);
      if (step === null) return null;
      return right.operator === '+' ? step : -step;
    }
    if (right.operator === '+' && isVariable(right.right, variable)) {
      return evaluateConstant(right.left);
    }
  }
  return null;
}

/**
 * Whether anything in `node` assigns, increments or redeclares `name`
 */
export function writesVariable(node: t.Node, name: string): boolean {
  let written = false;
  t.traverseFast(node, (child) => {
    if (written) return;
    if (child.type === 'AssignmentExpression' && isVariable(child.left, name)) written = true;
    if (child.type === 'UpdateExpression' && isVariable(child.argument, name)) written = true;
    if (child.type === 'VariableDeclarator' && isVariable(child.id, name)) written = true;
  });
  return written;
}
