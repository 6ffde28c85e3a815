/**
 * Integer constant folding for subset-C expressions
 */

import type * as t from '@babel/types';
import {
  applyBinary,
  applyUnary,
  fromBoolean,
  isIntegerBinaryOperator,
  isIntegerUnaryOperator,
  DivisionByZeroError,
} from './integer.js';

/**
 * Character constants (`'a'`) parse as one-character string literals;
 * string literals proper stay non-constant.
 */
export function charConstantValue(node: t.StringLiteral): number | null {
  const raw = node.extra?.raw;
  if (typeof raw !== 'string' || !raw.startsWith("'")) return null;
  const code = node.value.codePointAt(0);
  return node.value.length === 1 && code !== undefined ? code : null;
}

/**
 * Evaluate an expression built only from integer constants.
 * Returns null for anything that depends on a variable.
 */
export function evaluateConstant(expr: t.Expression): number | null {
  try {
    return fold(expr);
  } catch (error) {
    if (error instanceof DivisionByZeroError) return null;
    throw error;
  }
}

/**
 * Truth value of a constant condition, or null when not constant
 */
export function constantTruth(expr: t.Expression | null | undefined): boolean | null {
  if (!expr) return null;
  const value = evaluateConstant(expr);
  return value === null ? null : value !== 0;
}

function fold(expr: t.Expression): number | null {
  switch (expr.type) {
    case 'NumericLiteral':
      return Number.isSafeInteger(expr.value) ? expr.value : null;

    case 'BooleanLiteral':
      return fromBoolean(expr.value);

    case 'StringLiteral':
      return charConstantValue(expr);

    case 'UnaryExpression': {
      if (!isIntegerUnaryOperator(expr.operator)) return null;
      const operand = fold(expr.argument);
      return operand === null ? null : applyUnary(expr.operator, operand);
    }

    case 'BinaryExpression': {
      if (expr.left.type === 'PrivateName' || !isIntegerBinaryOperator(expr.operator)) return null;
      const left = fold(expr.left);
      const right = fold(expr.right);
      return left === null || right === null ? null : applyBinary(expr.operator, left, right);
    }

    case 'LogicalExpression': {
      const left = fold(expr.left);
      if (left === null) return null;
      if (expr.operator === '&&') {
        if (left === 0) return 0;
      } else if (expr.operator === '||') {
        if (left !== 0) return 1;
      } else {
        return null;
      }
      const right = fold(expr.right);
      return right === null ? null : fromBoolean(right !== 0);
    }

    case 'ConditionalExpression': {
      const test = fold(expr.test);
      if (test === null) return null;
      return fold(test !== 0 ? expr.consequent : expr.alternate);
    }

    case 'ParenthesizedExpression':
      return fold(expr.expression);

    default:
      return null;
  }
}
