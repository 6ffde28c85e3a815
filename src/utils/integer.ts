/**
 * C integer arithmetic over JavaScript numbers
 *
 * Values are treated as signed 32-bit integers. Comparisons and logical
 * negation yield 0 or 1.
 */

import type { IntegerType } from '../types/index.js';

export type IntegerBinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '<<'
  | '>>'
  | '&'
  | '|'
  | '^'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>=';

export type IntegerUnaryOperator = '-' | '+' | '!' | '~';

const BINARY_OPERATORS: ReadonlySet<string> = new Set<IntegerBinaryOperator>([
  '+', '-', '*', '/', '%', '<<', '>>', '&', '|', '^', '==', '!=', '<', '<=', '>', '>=',
]);

const UNARY_OPERATORS: ReadonlySet<string> = new Set<IntegerUnaryOperator>(['-', '+', '!', '~']);

export function isIntegerBinaryOperator(op: string): op is IntegerBinaryOperator {
  return BINARY_OPERATORS.has(op);
}

export function isIntegerUnaryOperator(op: string): op is IntegerUnaryOperator {
  return UNARY_OPERATORS.has(op);
}

export class DivisionByZeroError extends Error {
  public readonly code = 'E_DIVISION_BY_ZERO';

  constructor(op: '/' | '%') {
    super(`Integer ${op === '/' ? 'division' : 'remainder'} by zero`);
    this.name = 'DivisionByZeroError';
  }
}

export function toInt32(value: number): number {
  return value | 0;
}

export function fromBoolean(value: boolean): number {
  return value ? 1 : 0;
}

export function applyBinary(op: IntegerBinaryOperator, left: number, right: number): number {
  switch (op) {
    case '+':
      return toInt32(left + right);
    case '-':
      return toInt32(left - right);
    case '*':
      return Math.imul(left, right);
    case '/':
      if (right === 0) throw new DivisionByZeroError('/');
      return toInt32(Math.trunc(left / right));
    case '%':
      if (right === 0) throw new DivisionByZeroError('%');
      return toInt32(left % right);
    case '<<':
      return left << right;
    case '>>':
      return left >> right;
    case '&':
      return left & right;
    case '|':
      return left | right;
    case '^':
      return left ^ right;
    case '==':
      return fromBoolean(left === right);
    case '!=':
      return fromBoolean(left !== right);
    case '<':
      return fromBoolean(left < right);
    case '<=':
      return fromBoolean(left <= right);
    case '>':
      return fromBoolean(left > right);
    case '>=':
      return fromBoolean(left >= right);
  }
}

export function applyUnary(op: IntegerUnaryOperator, operand: number): number {
  switch (op) {
    case '-':
      return toInt32(-operand);
    case '+':
      return operand;
    case '!':
      return fromBoolean(operand === 0);
    case '~':
      return ~operand;
  }
}

export const INT: IntegerType = { signed: true, bits: 32 };

const NON_INTEGER_WORDS: ReadonlySet<string> = new Set(['float', 'double', '_Bool', 'bool', 'void']);

const WIDTH_OF_WORD: Readonly<Record<string, IntegerType['bits']>> = {
  char: 8,
  int8_t: 8,
  uint8_t: 8,
  short: 16,
  int16_t: 16,
  uint16_t: 16,
  long: 64,
  int64_t: 64,
  uint64_t: 64,
  size_t: 64,
};

const UNSIGNED_WORDS: ReadonlySet<string> = new Set(['unsigned', 'uint8_t', 'uint16_t', 'uint32_t', 'uint64_t', 'size_t']);

/**
 * Integer type named by C declaration specifiers (`unsigned`, `const int`,
 * `uint8_t`), or null for anything that is not an integer type.
 * `long` is 64 bits wide.
 */
export function integerTypeOf(specifiers: string): IntegerType | null {
  const words = specifiers.split(/\s+/).filter((word) => word !== '');
  if (words.some((word) => NON_INTEGER_WORDS.has(word))) return null;

  let bits: IntegerType['bits'] = 32;
  for (const word of words) {
    bits = WIDTH_OF_WORD[word] ?? bits;
  }
  return { signed: !words.some((word) => UNSIGNED_WORDS.has(word)), bits };
}

/**
 * Wrap `value` into the range of `type`
 */
export function wrapInteger(value: number, type: IntegerType): number {
  if (type.bits === 32) return type.signed ? value | 0 : value >>> 0;
  const wide = BigInt(Math.trunc(value));
  return Number(type.signed ? BigInt.asIntN(type.bits, wide) : BigInt.asUintN(type.bits, wide));
}

/**
 * Type both operands of a comparison with a `type` variable convert to.
 * Types narrower than int are promoted to int.
 */
export function comparisonType(type: IntegerType): IntegerType {
  return type.bits < 32 ? INT : type;
}
