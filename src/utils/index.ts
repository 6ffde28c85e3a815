/**
 * Utils module exports
 */

export type { IntegerBinaryOperator, IntegerUnaryOperator } from './integer.js';
export {
  DivisionByZeroError,
  applyBinary,
  applyUnary,
  fromBoolean,
  toInt32,
  isIntegerBinaryOperator,
  isIntegerUnaryOperator,
  INT,
  integerTypeOf,
  wrapInteger,
  comparisonType,
} from './integer.js';
export { evaluateConstant, constantTruth, charConstantValue } from './constant.js';
