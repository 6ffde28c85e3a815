/**
 * Expression evaluation over the machine state
 *
 * C integer semantics: every value is a signed 32-bit integer, comparisons
 * and logical operators yield 0 or 1.
 */

import type * as t from '@babel/types';
import { charConstantValue } from '../utils/constant.js';
import {
  applyBinary,
  applyUnary,
  fromBoolean,
  isIntegerBinaryOperator,
  isIntegerUnaryOperator,
  toInt32,
} from '../utils/integer.js';
import { BufferBoundsError, UndefinedVariableError, UnsupportedExpressionError } from './errors.js';

export interface BufferWrite {
  readonly buffer: string;
  readonly index: number;
  readonly value: number;
}

export interface MachineState {
  readonly variables: Map<string, number>;
  /** Fixed-length buffers; unset cells hold 0 */
  readonly buffers: Map<string, number[]>;
  /** Every buffer store, in order */
  readonly writes: BufferWrite[];
}

export function createMachineState(
  params: Readonly<Record<string, number>>,
  buffers: Readonly<Record<string, number | readonly number[]>>
): MachineState {
  const state: MachineState = { variables: new Map(), buffers: new Map(), writes: [] };
  for (const [name, value] of Object.entries(params)) {
    state.variables.set(name, toInt32(value));
  }
  for (const [name, contents] of Object.entries(buffers)) {
    state.buffers.set(
      name,
      typeof contents === 'number' ? new Array<number>(contents).fill(0) : contents.map(toInt32)
    );
  }
  return state;
}

/**
 * A storage location an assignment can target
 */
interface LValue {
  read(): number;
  write(value: number): void;
}

function variableLValue(name: string, state: MachineState): LValue {
  if (!state.variables.has(name)) throw new UndefinedVariableError(name);
  return {
    read: () => state.variables.get(name) ?? 0,
    write: (value) => {
      state.variables.set(name, value);
    },
  };
}

function bufferLValue(expr: t.MemberExpression, state: MachineState): LValue {
  if (!expr.computed || expr.object.type !== 'Identifier' || expr.property.type === 'PrivateName') {
    throw new UnsupportedExpressionError(expr.type, 'only indexing a named buffer is supported');
  }
  const name = expr.object.name;
  const buffer = state.buffers.get(name);
  if (!buffer) throw new UndefinedVariableError(name);

  const index = evaluate(expr.property, state);
  if (index < 0 || index >= buffer.length) {
    throw new BufferBoundsError(name, index, buffer.length);
  }
  return {
    read: () => buffer[index] ?? 0,
    write: (value) => {
      buffer[index] = value;
      state.writes.push({ buffer: name, index, value });
    },
  };
}

function resolveLValue(node: t.Node, state: MachineState): LValue {
  switch (node.type) {
    case 'Identifier':
      return variableLValue(node.name, state);
    case 'MemberExpression':
      return bufferLValue(node, state);
    default:
      throw new UnsupportedExpressionError(node.type, 'not assignable');
  }
}

/**
 * Evaluate an expression, applying its side effects to `state`
 */
export function evaluate(expr: t.Expression, state: MachineState): number {
  switch (expr.type) {
    case 'NumericLiteral':
      if (!Number.isInteger(expr.value)) {
        throw new UnsupportedExpressionError(expr.type, `non-integer constant ${expr.value}`);
      }
      return toInt32(expr.value);

    case 'BooleanLiteral':
      return fromBoolean(expr.value);

    case 'StringLiteral': {
      const value = charConstantValue(expr);
      if (value === null) throw new UnsupportedExpressionError(expr.type, 'string literals have no integer value');
      return value;
    }

    case 'Identifier':
      return variableLValue(expr.name, state).read();

    case 'MemberExpression':
      return bufferLValue(expr, state).read();

    case 'UnaryExpression':
      if (!isIntegerUnaryOperator(expr.operator)) {
        throw new UnsupportedExpressionError(expr.type, `operator '${expr.operator}'`);
      }
      return applyUnary(expr.operator, evaluate(expr.argument, state));

    case 'BinaryExpression': {
      if (expr.left.type === 'PrivateName' || !isIntegerBinaryOperator(expr.operator)) {
        throw new UnsupportedExpressionError(expr.type, `operator '${expr.operator}'`);
      }
      const left = evaluate(expr.left, state);
      return applyBinary(expr.operator, left, evaluate(expr.right, state));
    }

    case 'LogicalExpression': {
      if (expr.operator === '??') throw new UnsupportedExpressionError(expr.type, "operator '??'");
      const left = evaluate(expr.left, state) !== 0;
      if (expr.operator === '&&' ? !left : left) return fromBoolean(left);
      return fromBoolean(evaluate(expr.right, state) !== 0);
    }

    case 'ConditionalExpression':
      return evaluate(evaluate(expr.test, state) !== 0 ? expr.consequent : expr.alternate, state);

    case 'AssignmentExpression':
      return assign(expr, state);

    case 'UpdateExpression': {
      const target = resolveLValue(expr.argument, state);
      const previous = target.read();
      const next = toInt32(previous + (expr.operator === '++' ? 1 : -1));
      target.write(next);
      return expr.prefix ? next : previous;
    }

    case 'SequenceExpression': {
      let value = 0;
      for (const item of expr.expressions) {
        value = evaluate(item, state);
      }
      return value;
    }

    case 'ParenthesizedExpression':
      return evaluate(expr.expression, state);

    default:
      throw new UnsupportedExpressionError(expr.type);
  }
}

function assign(expr: t.AssignmentExpression, state: MachineState): number {
  const target = resolveLValue(expr.left, state);
  if (expr.operator === '=') {
    const value = evaluate(expr.right, state);
    target.write(value);
    return value;
  }

  // Compound assignment: `a op= b`
  const op = expr.operator.slice(0, -1);
  if (!isIntegerBinaryOperator(op)) {
    throw new UnsupportedExpressionError(expr.type, `operator '${expr.operator}'`);
  }
  const value = applyBinary(op, target.read(), evaluate(expr.right, state));
  target.write(value);
  return value;
}

/**
 * Run the declarations and expression statements of a block
 */
export function executeStatement(stmt: t.Statement, state: MachineState): void {
  switch (stmt.type) {
    case 'ExpressionStatement':
      evaluate(stmt.expression, state);
      return;

    case 'VariableDeclaration':
      for (const declarator of stmt.declarations) {
        if (declarator.id.type !== 'Identifier') {
          throw new UnsupportedExpressionError(declarator.id.type, 'declarations bind plain names');
        }
        // Uninitialized locals start at 0
        state.variables.set(declarator.id.name, declarator.init ? evaluate(declarator.init, state) : 0);
      }
      return;

    default:
      throw new UnsupportedExpressionError(stmt.type, 'not a straight-line statement');
  }
}
