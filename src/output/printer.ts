/**
 * C-style printing of the expressions and statements held by CFG blocks
 */

import type * as t from '@babel/types';

const BINARY_PRECEDENCE: Readonly<Record<string, number>> = {
  '||': 4,
  '&&': 5,
  '|': 6,
  '^': 7,
  '&': 8,
  '==': 9,
  '!=': 9,
  '<': 10,
  '<=': 10,
  '>': 10,
  '>=': 10,
  '<<': 11,
  '>>': 11,
  '+': 12,
  '-': 12,
  '*': 13,
  '/': 13,
  '%': 13,
};

const UNARY_PRECEDENCE = 14;
const POSTFIX_PRECEDENCE = 15;
const ATOM_PRECEDENCE = 16;

function precedence(expr: t.Expression): number {
  switch (expr.type) {
    case 'SequenceExpression':
      return 1;
    case 'AssignmentExpression':
      return 2;
    case 'ConditionalExpression':
      return 3;
    case 'LogicalExpression':
    case 'BinaryExpression':
      return BINARY_PRECEDENCE[expr.operator] ?? 0;
    case 'UnaryExpression':
      return UNARY_PRECEDENCE;
    case 'UpdateExpression':
      return expr.prefix ? UNARY_PRECEDENCE : POSTFIX_PRECEDENCE;
    case 'MemberExpression':
      return POSTFIX_PRECEDENCE;
    default:
      return ATOM_PRECEDENCE;
  }
}

function literalText(raw: unknown, fallback: string): string {
  return typeof raw === 'string' ? raw : fallback;
}

/**
 * Print an expression, parenthesized if it binds looser than `minPrecedence`
 */
export function printExpression(expr: t.Expression, minPrecedence = 0): string {
  const text = printBare(expr);
  return precedence(expr) < minPrecedence ? `(${text})` : text;
}

function printOperand(node: t.Expression | t.PrivateName, minPrecedence: number): string {
  return node.type === 'PrivateName' ? `#${node.id.name}` : printExpression(node, minPrecedence);
}

/**
 * Operand of a prefix operator; `-(-x)` must not print as `--x`
 */
function printPrefixOperand(operator: string, argument: t.Expression): string {
  const text = printExpression(argument, UNARY_PRECEDENCE);
  const last = operator[operator.length - 1];
  return (last === '-' || last === '+') && text.startsWith(last) ? `(${text})` : text;
}

function printBare(expr: t.Expression): string {
  switch (expr.type) {
    case 'Identifier':
      return expr.name;

    case 'NumericLiteral':
      return literalText(expr.extra?.raw, String(expr.value));

    case 'StringLiteral':
      return literalText(expr.extra?.raw, JSON.stringify(expr.value));

    case 'BooleanLiteral':
      return String(expr.value);

    case 'UnaryExpression':
      return `${expr.operator}${printPrefixOperand(expr.operator, expr.argument)}`;

    case 'UpdateExpression':
      return expr.prefix
        ? `${expr.operator}${printPrefixOperand(expr.operator, expr.argument)}`
        : `${printExpression(expr.argument, POSTFIX_PRECEDENCE)}${expr.operator}`;

    case 'BinaryExpression':
    case 'LogicalExpression': {
      const own = precedence(expr);
      return `${printOperand(expr.left, own)} ${expr.operator} ${printExpression(expr.right, own + 1)}`;
    }

    case 'AssignmentExpression': {
      const left = expr.left.type === 'Identifier' || expr.left.type === 'MemberExpression'
        ? printExpression(expr.left, POSTFIX_PRECEDENCE)
        : `<${expr.left.type}>`;
      return `${left} ${expr.operator} ${printExpression(expr.right, 2)}`;
    }

    case 'ConditionalExpression':
      return `${printExpression(expr.test, 4)} ? ${printExpression(expr.consequent, 2)} : ${printExpression(expr.alternate, 3)}`;

    case 'MemberExpression': {
      const object = expr.object.type === 'Super' ? 'super' : printExpression(expr.object, POSTFIX_PRECEDENCE);
      return expr.computed
        ? `${object}[${printOperand(expr.property, 0)}]`
        : `${object}.${printOperand(expr.property, ATOM_PRECEDENCE)}`;
    }

    case 'SequenceExpression':
      return expr.expressions.map((item) => printExpression(item, 2)).join(', ');

    case 'ParenthesizedExpression':
      return `(${printExpression(expr.expression)})`;

    default:
      return `<${expr.type}>`;
  }
}

/**
 * Print a straight-line statement on one line
 */
export function printStatement(stmt: t.Statement): string {
  switch (stmt.type) {
    case 'ExpressionStatement':
      return `${printExpression(stmt.expression)};`;

    case 'VariableDeclaration': {
      const declarators = stmt.declarations.map((declarator) => {
        const name = declarator.id.type === 'Identifier' ? declarator.id.name : `<${declarator.id.type}>`;
        return declarator.init ? `${name} = ${printExpression(declarator.init, 2)}` : name;
      });
      return `${stmt.kind} ${declarators.join(', ')};`;
    }

    default:
      return `<${stmt.type}>`;
  }
}
