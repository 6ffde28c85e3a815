/**
 * Statement Handlers - Process different statement types for CFG
 *
 * This module handles the CFG construction for the subset-C statements.
 */

import * as t from '@babel/types';
import { locationOf, loopKindOf } from '../../types/index.js';
import type { BlockId, EdgeKind, LoopStatement, StructuralDiagnostic } from '../../types/index.js';
import { constantTruth } from '../../utils/constant.js';
import type { BuildContext, MutableBlock, MutableLoop } from './types.js';
import { createBlock, startNewBlock, jumpTo, branchTo, closeInto, isDead } from './blocks.js';
import { NoEnclosingLoopError, type JumpContext, type LoopContext } from './scope.js';

/**
 * Process statements and build CFG
 */
export function processStatements(statements: readonly t.Statement[], context: BuildContext): void {
  const outerDeadRegion = context.inDeadRegion;

  for (const stmt of statements) {
    // If current block already has a terminator, start a new unreachable block
    if (context.currentBlock.terminator) {
      startNewBlock(context);
    }

    if (
      !context.inDeadRegion &&
      stmt.type !== 'EmptyStatement' &&
      isDead(context, context.currentBlock)
    ) {
      context.unreachable.push({ location: locationOf(stmt), block: context.currentBlock.id });
      context.inDeadRegion = true;
    }

    processStatement(stmt, context);
  }

  context.inDeadRegion = outerDeadRegion;
}

export function processStatement(stmt: t.Statement, context: BuildContext): void {
  switch (stmt.type) {
    case 'BlockStatement':
      processStatements(stmt.body, context);
      break;

    case 'ExpressionStatement':
    case 'VariableDeclaration':
      // Simple statements - just add to current block
      context.currentBlock.statements.push(stmt);
      break;

    case 'EmptyStatement':
      break;

    case 'IfStatement':
      processIfStatement(stmt, context);
      break;

    case 'WhileStatement':
      processWhileStatement(stmt, context);
      break;

    case 'DoWhileStatement':
      processDoWhileStatement(stmt, context);
      break;

    case 'ForStatement':
      processForStatement(stmt, context);
      break;

    case 'SwitchStatement':
      processSwitchStatement(stmt, context);
      break;

    case 'ReturnStatement':
      processReturnStatement(stmt, context);
      break;

    case 'BreakStatement':
      processBreakStatement(stmt, context);
      break;

    case 'ContinueStatement':
      processContinueStatement(stmt, context);
      break;

    default:
      reportDiagnostic(context, stmt, 'unsupported-statement', `Unsupported statement: ${describeStatement(stmt)}`);
  }
}

function describeStatement(stmt: t.Statement): string {
  switch (stmt.type) {
    case 'LabeledStatement':
      return `label '${stmt.label.name}'`;
    case 'FunctionDeclaration':
      return 'nested function definition';
    default:
      return stmt.type;
  }
}

function reportDiagnostic(
  context: BuildContext,
  node: t.Node,
  kind: StructuralDiagnostic['kind'],
  message: string
): void {
  context.diagnostics.push({
    kind,
    message,
    location: locationOf(node),
    block: context.currentBlock.id,
  });
}

function processIfStatement(stmt: t.IfStatement, context: BuildContext): void {
  const testBlock = context.currentBlock;

  // Create blocks for consequent, alternate, and merge point
  const consequentBlock = createBlock(context);
  const alternateBlock = stmt.alternate ? createBlock(context) : null;
  const mergeBlock = createBlock(context);

  branchTo(context, testBlock, stmt.test, consequentBlock.id, alternateBlock?.id ?? mergeBlock.id);

  // Process consequent
  context.currentBlock = consequentBlock;
  processStatement(stmt.consequent, context);
  closeInto(context, mergeBlock.id);

  // Process alternate if present
  if (alternateBlock && stmt.alternate) {
    context.currentBlock = alternateBlock;
    processStatement(stmt.alternate, context);
    closeInto(context, mergeBlock.id);
  }

  // Continue from merge block; it stays dead when both sides left
  context.currentBlock = mergeBlock;
}

/**
 * Terminate a loop test block, folding integer-constant conditions
 */
function terminateLoopTest(
  context: BuildContext,
  testBlock: MutableBlock,
  condition: t.Expression | null,
  constant: boolean | null,
  bodyId: BlockId,
  exitId: BlockId,
  bodyEdgeKind: EdgeKind
): void {
  if (condition === null || constant === true) {
    jumpTo(context, testBlock, bodyId, bodyEdgeKind);
  } else if (constant === false) {
    jumpTo(context, testBlock, exitId, 'normal');
  } else {
    branchTo(context, testBlock, condition, bodyId, exitId, bodyEdgeKind);
  }
}

function beginLoop(
  context: BuildContext,
  stmt: LoopStatement,
  blocks: { header: BlockId; body: BlockId; step: BlockId | null; exit: BlockId },
  condition: t.Expression | null
): MutableLoop {
  const loop: MutableLoop = {
    id: context.loops.length,
    kind: loopKindOf(stmt),
    statement: stmt,
    location: locationOf(stmt),
    ...blocks,
    condition,
    constantCondition: condition === null ? true : constantTruth(condition),
    breakSources: [],
    continueSources: [],
    returnSources: [],
    depth: context.loopStack.loopDepth + 1,
  };
  context.loops.push(loop);
  context.loopStack.push({
    kind: loop.kind,
    continueTarget: blocks.step ?? blocks.header,
    breakTarget: blocks.exit,
    loop,
  });
  return loop;
}

function processWhileStatement(stmt: t.WhileStatement, context: BuildContext): void {
  const headerBlock = createBlock(context);
  const bodyBlock = createBlock(context);
  const exitBlock = createBlock(context);

  jumpTo(context, context.currentBlock, headerBlock.id, 'normal');

  const loop = beginLoop(
    context,
    stmt,
    { header: headerBlock.id, body: bodyBlock.id, step: null, exit: exitBlock.id },
    stmt.test
  );
  terminateLoopTest(context, headerBlock, stmt.test, loop.constantCondition, bodyBlock.id, exitBlock.id, 'true-branch');

  // Process body; its end re-tests the condition
  context.currentBlock = bodyBlock;
  processStatement(stmt.body, context);
  closeInto(context, headerBlock.id, 'back-edge');

  context.loopStack.pop();
  context.currentBlock = exitBlock;
}

function processDoWhileStatement(stmt: t.DoWhileStatement, context: BuildContext): void {
  const bodyBlock = createBlock(context);
  const testBlock = createBlock(context);
  const exitBlock = createBlock(context);

  // Connect to body first
  jumpTo(context, context.currentBlock, bodyBlock.id, 'normal');

  // continue runs the condition test
  const loop = beginLoop(
    context,
    stmt,
    { header: testBlock.id, body: bodyBlock.id, step: null, exit: exitBlock.id },
    stmt.test
  );

  context.currentBlock = bodyBlock;
  processStatement(stmt.body, context);
  closeInto(context, testBlock.id);

  context.loopStack.pop();

  terminateLoopTest(context, testBlock, stmt.test, loop.constantCondition, bodyBlock.id, exitBlock.id, 'back-edge');

  context.currentBlock = exitBlock;
}

function expressionStatementAt(expression: t.Expression): t.ExpressionStatement {
  const stmt = t.expressionStatement(expression);
  stmt.loc = expression.loc;
  return stmt;
}

function processForStatement(stmt: t.ForStatement, context: BuildContext): void {
  // Init runs once, before the loop
  if (stmt.init) {
    if (stmt.init.type === 'VariableDeclaration') {
      context.currentBlock.statements.push(stmt.init);
    } else {
      context.currentBlock.statements.push(expressionStatementAt(stmt.init));
    }
  }

  const headerBlock = createBlock(context);
  const bodyBlock = createBlock(context);
  const stepBlock = createBlock(context);
  const exitBlock = createBlock(context);

  jumpTo(context, context.currentBlock, headerBlock.id, 'normal');

  // continue targets the step block, never the header
  const loop = beginLoop(
    context,
    stmt,
    { header: headerBlock.id, body: bodyBlock.id, step: stepBlock.id, exit: exitBlock.id },
    stmt.test ?? null
  );
  terminateLoopTest(context, headerBlock, stmt.test ?? null, loop.constantCondition, bodyBlock.id, exitBlock.id, 'true-branch');

  context.currentBlock = bodyBlock;
  processStatement(stmt.body, context);
  closeInto(context, stepBlock.id);

  context.loopStack.pop();

  if (stmt.update) {
    stepBlock.statements.push(expressionStatementAt(stmt.update));
  }
  jumpTo(context, stepBlock, headerBlock.id, 'back-edge');

  context.currentBlock = exitBlock;
}

/**
 * C switch: the discriminant is evaluated once into a temporary, then
 * compared against each case label in order.
 */
function processSwitchStatement(stmt: t.SwitchStatement, context: BuildContext): void {
  const exitBlock = createBlock(context);
  const caseBlocks = stmt.cases.map(() => createBlock(context));

  const temporary = t.identifier(`__switch${context.nextTemporary++}`);
  temporary.loc = stmt.discriminant.loc;
  const declaration = t.variableDeclaration('let', [t.variableDeclarator(temporary, stmt.discriminant)]);
  declaration.loc = stmt.discriminant.loc;
  context.currentBlock.statements.push(declaration);

  let dispatch = context.currentBlock;
  let defaultTarget: BlockId = exitBlock.id;

  for (const [index, caseStmt] of stmt.cases.entries()) {
    const caseBlock = caseBlocks[index];
    if (!caseBlock) continue;
    if (!caseStmt.test) {
      defaultTarget = caseBlock.id;
      continue;
    }
    const next = createBlock(context);
    const comparison = t.binaryExpression('==', t.cloneNode(temporary), caseStmt.test);
    comparison.loc = caseStmt.test.loc;
    branchTo(context, dispatch, comparison, caseBlock.id, next.id);
    dispatch = next;
  }
  jumpTo(context, dispatch, defaultTarget, 'normal');

  context.loopStack.push({ kind: 'switch', breakTarget: exitBlock.id });

  for (const [index, caseStmt] of stmt.cases.entries()) {
    const caseBlock = caseBlocks[index];
    if (!caseBlock) continue;
    context.currentBlock = caseBlock;
    processStatements(caseStmt.consequent, context);

    // Fall through to next case if no terminator
    closeInto(context, caseBlocks[index + 1]?.id ?? exitBlock.id);
  }

  context.loopStack.pop();
  context.currentBlock = exitBlock;
}

function processReturnStatement(stmt: t.ReturnStatement, context: BuildContext): void {
  const block = context.currentBlock;
  block.terminator = {
    kind: 'return',
    argument: stmt.argument ?? null,
  };

  const site = { block: block.id, location: locationOf(stmt) };
  context.returns.push({ ...site, isFinal: stmt === context.finalReturn });
  for (const active of context.loopStack.activeLoops()) {
    active.loop.returnSources.push(site);
  }
}

function processBreakStatement(stmt: t.BreakStatement, context: BuildContext): void {
  if (stmt.label) {
    reportDiagnostic(context, stmt, 'unsupported-statement', `Unsupported statement: labeled break '${stmt.label.name}'`);
    return;
  }

  let target: JumpContext;
  try {
    target = context.loopStack.breakContext();
  } catch (error) {
    if (!(error instanceof NoEnclosingLoopError)) throw error;
    reportDiagnostic(context, stmt, 'no-enclosing-loop', error.message);
    return;
  }

  const block = context.currentBlock;
  if (target.kind !== 'switch') {
    target.loop.breakSources.push({ block: block.id, location: locationOf(stmt) });
  }
  jumpTo(context, block, target.breakTarget, 'break', 'break');
}

function processContinueStatement(stmt: t.ContinueStatement, context: BuildContext): void {
  if (stmt.label) {
    reportDiagnostic(context, stmt, 'unsupported-statement', `Unsupported statement: labeled continue '${stmt.label.name}'`);
    return;
  }

  let target: LoopContext;
  try {
    target = context.loopStack.current();
  } catch (error) {
    if (!(error instanceof NoEnclosingLoopError)) throw error;
    reportDiagnostic(context, stmt, 'no-enclosing-loop', error.message);
    return;
  }

  const block = context.currentBlock;
  target.loop.continueSources.push({ block: block.id, location: locationOf(stmt) });
  jumpTo(context, block, target.continueTarget, 'continue', 'continue');
}
