/**
 * CFG interpreter
 *
 * Executes a lowered function block by block, following terminators. Used to
 * check that a lowering preserves the meaning of the source.
 */

import type { CFG, BlockId } from '../types/index.js';
import { createMachineState, evaluate, executeStatement, type BufferWrite } from './expressions.js';
import { MalformedCFGError, StepLimitExceededError } from './errors.js';

export interface ExecuteOptions {
  /** Initial values of scalar parameters */
  params?: Readonly<Record<string, number>>;
  /** Buffers by name: a length (zero-filled) or the initial contents */
  buffers?: Readonly<Record<string, number | readonly number[]>>;
  /** Maximum number of blocks entered */
  stepLimit?: number;
}

export const DEFAULT_EXECUTE_OPTIONS: Required<ExecuteOptions> = {
  params: {},
  buffers: {},
  stepLimit: 100_000,
};

export interface ExecutionResult {
  /** Value of the `return` that ended the run; null for `return;` or falling off the end */
  returnValue: number | null;
  variables: ReadonlyMap<string, number>;
  buffers: ReadonlyMap<string, readonly number[]>;
  writes: readonly BufferWrite[];
  /** Blocks entered */
  steps: number;
}

export function execute(cfg: CFG, options: ExecuteOptions = {}): ExecutionResult {
  const opts = { ...DEFAULT_EXECUTE_OPTIONS, ...options };
  const state = createMachineState(opts.params, opts.buffers);

  let current: BlockId = cfg.entry;
  let steps = 0;

  for (;;) {
    if (steps === opts.stepLimit) throw new StepLimitExceededError(opts.stepLimit);
    steps++;

    const block = cfg.blocks.get(current);
    if (!block) throw new MalformedCFGError(`Control reached unknown block ${current}`);

    for (const stmt of block.statements) {
      executeStatement(stmt, state);
    }

    const terminator = block.terminator;
    switch (terminator.kind) {
      case 'fallthrough':
        current = terminator.next;
        break;

      case 'branch':
        current = evaluate(terminator.condition, state) !== 0 ? terminator.consequent : terminator.alternate;
        break;

      case 'return':
        return {
          returnValue: terminator.argument ? evaluate(terminator.argument, state) : null,
          variables: state.variables,
          buffers: state.buffers,
          writes: state.writes,
          steps,
        };

      case 'unreachable':
        throw new MalformedCFGError(`Control reached unreachable block ${block.id}`);
    }
  }
}
