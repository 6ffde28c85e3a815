/**
 * Loop stack - resolves break/continue targets during lowering
 *
 * `break` and `continue` refer to the innermost lexically enclosing loop,
 * whatever `if` or block statements sit in between. A `switch` captures
 * `break` but is transparent to `continue`.
 */

import type { BlockId, JumpKind, LoopKind } from '../../types/index.js';
import type { MutableLoop } from './types.js';

export interface LoopContext {
  readonly kind: LoopKind;
  readonly continueTarget: BlockId;
  readonly breakTarget: BlockId;
  readonly loop: MutableLoop;
}

export interface SwitchContext {
  readonly kind: 'switch';
  readonly breakTarget: BlockId;
}

export type JumpContext = LoopContext | SwitchContext;

export class NoEnclosingLoopError extends Error {
  public readonly code = 'E_NO_ENCLOSING_LOOP';
  public readonly statement: JumpKind;

  constructor(statement: JumpKind) {
    super(
      statement === 'break'
        ? "'break' statement not within a loop or switch"
        : "'continue' statement not within a loop"
    );
    this.name = 'NoEnclosingLoopError';
    this.statement = statement;
  }
}

export class LoopStackUnderflowError extends Error {
  public readonly code = 'E_LOOP_STACK_UNDERFLOW';

  constructor() {
    super('pop() called on an empty loop stack');
    this.name = 'LoopStackUnderflowError';
  }
}

export class LoopStack {
  private readonly frames: JumpContext[] = [];

  push(context: JumpContext): void {
    this.frames.push(context);
  }

  pop(): JumpContext {
    const frame = this.frames.pop();
    if (!frame) throw new LoopStackUnderflowError();
    return frame;
  }

  /**
   * Innermost enclosing loop (the continue target)
   */
  current(): LoopContext {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame && frame.kind !== 'switch') return frame;
    }
    throw new NoEnclosingLoopError('continue');
  }

  /**
   * Innermost enclosing loop or switch (the break target)
   */
  breakContext(): JumpContext {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw new NoEnclosingLoopError('break');
    return frame;
  }

  /**
   * All active loops, outermost first
   */
  activeLoops(): LoopContext[] {
    return this.frames.filter((frame): frame is LoopContext => frame.kind !== 'switch');
  }

  get loopDepth(): number {
    return this.activeLoops().length;
  }

  get size(): number {
    return this.frames.length;
  }
}
