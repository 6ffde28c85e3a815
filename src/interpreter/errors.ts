/**
 * Interpreter errors
 */

export class StepLimitExceededError extends Error {
  readonly code = 'E_STEP_LIMIT';

  constructor(readonly stepLimit: number) {
    super(`Execution did not finish within ${stepLimit} block steps`);
    this.name = 'StepLimitExceededError';
  }
}

export class BufferBoundsError extends Error {
  readonly code = 'E_BUFFER_BOUNDS';

  constructor(
    readonly buffer: string,
    readonly index: number,
    readonly length: number
  ) {
    super(`Index ${index} is out of bounds for '${buffer}' (length ${length})`);
    this.name = 'BufferBoundsError';
  }
}

export class UnsupportedExpressionError extends Error {
  readonly code = 'E_UNSUPPORTED_EXPRESSION';

  constructor(readonly nodeType: string, detail?: string) {
    super(detail ? `Unsupported expression ${nodeType}: ${detail}` : `Unsupported expression ${nodeType}`);
    this.name = 'UnsupportedExpressionError';
  }
}

export class UndefinedVariableError extends Error {
  readonly code = 'E_UNDEFINED_VARIABLE';

  constructor(readonly variable: string) {
    super(`'${variable}' is not declared`);
    this.name = 'UndefinedVariableError';
  }
}

/** The graph sent control somewhere it cannot go */
export class MalformedCFGError extends Error {
  readonly code = 'E_MALFORMED_CFG';

  constructor(message: string) {
    super(message);
    this.name = 'MalformedCFGError';
  }
}
