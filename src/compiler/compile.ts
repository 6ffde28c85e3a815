/**
 * Compiler pipeline
 *
 * source → function definitions → one CFG per function → verdicts.
 * Functions are lowered independently; a problem in one never stops the
 * others from being lowered and checked.
 */

import { buildCFG, validateCFG, type CFGValidationError } from '../cfg/index.js';
import { checkLegality, resolvePolicy, type LegalityPolicy, type PolicyOverrides, type PolicyPreset } from '../legality/index.js';
import { parse, type ParseError } from '../parser/index.js';
import type {
  CFG,
  FunctionDefinition,
  FunctionParameter,
  SourceLocation,
  Verdict,
  Violation,
} from '../types/index.js';

export interface CompileOptions {
  /** Source filename (for reports) */
  filename?: string;
  /** Preset name, full policy, or overrides of a preset */
  policy?: PolicyPreset | PolicyOverrides;
}

export const DEFAULT_COMPILE_OPTIONS: Required<CompileOptions> = {
  filename: '<input>',
  policy: 'bounded',
};

export interface FunctionResult {
  name: string;
  returnType: string;
  params: readonly FunctionParameter[];
  location: SourceLocation;
  /** The lowered function; only kept when it is accepted */
  cfg: CFG | null;
  violations: Violation[];
  /** Structural defects of the lowered graph itself */
  validationErrors: CFGValidationError[];
  accepted: boolean;
}

export interface CompileResult {
  filename: string;
  functions: FunctionResult[];
  /** Every violation: file-level problems first, then function by function */
  violations: Violation[];
  accepted: boolean;
  /** Verdict declared by the source's leading comment */
  expectation: Verdict | null;
}

function parseViolation(error: ParseError): Violation {
  return {
    kind: 'parse-error',
    message: error.message,
    functionName: error.functionName,
    location: { line: error.line, column: error.column },
  };
}

/**
 * Lower and check one function
 */
export function compileFunction(
  definition: FunctionDefinition,
  policy: LegalityPolicy = resolvePolicy(),
  parseErrors: readonly ParseError[] = []
): FunctionResult {
  const cfg = buildCFG(definition.body, definition.variables);
  const validationErrors = validateCFG(cfg);
  const violations = [
    ...parseErrors.map(parseViolation),
    ...checkLegality(cfg, definition.name, policy),
  ];
  const accepted = violations.length === 0 && validationErrors.length === 0;

  return {
    name: definition.name,
    returnType: definition.returnType,
    params: definition.params,
    location: definition.location,
    cfg: accepted ? cfg : null,
    violations,
    validationErrors,
    accepted,
  };
}

/**
 * Compile a subset-C translation unit
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
  const opts = { ...DEFAULT_COMPILE_OPTIONS, ...options };
  const policy = resolvePolicy(opts.policy);
  const parsed = parse(source, { filename: opts.filename });

  const compiled = new Set(parsed.functions.map((fn) => fn.name));
  const fileViolations = parsed.errors
    .filter((error) => error.functionName === null || !compiled.has(error.functionName))
    .map(parseViolation);

  const functions = parsed.functions.map((definition) =>
    compileFunction(
      definition,
      policy,
      parsed.errors.filter((error) => error.functionName === definition.name)
    )
  );

  return {
    filename: opts.filename,
    functions,
    violations: [...fileViolations, ...functions.flatMap((fn) => fn.violations)],
    accepted: fileViolations.length === 0 && functions.every((fn) => fn.accepted),
    expectation: parsed.expectation,
  };
}

export function verdictOf(result: CompileResult): Verdict {
  return result.accepted ? 'pass' : 'fail';
}

/**
 * Process exit status for a compile: 0 when accepted
 */
export function exitCode(result: CompileResult): number {
  return result.accepted ? 0 : 1;
}
