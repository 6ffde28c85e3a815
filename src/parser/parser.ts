/**
 * Subset-C parser
 *
 * Uses @babel/parser for statements and expressions: the control-flow and
 * expression syntax of the subset coincides with JavaScript once the C
 * declaration specifiers are masked (see unit.ts).
 */

import { parse as babelParse, type ParserOptions } from '@babel/parser';
import type * as t from '@babel/types';
import type {
  DeclaredVariable,
  FunctionDefinition,
  FunctionParameter,
  GlobalDeclaration,
  SourceLocation,
  Verdict,
} from '../types/index.js';
import { scan, LineMap } from './scanner.js';
import { integerTypeOf } from '../utils/integer.js';
import {
  splitTranslationUnit,
  maskSource,
  isolateFunction,
  type RawDeclaration,
  type RawFunction,
} from './unit.js';

export interface ParseOptions {
  /** Source filename (for error messages) */
  filename?: string;
}

export interface ParseResult {
  /** Function definitions in source order */
  functions: FunctionDefinition[];
  /** File-scope declarations, recorded but not lowered */
  globals: GlobalDeclaration[];
  /** Verdict declared by a leading `// Should pass|fail` comment */
  expectation: Verdict | null;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
  /** Function whose body contains the error, if any */
  functionName: string | null;
}

const EXPECTATION_PATTERN = /^\/\/\s*should\s+(pass|fail)\b/i;

/**
 * Read the expected verdict from the comment lines that open a fixture
 */
export function parseExpectation(source: string): Verdict | null {
  for (const rawLine of source.split('\n')) {
    const line = rawLine.trim();
    if (line === '') continue;
    if (!line.startsWith('//')) return null;
    const match = EXPECTATION_PATTERN.exec(line);
    if (match?.[1]) return match[1].toLowerCase() === 'pass' ? 'pass' : 'fail';
  }
  return null;
}

/**
 * babel raises these for break/continue outside a loop; the lowering
 * reports them itself as no-enclosing-loop.
 */
const LOWERING_REPORTED_CODES: ReadonlySet<string> = new Set(['IllegalBreakContinue']);

interface BabelErrorInfo {
  message: string;
  reasonCode: string | null;
  offset: number | null;
}

function describeBabelError(error: unknown): BabelErrorInfo {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error), reasonCode: null, offset: null };
  }
  const message = 'message' in error && typeof error.message === 'string' ? error.message : String(error);
  const reasonCode = 'reasonCode' in error && typeof error.reasonCode === 'string' ? error.reasonCode : null;
  const offset = 'pos' in error && typeof error.pos === 'number' ? error.pos : null;
  return { message, reasonCode, offset };
}

interface BodyParse {
  body: t.BlockStatement | null;
  errors: BabelErrorInfo[];
}

/**
 * Parse the body of `raw` out of a copy of the source in which it is the
 * only function left
 */
function parseBody(isolated: string, raw: RawFunction, parserOptions: ParserOptions): BodyParse {
  try {
    const ast = babelParse(isolated, parserOptions);
    const babelErrors: readonly unknown[] = ast.errors ?? [];
    const errors = babelErrors
      .map(describeBabelError)
      .filter((info) => info.reasonCode === null || !LOWERING_REPORTED_CODES.has(info.reasonCode));
    const body = ast.program.body.find(
      (stmt): stmt is t.BlockStatement => stmt.type === 'BlockStatement' && stmt.start === raw.bodyStart
    );
    return { body: body ?? null, errors };
  } catch (error) {
    // Unrecoverable syntax error in this body
    if (!(error instanceof SyntaxError)) throw error;
    return { body: null, errors: [describeBabelError(error)] };
  }
}

/**
 * Parse a subset-C translation unit
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const lines = new LineMap(source);
  const errors: ParseError[] = [];
  const at = (offset: number): SourceLocation => lines.locate(offset);

  const { tokens, errors: scanErrors } = scan(source);
  const split = splitTranslationUnit(tokens);
  const { masked, declarations, errors: maskErrors } = maskSource(source, tokens, split.functions);

  const owner = (offset: number): string | null =>
    split.functions.find((fn) => offset >= fn.start && offset < fn.bodyEnd)?.name ?? null;

  for (const error of [...scanErrors, ...split.errors, ...maskErrors]) {
    errors.push({ message: error.message, ...at(error.offset), functionName: owner(error.offset) });
  }

  const parserOptions: ParserOptions = {
    sourceType: 'script',
    sourceFilename: options.filename,
    errorRecovery: true, // Continue parsing after errors
    allowReturnOutsideFunction: true,
  };

  const functions: FunctionDefinition[] = [];
  for (const raw of split.functions) {
    const { body, errors: bodyErrors } = parseBody(isolateFunction(masked, split.functions, raw), raw, parserOptions);
    for (const info of bodyErrors) {
      errors.push({ message: info.message, ...at(info.offset ?? raw.bodyStart), functionName: raw.name });
    }
    if (!body) {
      if (!errors.some((error) => error.functionName === raw.name)) {
        errors.push({ message: `Could not parse the body of '${raw.name}'`, ...at(raw.bodyStart), functionName: raw.name });
      }
      continue;
    }
    functions.push(toDefinition(raw, body, declarations.get(raw) ?? [], at));
  }

  const globals: GlobalDeclaration[] = split.globals.map((global) => ({
    text: source.slice(global.start, global.end).replace(/\s+/g, ' '),
    location: at(global.start),
  }));

  return { functions, globals, expectation: parseExpectation(source), errors };
}

function toDefinition(
  raw: RawFunction,
  body: t.BlockStatement,
  locals: readonly RawDeclaration[],
  at: (offset: number) => SourceLocation
): FunctionDefinition {
  const params: FunctionParameter[] = raw.params.map((param) => ({
    name: param.name,
    type: param.type,
    isArray: param.isArray,
    isPointer: param.isPointer,
    location: at(param.offset),
  }));
  const variables: DeclaredVariable[] = [
    ...params.map((param) => ({
      name: param.name,
      type: param.isArray || param.isPointer ? null : integerTypeOf(param.type),
      location: param.location,
    })),
    ...locals.map((local) => ({
      name: local.name,
      type: local.isPointer ? null : integerTypeOf(local.type),
      location: at(local.offset),
    })),
  ];
  return {
    name: raw.name,
    returnType: raw.returnType,
    params,
    body,
    variables,
    location: at(raw.start),
  };
}
