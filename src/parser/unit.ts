/**
 * Translation unit splitting and source masking
 *
 * Finds function definitions and file-scope declarations in the token
 * stream, then produces a masked copy of the source that babel can parse:
 * everything outside function bodies becomes blanks, and C declaration
 * specifiers at the start of a local declaration become `let`. Offsets and
 * line breaks are preserved, so babel locations are source locations.
 */

import type { Token } from './scanner.js';

/**
 * Declaration specifiers that introduce a local declaration
 */
export const TYPE_KEYWORDS: ReadonlySet<string> = new Set([
  'void',
  'char',
  'short',
  'int',
  'long',
  'float',
  'double',
  'signed',
  'unsigned',
  'const',
  'volatile',
  'static',
  'register',
  '_Bool',
  'bool',
  'size_t',
  'int8_t',
  'int16_t',
  'int32_t',
  'int64_t',
  'uint8_t',
  'uint16_t',
  'uint32_t',
  'uint64_t',
]);

export interface RawParameter {
  readonly name: string;
  readonly type: string;
  readonly isArray: boolean;
  readonly isPointer: boolean;
  readonly offset: number;
}

export interface RawFunction {
  readonly name: string;
  readonly returnType: string;
  readonly params: readonly RawParameter[];
  /** Offset of the first header token */
  readonly start: number;
  /** Offset of the body's opening brace */
  readonly bodyStart: number;
  /** Offset one past the body's closing brace */
  readonly bodyEnd: number;
  /** Token indices of the body braces */
  readonly openIndex: number;
  readonly closeIndex: number;
}

/**
 * One declarator of a local declaration
 */
export interface RawDeclaration {
  readonly name: string;
  /** Specifier words, e.g. `unsigned` or `const int` */
  readonly type: string;
  readonly isPointer: boolean;
  /** Offset of the declaration's first specifier */
  readonly offset: number;
}

export interface RawGlobal {
  readonly start: number;
  readonly end: number;
}

export interface UnitError {
  readonly message: string;
  readonly offset: number;
}

export interface SplitResult {
  readonly functions: RawFunction[];
  readonly globals: RawGlobal[];
  readonly errors: UnitError[];
}

const OPENERS: Readonly<Record<string, string>> = { '(': ')', '[': ']', '{': '}' };

/**
 * Index of the token closing the bracket at `open`, or -1
 */
function findClose(tokens: readonly Token[], open: number): number {
  const stack: string[] = [];
  for (let i = open; i < tokens.length; i++) {
    const value = tokens[i]?.value ?? '';
    const closer = OPENERS[value];
    if (closer) {
      stack.push(closer);
    } else if (value === stack[stack.length - 1]) {
      stack.pop();
      if (stack.length === 0) return i;
    }
  }
  return -1;
}

function splitOnCommas(tokens: readonly Token[]): Token[][] {
  const parts: Token[][] = [[]];
  let depth = 0;
  for (const token of tokens) {
    if (token.value === '(' || token.value === '[') depth++;
    if (token.value === ')' || token.value === ']') depth--;
    if (token.value === ',' && depth === 0) {
      parts.push([]);
    } else {
      parts[parts.length - 1]?.push(token);
    }
  }
  return parts;
}

function parseParameters(tokens: readonly Token[], errors: UnitError[]): RawParameter[] {
  if (tokens.length === 0) return [];
  if (tokens.length === 1 && tokens[0]?.value === 'void') return [];

  const params: RawParameter[] = [];
  for (const part of splitOnCommas(tokens)) {
    const bracket = part.findIndex((token) => token.value === '[');
    const declarator = bracket === -1 ? part : part.slice(0, bracket);
    const nameIndex = declarator.map((token) => token.kind).lastIndexOf('identifier');
    const name = declarator[nameIndex];
    if (!name || nameIndex === 0 || TYPE_KEYWORDS.has(name.value)) {
      errors.push({ message: 'Expected a named parameter', offset: part[0]?.start ?? 0 });
      continue;
    }
    params.push({
      name: name.value,
      type: declarator
        .slice(0, nameIndex)
        .filter((token) => token.kind === 'identifier')
        .map((token) => token.value)
        .join(' '),
      isArray: bracket !== -1,
      isPointer: declarator.some((token) => token.value === '*'),
      offset: name.start,
    });
  }
  return params;
}

/**
 * Split a token stream into function definitions and file-scope declarations
 */
export function splitTranslationUnit(tokens: readonly Token[]): SplitResult {
  const functions: RawFunction[] = [];
  const globals: RawGlobal[] = [];
  const errors: UnitError[] = [];

  let i = 0;
  while (i < tokens.length) {
    const first = tokens[i];
    if (!first) break;

    let j = i;
    let handled = false;
    while (j < tokens.length && !handled) {
      const token = tokens[j];
      if (!token) break;

      if (token.value === '(' || token.value === '[') {
        const close = findClose(tokens, j);
        if (close === -1) break;
        j = close + 1;
        continue;
      }

      if (token.value === ';') {
        globals.push({ start: first.start, end: token.end });
        i = j + 1;
        handled = true;
        continue;
      }

      if (token.value === '{') {
        const close = findClose(tokens, j);
        if (close === -1) break;
        const previous = tokens[j - 1];

        if (previous?.value === ')') {
          const header = tokens.slice(i, j);
          const paren = header.findIndex((t) => t.value === '(');
          const name = header[paren - 1];
          const closeParen = paren === -1 ? -1 : findClose(header, paren);
          if (!name || name.kind !== 'identifier' || closeParen === -1) {
            errors.push({ message: 'Malformed function definition', offset: first.start });
          } else {
            functions.push({
              name: name.value,
              returnType: header
                .slice(0, paren - 1)
                .map((t) => t.value)
                .join(' '),
              params: parseParameters(header.slice(paren + 1, closeParen), errors),
              start: first.start,
              bodyStart: token.start,
              bodyEnd: tokens[close]?.end ?? token.end,
              openIndex: j,
              closeIndex: close,
            });
          }
          i = close + 1;
          handled = true;
          continue;
        }

        // Aggregate initializer or type definition: runs on to the ';'
        j = close + 1;
        continue;
      }

      j++;
    }

    if (!handled) {
      errors.push({ message: 'Unexpected end of input', offset: first.start });
      break;
    }
  }

  return { functions, globals, errors };
}

function isStatementStart(tokens: readonly Token[], index: number, open: number): boolean {
  if (index === open + 1) return true;
  const previous = tokens[index - 1]?.value;
  if (previous === '{' || previous === '}' || previous === ';') return true;
  return previous === '(' && tokens[index - 2]?.value === 'for';
}

function blank(chars: string[], start: number, end: number): void {
  for (let k = start; k < end; k++) {
    if (chars[k] !== '\n') chars[k] = ' ';
  }
}

/**
 * Rewrite the local declarations of one function body in place, collecting
 * their declarators
 */
function maskDeclarations(
  chars: string[],
  tokens: readonly Token[],
  fn: RawFunction,
  errors: UnitError[]
): RawDeclaration[] {
  const declarations: RawDeclaration[] = [];
  for (let k = fn.openIndex + 1; k < fn.closeIndex; k++) {
    const token = tokens[k];
    if (!token || token.kind !== 'identifier' || !TYPE_KEYWORDS.has(token.value)) continue;
    if (!isStatementStart(tokens, k, fn.openIndex)) continue;

    // Run of specifiers and pointer stars
    let end = k;
    while (end + 1 < fn.closeIndex) {
      const next = tokens[end + 1];
      if (!next || !(next.value === '*' || (next.kind === 'identifier' && TYPE_KEYWORDS.has(next.value)))) break;
      end++;
    }
    const declarator = tokens[end + 1];
    const last = tokens[end];
    if (!declarator || declarator.kind !== 'identifier' || !last) continue;

    const specifiers = tokens.slice(k, end + 1);
    const type = specifiers
      .filter((specifier) => specifier.kind === 'identifier')
      .map((specifier) => specifier.value)
      .join(' ');
    const declare = (name: string, isPointer: boolean): void => {
      declarations.push({ name, type, isPointer, offset: token.start });
    };
    declare(declarator.value, specifiers.some((specifier) => specifier.value === '*'));

    blank(chars, token.start, last.end);
    chars[token.start] = 'l';
    chars[token.start + 1] = 'e';
    chars[token.start + 2] = 't';

    // Later declarators: `int a, *b;`
    let depth = 0;
    for (let m = end + 1; m < fn.closeIndex; m++) {
      const current = tokens[m];
      if (!current) break;
      if (current.value === '(' || current.value === '{') depth++;
      if (current.value === ')' || current.value === '}') depth--;
      if (depth < 0 || (depth === 0 && current.value === ';')) break;
      if (depth !== 0) continue;

      if (current.value === '*' && tokens[m - 1]?.value === ',') {
        blank(chars, current.start, current.end);
      }
      if (current.kind === 'identifier' && m > end + 1 && isDeclaratorName(tokens, m, end)) {
        declare(current.value, tokens[m - 1]?.value === '*');
      }
      if (current.value === '[' && tokens[m - 1]?.kind === 'identifier' && isDeclaratorName(tokens, m - 1, end)) {
        errors.push({ message: 'Local array declarations are not supported', offset: current.start });
      }
    }
    k = end;
  }
  return declarations;
}

/** `name` directly after the specifier run or after a top-level comma */
function isDeclaratorName(tokens: readonly Token[], index: number, specifierEnd: number): boolean {
  if (index === specifierEnd + 1) return true;
  let before = index - 1;
  while (tokens[before]?.value === '*') before--;
  return tokens[before]?.value === ',';
}

export interface MaskResult {
  readonly masked: string;
  /** Local declarations of each function, in source order */
  readonly declarations: ReadonlyMap<RawFunction, readonly RawDeclaration[]>;
  readonly errors: UnitError[];
}

/**
 * Produce the babel-parseable copy of `source`
 */
export function maskSource(source: string, tokens: readonly Token[], functions: readonly RawFunction[]): MaskResult {
  const original = source.split('');
  const chars = source.split('').map<string>((ch) => (ch === '\n' ? '\n' : ' '));
  const errors: UnitError[] = [];
  const declarations = new Map<RawFunction, readonly RawDeclaration[]>();

  for (const fn of functions) {
    for (let k = fn.bodyStart; k < fn.bodyEnd; k++) {
      chars[k] = original[k] ?? ' ';
    }
    blankBetweenTokens(chars, tokens, fn);
    declarations.set(fn, maskDeclarations(chars, tokens, fn, errors));
  }

  return { masked: chars.join(''), declarations, errors };
}

/**
 * Blank the bodies of every function but `keep`, so that a syntax error in
 * one body cannot hide the others
 */
export function isolateFunction(masked: string, functions: readonly RawFunction[], keep: RawFunction): string {
  const chars = masked.split('');
  for (const fn of functions) {
    if (fn !== keep) blank(chars, fn.bodyStart, fn.bodyEnd);
  }
  return chars.join('');
}

/**
 * Blank everything between body tokens; removes comments and preprocessor
 * lines, which babel cannot read.
 */
function blankBetweenTokens(chars: string[], tokens: readonly Token[], fn: RawFunction): void {
  for (let k = fn.openIndex; k < fn.closeIndex; k++) {
    const token = tokens[k];
    const next = tokens[k + 1];
    if (!token || !next) continue;
    blank(chars, token.end, next.start);
  }
}
