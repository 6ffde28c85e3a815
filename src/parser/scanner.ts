/**
 * Subset-C scanner
 *
 * Splits source text into the coarse tokens the front end needs to find
 * function definitions and local declarations. Comments and preprocessor
 * lines are skipped; every token keeps its source offsets.
 */

export type TokenKind = 'identifier' | 'number' | 'string' | 'char' | 'punctuator';

export interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  /** Offset of the first character */
  readonly start: number;
  /** Offset one past the last character */
  readonly end: number;
}

export interface ScanError {
  readonly message: string;
  readonly offset: number;
}

export interface ScanResult {
  readonly tokens: Token[];
  readonly errors: ScanError[];
}

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;
const NUMBER_PART = /[A-Za-z0-9_.]/;

export function scan(source: string): ScanResult {
  const tokens: Token[] = [];
  const errors: ScanError[] = [];
  let pos = 0;
  let atLineStart = true;

  while (pos < source.length) {
    const ch = source.charAt(pos);

    if (ch === '\n') {
      atLineStart = true;
      pos++;
      continue;
    }
    if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\f' || ch === '\v') {
      pos++;
      continue;
    }

    // Preprocessor directive: skip to end of line, honouring continuations
    if (ch === '#' && atLineStart) {
      while (pos < source.length && source.charAt(pos) !== '\n') {
        if (source.charAt(pos) === '\\' && source.charAt(pos + 1) === '\n') pos++;
        pos++;
      }
      continue;
    }
    atLineStart = false;

    if (ch === '/' && source.charAt(pos + 1) === '/') {
      while (pos < source.length && source.charAt(pos) !== '\n') pos++;
      continue;
    }
    if (ch === '/' && source.charAt(pos + 1) === '*') {
      const close = source.indexOf('*/', pos + 2);
      if (close === -1) {
        errors.push({ message: 'Unterminated comment', offset: pos });
        break;
      }
      pos = close + 2;
      continue;
    }

    const start = pos;
    if (IDENTIFIER_START.test(ch)) {
      while (pos < source.length && IDENTIFIER_PART.test(source.charAt(pos))) pos++;
      tokens.push({ kind: 'identifier', value: source.slice(start, pos), start, end: pos });
      continue;
    }
    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(source.charAt(pos + 1)))) {
      while (pos < source.length && NUMBER_PART.test(source.charAt(pos))) pos++;
      tokens.push({ kind: 'number', value: source.slice(start, pos), start, end: pos });
      continue;
    }
    if (ch === '"' || ch === "'") {
      pos++;
      while (pos < source.length && source.charAt(pos) !== ch && source.charAt(pos) !== '\n') {
        if (source.charAt(pos) === '\\') pos++;
        pos++;
      }
      if (source.charAt(pos) !== ch) {
        errors.push({ message: `Unterminated ${ch === '"' ? 'string' : 'character'} literal`, offset: start });
        continue;
      }
      pos++;
      tokens.push({ kind: ch === '"' ? 'string' : 'char', value: source.slice(start, pos), start, end: pos });
      continue;
    }

    pos++;
    tokens.push({ kind: 'punctuator', value: ch, start, end: pos });
  }

  return { tokens, errors };
}

/**
 * Offset to 1-based line / 0-based column, the convention babel uses
 */
export class LineMap {
  private readonly lineStarts: number[] = [0];

  constructor(source: string) {
    for (let i = 0; i < source.length; i++) {
      if (source.charAt(i) === '\n') this.lineStarts.push(i + 1);
    }
  }

  locate(offset: number): { line: number; column: number } {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, column: offset - (this.lineStarts[low] ?? 0) };
  }
}
