/**
 * Parser module exports
 */

export { parse, parseExpectation } from './parser.js';
export type { ParseOptions, ParseResult, ParseError } from './parser.js';
export { scan, LineMap } from './scanner.js';
export type { Token, TokenKind } from './scanner.js';
export { TYPE_KEYWORDS } from './unit.js';
