/**
 * Shared test helpers
 */

import { fileURLToPath } from 'node:url';
import { parse } from '../src/parser/index.js';
import { buildCFG } from '../src/cfg/index.js';
import type { CFG, FunctionDefinition } from '../src/types/index.js';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function parseFunction(source: string): FunctionDefinition {
  const result = parse(source);
  const [fn] = result.functions;
  if (!fn) throw new Error(`No function definition in: ${source}`);
  return fn;
}

/**
 * Lower statements as the body of `void f(unsigned n, int buffer[])`.
 * The body starts on line 2.
 */
export function lowerBody(body: string): CFG {
  const fn = parseFunction(`void f(unsigned n, int buffer[]) {\n${body}\n}`);
  return buildCFG(fn.body, fn.variables);
}
