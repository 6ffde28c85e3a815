/**
 * Fixture harness
 *
 * A fixture is a `.c` file whose leading comment (`// Should pass` or
 * `// Should fail`) declares the verdict the compiler must reach.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { basename, join } from 'node:path';
import { compile, verdictOf, type CompileOptions, type CompileResult } from '../compiler/index.js';
import type { Verdict, Violation } from '../types/index.js';

export type FixtureOptions = Pick<CompileOptions, 'policy'>;

export interface FixtureResult {
  path: string;
  /** Declared verdict; null when the fixture has no header */
  expected: Verdict | null;
  actual: Verdict;
  passed: boolean;
  violations: Violation[];
  result: CompileResult;
}

export class FixtureReadError extends Error {
  readonly code = 'E_FIXTURE_READ';

  constructor(
    readonly path: string,
    reason: string
  ) {
    super(`Cannot read fixture ${path}: ${reason}`);
    this.name = 'FixtureReadError';
  }
}

function readFixture(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new FixtureReadError(path, error instanceof Error ? error.message : String(error));
  }
}

export function runFixture(path: string, options: FixtureOptions = {}): FixtureResult {
  const source = readFixture(path);
  const result = compile(source, { ...options, filename: basename(path) });
  const actual = verdictOf(result);

  return {
    path,
    expected: result.expectation,
    actual,
    passed: result.expectation === actual,
    violations: result.violations,
    result,
  };
}

export function runFixtures(paths: readonly string[], options: FixtureOptions = {}): FixtureResult[] {
  return paths.map((path) => runFixture(path, options));
}

/**
 * The `.c` files of a directory, sorted by name
 */
export function findFixtures(directory: string): string[] {
  return readdirSync(directory)
    .filter((name) => name.endsWith('.c'))
    .sort()
    .map((name) => join(directory, name));
}
