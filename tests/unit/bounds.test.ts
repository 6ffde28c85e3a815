/**
 * Tests for static loop bound analysis
 */

import { describe, it, expect } from 'vitest';
import { analyzeLoopBound, declaredTypeAt, writesVariable, SIMULATION_LIMIT } from '../../src/legality/index.js';
import type { DeclaredVariable } from '../../src/types/index.js';
import { lowerBody } from '../helpers.js';

function boundOf(body: string) {
  const cfg = lowerBody(body);
  const [loop] = cfg.loops;
  if (!loop) throw new Error(`No loop in: ${body}`);
  return analyzeLoopBound(loop, cfg.variables);
}

describe('analyzeLoopBound', () => {
  describe('constant conditions', () => {
    it('should run a constant-false while loop zero times', () => {
      expect(boundOf('while (0) { n = 1; }')).toEqual({ bounded: true, iterations: 0 });
    });

    it('should run a constant-false do-while loop once', () => {
      expect(boundOf('do { n = 1; } while (0);')).toEqual({ bounded: true, iterations: 1 });
    });

    it('should fold constant expressions', () => {
      expect(boundOf('while (2 - 2) { n = 1; }')).toEqual({ bounded: true, iterations: 0 });
    });

    it('should treat a constant-true condition as unbounded even with a break', () => {
      expect(boundOf('while (1) { if (n > 7) break; n = n + 1; }')).toEqual({
        bounded: false,
        reason: 'condition is always true',
      });
    });

    it('should treat a for loop without condition as unbounded', () => {
      expect(boundOf('for (;;) { break; }')).toEqual({ bounded: false, reason: 'loop has no condition' });
    });

    it('should treat a variable while condition as unbounded', () => {
      expect(boundOf('while (n) { n = n - 1; }')).toEqual({
        bounded: false,
        reason: 'while condition is not a compile-time constant',
      });
    });
  });

  describe('counting for loops', () => {
    it.each([
      ['for (int i = 0; i < 8; i++) { n = n + i; }', 8],
      ['for (int i = 0; i <= 8; ++i) { n = n + i; }', 9],
      ['for (int i = 10; i > 0; i--) { n = n + i; }', 10],
      ['for (int i = 0; i < 10; i += 3) { n = n + i; }', 4],
      ['for (int i = 9; i >= 0; i -= 2) { n = n + i; }', 5],
      ['for (int i = 0; i != 6; i = i + 2) { n = n + i; }', 3],
      ['for (int i = 0; i < 5; i = 1 + i) { n = n + i; }', 5],
      ['for (int i = 4; i < 4; i++) { n = n + i; }', 0],
      ['for (int i = 0; 3 > i; i++) { n = n + i; }', 3],
    ])('should count the iterations of %s', (body, iterations) => {
      expect(boundOf(body)).toEqual({ bounded: true, iterations });
    });

    it('should accept an assignment initializer', () => {
      expect(boundOf('int i;\nfor (i = 20; i < 30; i++) { n = n + i; }')).toEqual({ bounded: true, iterations: 10 });
    });

    it('should reject a loop whose body writes the induction variable', () => {
      expect(boundOf('int i;\nfor (i = 20; i < 30; i++) { i++; if (i < 25) continue; buffer[i] = 3; }')).toEqual({
        bounded: false,
        reason: "loop variable 'i' is modified in the loop body",
      });
    });

    it('should reject a step that moves away from a != limit', () => {
      expect(boundOf('for (int i = 0; i != 5; i += 2) { n = n + i; }')).toEqual({
        bounded: false,
        reason: `'i' does not reach its limit within ${SIMULATION_LIMIT} iterations`,
      });
    });

    it('should reject a zero step', () => {
      expect(boundOf('for (int i = 0; i < 5; i += 0) { n = n + i; }')).toEqual({
        bounded: false,
        reason: "step does not change 'i' by a non-zero constant",
      });
    });

    it('should reject a limit that is not constant', () => {
      expect(boundOf('for (int i = 0; i < n; i++) { buffer[i] = 0; }')).toEqual({
        bounded: false,
        reason: "condition does not compare 'i' with a constant",
      });
    });

    it('should reject a non-constant initializer', () => {
      expect(boundOf('for (int i = n; i < 5; i++) { buffer[i] = 0; }')).toEqual({
        bounded: false,
        reason: 'initializer does not assign a constant to a single variable',
      });
    });
  });
});

describe('declared types of loop variables', () => {
  it('should never finish an unsigned countdown to >= 0', () => {
    expect(boundOf('for (unsigned i = 10; i >= 0; i--) { buffer[0] = 1; }')).toEqual({
      bounded: false,
      reason: `'i' does not reach its limit within ${SIMULATION_LIMIT} iterations`,
    });
  });

  it('should count an unsigned countdown to > 0', () => {
    expect(boundOf('for (unsigned i = 10; i > 0; i--) { buffer[i] = 1; }')).toEqual({ bounded: true, iterations: 10 });
  });

  it('should compare an unsigned variable with a negative limit as unsigned', () => {
    expect(boundOf('for (unsigned i = 5; i > -1; i--) { buffer[i] = 1; }')).toEqual({ bounded: true, iterations: 0 });
  });

  it('should wrap narrow unsigned variables', () => {
    expect(boundOf('for (uint8_t i = 0; i < 300; i++) { buffer[0] = i; }')).toEqual({
      bounded: false,
      reason: `'i' does not reach its limit within ${SIMULATION_LIMIT} iterations`,
    });
  });

  it('should use the type of an unsigned parameter', () => {
    expect(boundOf('for (n = 3; n >= 0; n--) { buffer[0] = 1; }')).toEqual({
      bounded: false,
      reason: `'n' does not reach its limit within ${SIMULATION_LIMIT} iterations`,
    });
  });

  it('should use the latest declaration before the loop', () => {
    expect(boundOf('unsigned j = 0;\n{ int j; for (j = 3; j >= 0; j--) { n = 1; } }')).toEqual({
      bounded: true,
      iterations: 4,
    });
  });

  it('should reject a loop variable that is not an integer', () => {
    expect(boundOf('double x;\nfor (x = 0; x < 3; x++) { n = 1; }')).toEqual({
      bounded: false,
      reason: "loop variable 'x' is not an integer",
    });
  });
});

describe('declaredTypeAt', () => {
  const variables: DeclaredVariable[] = [
    { name: 'k', type: { signed: false, bits: 32 }, location: { line: 1, column: 4 } },
    { name: 'k', type: { signed: true, bits: 16 }, location: { line: 5, column: 2 } },
  ];

  it('should pick the latest declaration at or before the location', () => {
    expect(declaredTypeAt(variables, 'k', { line: 3, column: 0 })).toEqual({ signed: false, bits: 32 });
    expect(declaredTypeAt(variables, 'k', { line: 5, column: 2 })).toEqual({ signed: true, bits: 16 });
  });

  it('should treat undeclared names as int', () => {
    expect(declaredTypeAt(variables, 'm', { line: 9, column: 0 })).toEqual({ signed: true, bits: 32 });
    expect(declaredTypeAt(variables, 'k', { line: 1, column: 0 })).toEqual({ signed: true, bits: 32 });
  });
});

describe('writesVariable', () => {
  it('should find assignments, updates and redeclarations', () => {
    const body = (source: string) => lowerBody(source).loops[0]?.statement.body;
    const assigns = body('while (n) { n = 0; }');
    const updates = body('while (n) { buffer[n--] = 1; }');
    const reads = body('while (n) { buffer[0] = n; }');

    expect(assigns && writesVariable(assigns, 'n')).toBe(true);
    expect(updates && writesVariable(updates, 'n')).toBe(true);
    expect(reads && writesVariable(reads, 'n')).toBe(false);
  });
});
