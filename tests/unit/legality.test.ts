/**
 * Tests for the legality checker and policies
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { buildCFG } from '../../src/cfg/index.js';
import {
  checkLegality,
  checkProgram,
  resolvePolicy,
  isPolicyPreset,
  policyFromJSON,
  loadPolicyFile,
  policyFromArgument,
  PolicyFileError,
  POLICY_PRESETS,
  DEFAULT_POLICY,
} from '../../src/legality/index.js';
import type { CFG } from '../../src/types/index.js';
import { fixturePath, lowerBody, parseFunction } from '../helpers.js';

function fixtureCFG(): CFG {
  return buildCFG(parseFunction(readFileSync(fixturePath('break_continue.c'), 'utf-8')).body);
}

describe('checkLegality', () => {
  describe('break_continue fixture', () => {
    it('should reject it under the default policy', () => {
      expect(checkLegality(fixtureCFG(), 'entry')).toEqual([
        {
          kind: 'unbounded-loop',
          message: 'while loop has no static iteration bound: condition is always true',
          functionName: 'entry',
          location: { line: 9, column: 8 },
        },
        {
          kind: 'unbounded-loop',
          message: "for loop has no static iteration bound: loop variable 'i' is modified in the loop body",
          functionName: 'entry',
          location: { line: 21, column: 8 },
        },
      ]);
    });

    it('should accept it under the permissive policy', () => {
      expect(checkLegality(fixtureCFG(), 'entry', resolvePolicy('permissive'))).toEqual([]);
    });

    it('should also reject the do-while loop under the strict policy', () => {
      const violations = checkLegality(fixtureCFG(), 'entry', resolvePolicy('strict'));

      expect(violations.map((v) => [v.kind, v.location.line])).toEqual([
        ['unbounded-loop', 9],
        ['disallowed-loop-kind', 15],
        ['unbounded-loop', 21],
      ]);
      expect(violations[1]?.message).toBe('do-while loop is not allowed');
    });
  });

  it('should accept a counting loop under the default policy', () => {
    expect(checkLegality(lowerBody('for (int i = 0; i < 8; i++) { buffer[i] = 0; }'), 'f')).toEqual([]);
  });

  it('should report structural diagnostics before loop rules', () => {
    const violations = checkLegality(lowerBody('break;\nwhile (1) { break; }'), 'f');

    expect(violations.map((v) => v.kind)).toEqual(['no-enclosing-loop', 'unbounded-loop']);
    expect(violations[0]?.location).toEqual({ line: 2, column: 0 });
  });

  it('should report unsupported statements', () => {
    const violations = checkLegality(lowerBody('done: n = 1;'), 'f', resolvePolicy('permissive'));

    expect(violations).toEqual([
      {
        kind: 'unsupported-statement',
        message: "Unsupported statement: label 'done'",
        functionName: 'f',
        location: { line: 2, column: 0 },
      },
    ]);
  });

  it('should enforce an iteration limit on proven bounds', () => {
    const violations = checkLegality(
      lowerBody('for (int i = 0; i < 8; i++) { buffer[i] = 0; }'),
      'f',
      resolvePolicy({ maxIterations: 4 })
    );

    expect(violations.map((v) => [v.kind, v.message])).toEqual([
      ['iteration-limit', 'for loop runs 8 iterations (limit 4)'],
    ]);
  });

  it('should reject break when breaks are disallowed', () => {
    const violations = checkLegality(
      lowerBody('while (n) { if (n == 2) break; n = n - 1; }'),
      'f',
      resolvePolicy({ extends: 'permissive', allowBreak: false })
    );

    expect(violations).toEqual([
      {
        kind: 'disallowed-break',
        message: 'break out of while loop is not allowed',
        functionName: 'f',
        location: { line: 2, column: 24 },
      },
    ]);
  });

  it('should reject continue when continues are disallowed', () => {
    const violations = checkLegality(
      lowerBody('for (int i = 0; i < 4; i++) { if (i == 2) continue; n = n + i; }'),
      'f',
      resolvePolicy({ allowContinue: false })
    );

    expect(violations.map((v) => [v.kind, v.message])).toEqual([
      ['disallowed-continue', 'continue in for loop is not allowed'],
    ]);
  });

  it('should count the natural exit and each break against the exit limit', () => {
    const policy = resolvePolicy({ extends: 'permissive', maxLoopExits: 1 });

    expect(checkLegality(lowerBody('while (n) { if (n == 2) break; n = n - 1; }'), 'f', policy).map((v) => v.message)).toEqual([
      'while loop has 2 exits (limit 1)',
    ]);
    expect(checkLegality(lowerBody('while (1) { if (n == 2) break; n = n - 1; }'), 'f', policy)).toEqual([]);
  });

  it('should enforce the nesting limit', () => {
    const violations = checkLegality(
      lowerBody('while (n) { for (;;) { break; } n = 0; }'),
      'f',
      resolvePolicy({ extends: 'permissive', maxLoopDepth: 1 })
    );

    expect(violations.map((v) => [v.kind, v.message])).toEqual([['loop-depth', 'for loop is nested 2 deep (limit 1)']]);
  });

  it('should report early returns but not the final one', () => {
    const violations = checkLegality(
      lowerBody('if (n) return 1;\nreturn 0;'),
      'f',
      resolvePolicy({ extends: 'permissive', allowEarlyReturn: false })
    );

    expect(violations).toEqual([
      {
        kind: 'early-return',
        message: 'Return before the end of the function',
        functionName: 'f',
        location: { line: 2, column: 7 },
      },
    ]);
  });

  it('should report dead code before early returns', () => {
    const violations = checkLegality(
      lowerBody('return 1;\nn = 2;'),
      'f',
      resolvePolicy({ extends: 'permissive', allowEarlyReturn: false, allowDeadCode: false })
    );

    expect(violations.map((v) => [v.kind, v.location.line])).toEqual([
      ['unreachable-code', 3],
      ['early-return', 2],
    ]);
  });

  it('should not report dead code when it is allowed', () => {
    expect(checkLegality(lowerBody('return 1;\nn = 2;'), 'f', resolvePolicy('permissive'))).toEqual([]);
  });
});

describe('checkProgram', () => {
  it('should check functions in order and tag each violation', () => {
    const violations = checkProgram([
      { name: 'first', cfg: lowerBody('while (n) { n = n - 1; }') },
      { name: 'second', cfg: lowerBody('n = 1;') },
      { name: 'third', cfg: lowerBody('continue;') },
    ]);

    expect(violations.map((v) => [v.functionName, v.kind])).toEqual([
      ['first', 'unbounded-loop'],
      ['third', 'no-enclosing-loop'],
    ]);
  });
});

describe('policies', () => {
  it('should default to the bounded preset', () => {
    expect(DEFAULT_POLICY).toBe(POLICY_PRESETS.bounded);
    expect(resolvePolicy()).toEqual(POLICY_PRESETS.bounded);
    expect(DEFAULT_POLICY.requireStaticBound).toBe(true);
  });

  it('should lay overrides over the named preset', () => {
    const policy = resolvePolicy({ extends: 'strict', maxLoopDepth: 5 });

    expect(policy).toEqual({ ...POLICY_PRESETS.strict, maxLoopDepth: 5 });
  });

  it('should recognise preset names', () => {
    expect(isPolicyPreset('strict')).toBe(true);
    expect(isPolicyPreset('lenient')).toBe(false);
  });
});

describe('policy files', () => {
  it('should validate and resolve a policy document', () => {
    expect(policyFromJSON({ extends: 'strict', maxIterations: 256 })).toEqual({
      ...POLICY_PRESETS.strict,
      maxIterations: 256,
    });
  });

  it('should reject unknown options and bad values', () => {
    expect(() => policyFromJSON({ maxIterations: -1 })).toThrow(PolicyFileError);
    expect(() => policyFromJSON({ maxIterations: -1 })).toThrow(/maxIterations/);
    expect(() => policyFromJSON({ allowGoto: true })).toThrow(PolicyFileError);
    expect(() => policyFromJSON('strict')).toThrow(PolicyFileError);
  });

  it('should load a policy file from disk', () => {
    expect(loadPolicyFile(fixturePath('policies/strict-256.json'))).toEqual({
      ...POLICY_PRESETS.strict,
      maxIterations: 256,
      allowDeadCode: true,
    });
  });

  it('should name the file of an invalid policy', () => {
    const path = fixturePath('policies/invalid.json');

    expect(() => loadPolicyFile(path)).toThrow(`Invalid policy in ${path}`);
  });

  it('should report a missing policy file with an error code', () => {
    try {
      loadPolicyFile(fixturePath('policies/missing.json'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PolicyFileError);
      if (error instanceof PolicyFileError) {
        expect(error.code).toBe('E_POLICY_FILE');
      }
    }
  });

  it('should take a preset name or a file path as argument', () => {
    expect(policyFromArgument('permissive')).toEqual(POLICY_PRESETS.permissive);
    expect(policyFromArgument(fixturePath('policies/strict-256.json')).maxIterations).toBe(256);
  });
});
