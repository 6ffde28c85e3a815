/**
 * Tests for the CFG interpreter
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { buildCFG } from '../../src/cfg/index.js';
import {
  execute,
  StepLimitExceededError,
  BufferBoundsError,
  UnsupportedExpressionError,
  UndefinedVariableError,
} from '../../src/interpreter/index.js';
import { fixturePath, lowerBody, parseFunction } from '../helpers.js';

function run(body: string, n = 0, length = 32) {
  return execute(lowerBody(body), { params: { n }, buffers: { buffer: length } });
}

describe('execute', () => {
  describe('break_continue fixture', () => {
    const cfg = buildCFG(parseFunction(readFileSync(fixturePath('break_continue.c'), 'utf-8')).body);
    const result = execute(cfg, { params: { buffer_size: 30 }, buffers: { buffer: 30 } });

    it('should fill buffer[0..7] from the while loop and stop before buffer[8]', () => {
      const ones = result.writes.filter((write) => write.value === 1).map((write) => write.index);
      expect(ones).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    it('should leave the do-while loop after one pass despite continue', () => {
      expect(result.writes.filter((write) => write.value === 2)).toEqual([{ buffer: 'buffer', index: 8, value: 2 }]);
    });

    it('should run the for-loop step after continue', () => {
      const threes = result.writes.filter((write) => write.value === 3).map((write) => write.index);
      expect(threes).toEqual([25, 27, 29]);
      expect(result.variables.get('i')).toBe(30);
    });

    it('should write nothing when the guard fails', () => {
      const skipped = execute(cfg, { params: { buffer_size: 9 }, buffers: { buffer: 30 } });
      expect(skipped.writes).toEqual([]);
      expect(skipped.returnValue).toBeNull();
    });
  });

  it('should write exactly the odd indices from 25 for a continue before the store', () => {
    const result = run('int i;\nfor (i = 20; i < 30; i++) { i++; if (i < 25) continue; buffer[i] = 3; }');

    expect(result.writes.map((write) => write.index)).toEqual([25, 27, 29]);
    expect(result.buffers.get('buffer')?.[27]).toBe(3);
    expect(result.buffers.get('buffer')?.[26]).toBe(0);
  });

  it('should return the value of the return expression', () => {
    const result = run('int total = 0;\nfor (int i = 1; i <= 4; i++) { total += i; }\nreturn total * 2;');

    expect(result.returnValue).toBe(20);
  });

  it('should count the blocks it enters', () => {
    expect(run('return 1;').steps).toBe(1);
    expect(run('n = 1;').steps).toBe(2);
  });

  it('should follow switch dispatch and fallthrough', () => {
    const body = 'int kind = 0;\nswitch (n) { case 1: kind = 10; break; case 2: kind = 20; case 3: kind = kind + 1; break; default: kind = -1; }\nreturn kind;';

    expect(run(body, 1).returnValue).toBe(10);
    expect(run(body, 2).returnValue).toBe(21);
    expect(run(body, 3).returnValue).toBe(1);
    expect(run(body, 9).returnValue).toBe(-1);
  });

  it('should use C integer semantics', () => {
    expect(run('return -7 / 2;').returnValue).toBe(-3);
    expect(run('return -7 % 2;').returnValue).toBe(-1);
    expect(run('return (3 < 4) + (4 < 3);').returnValue).toBe(1);
    expect(run('return 2147483647 + 1;').returnValue).toBe(-2147483648);
    expect(run("return 'a';").returnValue).toBe(97);
    expect(run('return n > 0 ? n : -n;', -5).returnValue).toBe(5);
  });

  it('should short-circuit logical operators', () => {
    const result = run('int a = 0;\nint b = n && (a = 1);\nint c = n || (a = a + 2);\nreturn a * 10 + b + c;', 0);

    expect(result.returnValue).toBe(21);
  });

  it('should apply pre- and post-increment and compound assignment', () => {
    const result = run('int a = 5;\nint b = a++;\nint c = ++a;\na <<= 1;\nreturn a * 100 + b * 10 + c;');

    expect(result.returnValue).toBe(1457);
  });

  it('should read unset buffer cells as zero', () => {
    expect(run('return buffer[3];').returnValue).toBe(0);
  });

  it('should accept initial buffer contents', () => {
    const result = execute(lowerBody('return buffer[0] + buffer[2];'), { buffers: { buffer: [4, 5, 6] } });

    expect(result.returnValue).toBe(10);
  });

  it('should throw when a loop does not finish within the step limit', () => {
    expect(() => execute(lowerBody('while (1) { n = n + 1; }'), { params: { n: 0 }, stepLimit: 50 })).toThrow(
      StepLimitExceededError
    );
  });

  it('should throw on an out-of-range index', () => {
    expect(() => run('buffer[4] = 1;', 0, 4)).toThrow(BufferBoundsError);
    expect(() => run('n = buffer[-1];')).toThrow("Index -1 is out of bounds for 'buffer' (length 32)");
  });

  it('should throw on unsupported expressions', () => {
    expect(() => run('f(n);')).toThrow(UnsupportedExpressionError);
    expect(() => run('return 1.5;')).toThrow(UnsupportedExpressionError);
  });

  it('should throw on undeclared variables', () => {
    expect(() => run('missing = 1;')).toThrow(UndefinedVariableError);
  });
});
