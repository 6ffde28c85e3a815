/**
 * Tests for CFG builder
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { buildCFG, validateCFG, cfgShape, shapesEqual } from '../../src/cfg/index.js';
import type { BasicBlock, CFG } from '../../src/types/index.js';
import { fixturePath, lowerBody, parseFunction } from '../helpers.js';

function block(cfg: CFG, id: string): BasicBlock {
  const found = cfg.blocks.get(id);
  if (!found) throw new Error(`No block ${id}`);
  return found;
}

function lowerFixture(): CFG {
  const source = readFileSync(fixturePath('break_continue.c'), 'utf-8');
  return buildCFG(parseFunction(source).body);
}

describe('CFG Builder', () => {
  describe('basic blocks', () => {
    it('should create entry and exit blocks for an empty body', () => {
      const cfg = lowerBody('');

      expect(cfg.blocks.size).toBe(2);
      expect(cfg.entry).toBe('bb0');
      expect(cfg.exit).toBe('bb1');
      expect(block(cfg, 'bb0').terminator).toEqual({ kind: 'fallthrough', next: 'bb1', jump: null });
      expect(block(cfg, 'bb1').terminator).toEqual({ kind: 'return', argument: null });
      expect(cfg.exits).toEqual(['bb1']);
    });

    it('should keep sequential statements in one block', () => {
      const cfg = lowerBody('int a = 1;\nint b = a + 2;');

      expect(block(cfg, 'bb0').statements).toHaveLength(2);
      expect(block(cfg, 'bb0').statements[0]?.type).toBe('VariableDeclaration');
    });
  });

  describe('if statements', () => {
    it('should branch to both arms and join', () => {
      const cfg = lowerBody('if (n > 0) { n = 1; } else { n = 2; }');

      const entry = block(cfg, 'bb0').terminator;
      expect(entry.kind).toBe('branch');
      if (entry.kind === 'branch') {
        expect(entry.consequent).toBe('bb2');
        expect(entry.alternate).toBe('bb3');
      }
      expect(block(cfg, 'bb2').terminator).toEqual({ kind: 'fallthrough', next: 'bb4', jump: null });
      expect(block(cfg, 'bb3').terminator).toEqual({ kind: 'fallthrough', next: 'bb4', jump: null });
      expect(block(cfg, 'bb4').terminator).toEqual({ kind: 'fallthrough', next: 'bb1', jump: null });
    });

    it('should leave the join dead when both arms return', () => {
      const cfg = lowerBody('if (n) return 1; else return 2;\nn = 3;');

      expect(block(cfg, 'bb2').terminator.kind).toBe('return');
      expect(block(cfg, 'bb3').terminator.kind).toBe('return');
      expect(block(cfg, 'bb4').reachable).toBe(false);
      expect(block(cfg, 'bb4').terminator).toEqual({ kind: 'unreachable' });
      expect(cfg.unreachable).toEqual([{ location: { line: 3, column: 0 }, block: 'bb4' }]);
      expect(cfg.exits).toEqual(['bb1', 'bb2', 'bb3']);
      expect(cfg.returns.map((site) => site.isFinal)).toEqual([false, false]);
    });
  });

  describe('while loops', () => {
    it('should fold a constant-true condition and exit only through break', () => {
      const cfg = lowerBody('while (1) { if (n > 7) break; n = n + 1; }');

      expect(block(cfg, 'bb2').terminator).toEqual({ kind: 'fallthrough', next: 'bb3', jump: null });
      expect(block(cfg, 'bb5').terminator).toEqual({ kind: 'fallthrough', next: 'bb4', jump: 'break' });
      expect(cfg.predecessors.get('bb4')).toEqual(['bb5']);

      const [loop] = cfg.loops;
      expect(loop?.constantCondition).toBe(true);
      expect(loop?.breakSources).toEqual([{ block: 'bb5', location: { line: 2, column: 23 } }]);
    });

    it('should leave the body of a constant-false loop unreachable', () => {
      const cfg = lowerBody('while (0) { n = 1; }');

      expect(block(cfg, 'bb2').terminator).toEqual({ kind: 'fallthrough', next: 'bb4', jump: null });
      expect(block(cfg, 'bb3').reachable).toBe(false);
      expect(cfg.unreachable).toEqual([{ location: { line: 2, column: 12 }, block: 'bb3' }]);
    });

    it('should add a back edge from the body to the header', () => {
      const cfg = lowerBody('while (n) { n = n - 1; }');

      const backEdges = [...cfg.backEdges].map((id) => cfg.edges.get(id));
      expect(backEdges).toEqual([{ id: 'e3', source: 'bb3', target: 'bb2', kind: 'back-edge' }]);
    });
  });

  describe('do-while loops', () => {
    it('should send continue to the condition test', () => {
      const cfg = lowerBody('do { n = n + 1; if (n < 10) continue; n = 0; } while (0);');

      expect(block(cfg, 'bb5').terminator).toEqual({ kind: 'fallthrough', next: 'bb3', jump: 'continue' });
      expect(block(cfg, 'bb3').terminator).toEqual({ kind: 'fallthrough', next: 'bb4', jump: null });
      expect(cfg.backEdges.size).toBe(0);
      expect(cfg.loops[0]?.header).toBe('bb3');
    });
  });

  describe('for loops', () => {
    it('should send continue to the step block, never the header', () => {
      const cfg = lowerBody('for (int i = 0; i < 4; i++) { if (i == 2) continue; n = n + i; }');

      const [loop] = cfg.loops;
      expect(loop?.header).toBe('bb2');
      expect(loop?.step).toBe('bb4');
      expect(block(cfg, 'bb6').terminator).toEqual({ kind: 'fallthrough', next: 'bb4', jump: 'continue' });
      expect(block(cfg, 'bb4').statements).toHaveLength(1);
      expect(block(cfg, 'bb4').terminator).toEqual({ kind: 'fallthrough', next: 'bb2', jump: null });
      expect(block(cfg, 'bb0').statements[0]?.type).toBe('VariableDeclaration');
    });

    it('should treat a missing condition as constant true', () => {
      const cfg = lowerBody('for (;;) { break; }');

      expect(cfg.loops[0]?.constantCondition).toBe(true);
      expect(block(cfg, 'bb2').terminator).toEqual({ kind: 'fallthrough', next: 'bb3', jump: null });
    });

    it('should record nesting depth', () => {
      const cfg = lowerBody('while (n) { for (;;) { break; } n = 0; }');

      expect(cfg.loops.map((loop) => [loop.kind, loop.depth])).toEqual([
        ['while', 1],
        ['for', 2],
      ]);
    });
  });

  describe('switch statements', () => {
    it('should dispatch through a comparison chain with fallthrough between cases', () => {
      const cfg = lowerBody('switch (n) { case 1: n = 10; break; case 2: n = 20; default: n = 0; }');

      expect(block(cfg, 'bb0').statements).toHaveLength(1);
      expect(block(cfg, 'bb0').terminator.kind).toBe('branch');
      expect(block(cfg, 'bb3').terminator).toEqual({ kind: 'fallthrough', next: 'bb2', jump: 'break' });
      expect(block(cfg, 'bb4').terminator).toEqual({ kind: 'fallthrough', next: 'bb5', jump: null });
      expect(block(cfg, 'bb7').terminator).toEqual({ kind: 'fallthrough', next: 'bb5', jump: null });
      expect(cfg.loops).toHaveLength(0);
      expect(cfg.diagnostics).toHaveLength(0);
    });

    it('should resolve continue inside a switch to the enclosing loop', () => {
      const cfg = lowerBody('while (n) { switch (n) { case 1: continue; } n = 0; }');

      expect(cfg.diagnostics).toHaveLength(0);
      expect(cfg.loops[0]?.continueSources).toHaveLength(1);
      expect(cfg.loops[0]?.breakSources).toHaveLength(0);
    });
  });

  describe('break and continue without a loop', () => {
    it('should record a no-enclosing-loop diagnostic for a stray break', () => {
      const cfg = lowerBody('break;');

      expect(cfg.diagnostics).toEqual([
        {
          kind: 'no-enclosing-loop',
          message: "'break' statement not within a loop or switch",
          location: { line: 2, column: 0 },
          block: 'bb0',
        },
      ]);
      expect(block(cfg, 'bb0').terminator).toEqual({ kind: 'fallthrough', next: 'bb1', jump: null });
    });

    it.each([
      ['continue;', 'continue'],
      ['if (n) { continue; }', 'continue'],
      ['{ { break; } }', 'break'],
      ['if (n) { n = 1; } else { if (n) break; }', 'break'],
      ['while (n) { n = 0; }\ncontinue;', 'continue'],
      ['switch (n) { case 1: continue; }', 'continue'],
      ['do { n = 1; } while (n);\nif (n) break;', 'break'],
    ])('should report %j as no-enclosing-loop', (body, statement) => {
      const cfg = lowerBody(body);

      expect(cfg.diagnostics.map((diagnostic) => diagnostic.kind)).toEqual(['no-enclosing-loop']);
      expect(cfg.diagnostics[0]?.message).toContain(`'${statement}'`);
      expect(validateCFG(cfg)).toEqual([]);
    });
  });

  describe('return statements', () => {
    it('should record a return against every enclosing loop', () => {
      const cfg = lowerBody('while (n) { for (;;) { if (n == 3) return; break; } n = n - 1; }');

      expect(cfg.loops[0]?.returnSources).toHaveLength(1);
      expect(cfg.loops[1]?.returnSources).toHaveLength(1);
    });

    it('should mark a trailing top-level return as final', () => {
      const cfg = lowerBody('if (n) return 1;\nreturn 0;');

      expect(cfg.returns.map((site) => site.isFinal)).toEqual([false, true]);
    });
  });

  describe('break_continue fixture', () => {
    it('should lower to a well-formed graph', () => {
      const cfg = lowerFixture();

      expect(validateCFG(cfg)).toEqual([]);
      expect(cfg.blocks.size).toBe(20);
      expect(cfg.edges.size).toBe(24);
      expect(cfg.backEdges.size).toBe(2);
      expect(cfg.diagnostics).toEqual([]);
      expect(cfg.unreachable).toEqual([]);
      expect([...cfg.blocks.values()].every((b) => b.reachable)).toBe(true);
    });

    it('should describe its three loops', () => {
      const cfg = lowerFixture();

      expect(
        cfg.loops.map((loop) => ({
          kind: loop.kind,
          line: loop.location.line,
          constant: loop.constantCondition,
          breaks: loop.breakSources.length,
          continues: loop.continueSources.length,
        }))
      ).toEqual([
        { kind: 'while', line: 9, constant: true, breaks: 1, continues: 0 },
        { kind: 'do-while', line: 15, constant: false, breaks: 0, continues: 1 },
        { kind: 'for', line: 21, constant: null, breaks: 0, continues: 1 },
      ]);
    });

    it('should have the entry dominate every block', () => {
      const cfg = lowerFixture();

      for (const [, dominators] of cfg.dominators) {
        expect(dominators.has(cfg.entry)).toBe(true);
      }
      expect(cfg.dominators.get('bb5')?.has('bb4')).toBe(true);
    });

    it('should lower identically twice', () => {
      const first = lowerFixture();
      const second = lowerFixture();

      expect(shapesEqual(cfgShape(first), cfgShape(second))).toBe(true);
      expect([...second.blocks.keys()]).toEqual([...first.blocks.keys()]);
    });
  });
});
