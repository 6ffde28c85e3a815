/**
 * Subset-C AST types
 *
 * Statements and expressions are babel nodes. Statement kinds the CFG
 * builder does not lower are reported as unsupported.
 */

import type * as t from '@babel/types';

export type LoopStatement = t.WhileStatement | t.DoWhileStatement | t.ForStatement;

export type LoopKind = 'while' | 'do-while' | 'for';

export const LOOP_KINDS: readonly LoopKind[] = ['while', 'do-while', 'for'];

/**
 * Position in the original source file
 */
export interface SourceLocation {
  /** Line number (1-based) */
  readonly line: number;
  /** Column number (0-based) */
  readonly column: number;
}

export const UNKNOWN_LOCATION: SourceLocation = { line: 0, column: 0 };

export function locationOf(node: t.Node | null | undefined): SourceLocation {
  const start = node?.loc?.start;
  return start ? { line: start.line, column: start.column } : UNKNOWN_LOCATION;
}

export function compareLocations(a: SourceLocation, b: SourceLocation): number {
  return a.line - b.line || a.column - b.column;
}

export function loopKindOf(stmt: LoopStatement): LoopKind {
  switch (stmt.type) {
    case 'WhileStatement':
      return 'while';
    case 'DoWhileStatement':
      return 'do-while';
    case 'ForStatement':
      return 'for';
  }
}

/**
 * A declared function parameter
 */
export interface FunctionParameter {
  readonly name: string;
  /** Type words as written, e.g. `unsigned` or `int` */
  readonly type: string;
  /** Declared with `[]` */
  readonly isArray: boolean;
  /** Declared with `*` */
  readonly isPointer: boolean;
  readonly location: SourceLocation;
}

/**
 * C integer type of a variable, as far as loop bounds care
 */
export interface IntegerType {
  readonly signed: boolean;
  readonly bits: 8 | 16 | 32 | 64;
}

/**
 * A parameter or local declaration. `type` is null for pointers, arrays and
 * non-integer types.
 */
export interface DeclaredVariable {
  readonly name: string;
  readonly type: IntegerType | null;
  readonly location: SourceLocation;
}

/**
 * A function definition handed to the lowering
 */
export interface FunctionDefinition {
  readonly name: string;
  readonly returnType: string;
  readonly params: readonly FunctionParameter[];
  readonly body: t.BlockStatement;
  /** Parameters, then local declarations in source order */
  readonly variables: readonly DeclaredVariable[];
  readonly location: SourceLocation;
}

/**
 * A file-scope declaration; recorded but never lowered
 */
export interface GlobalDeclaration {
  readonly text: string;
  readonly location: SourceLocation;
}
