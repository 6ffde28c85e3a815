/**
 * Output formatters - Render CFGs and compile results
 *
 * Supports multiple output formats:
 * 1. CFG listing (one block per paragraph)
 * 2. Graphviz DOT
 * 3. Report (human-readable verdicts)
 * 4. JSON (machine-readable)
 */

import type { CompileResult, FunctionResult } from '../compiler/index.js';
import type { BasicBlock, CFG, CFGEdge, Terminator, Violation } from '../types/index.js';
import { printExpression, printStatement } from './printer.js';

/**
 * Format options for CFG listings
 */
export interface FormatOptions {
  /** Indentation string (default: '  ') */
  indentStr?: string;
  /** Whether to list blocks no path reaches */
  showUnreachable?: boolean;
}

const DEFAULT_FORMAT_OPTIONS: Required<FormatOptions> = {
  indentStr: '  ',
  showUnreachable: true,
};

function blockHeader(block: BasicBlock): string {
  const flags: string[] = [];
  if (block.isEntry) flags.push('entry');
  if (block.isExit) flags.push('exit');
  if (!block.reachable) flags.push('unreachable');
  return flags.length > 0 ? `${block.id} (${flags.join(', ')}):` : `${block.id}:`;
}

export function formatTerminator(terminator: Terminator): string {
  switch (terminator.kind) {
    case 'fallthrough':
      return terminator.jump ? `goto ${terminator.next} (${terminator.jump})` : `goto ${terminator.next}`;
    case 'branch':
      return `if (${printExpression(terminator.condition)}) goto ${terminator.consequent} else goto ${terminator.alternate}`;
    case 'return':
      return terminator.argument ? `return ${printExpression(terminator.argument)}` : 'return';
    case 'unreachable':
      return 'unreachable';
  }
}

/**
 * Format a CFG as a block listing
 */
export function formatCFG(cfg: CFG, options: FormatOptions = {}): string {
  const opts = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  const paragraphs: string[] = [];

  for (const block of cfg.blocks.values()) {
    if (!block.reachable && !opts.showUnreachable) continue;
    const lines = [blockHeader(block)];
    for (const stmt of block.statements) {
      lines.push(opts.indentStr + printStatement(stmt));
    }
    lines.push(opts.indentStr + formatTerminator(block.terminator));
    paragraphs.push(lines.join('\n'));
  }

  return paragraphs.join('\n\n');
}

function escapeDOT(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

const EDGE_ATTRIBUTES: Readonly<Record<CFGEdge['kind'], string>> = {
  normal: '',
  'true-branch': ' [label="T"]',
  'false-branch': ' [label="F"]',
  'back-edge': ' [label="back", style=dashed]',
  break: ' [label="break", color=red]',
  continue: ' [label="continue", color=blue]',
};

/**
 * Format a CFG as a Graphviz digraph
 */
export function formatDOT(cfg: CFG, name = 'cfg'): string {
  const lines: string[] = [];
  lines.push(`digraph "${escapeDOT(name)}" {`);
  lines.push('  node [shape=box, fontname="monospace"];');

  for (const block of cfg.blocks.values()) {
    const body = [
      blockHeader(block),
      ...block.statements.map(printStatement),
      formatTerminator(block.terminator),
    ];
    // \l left-justifies each line
    const label = body.map((line) => `${escapeDOT(line)}\\l`).join('');
    const style = block.reachable ? '' : ', style=dotted';
    lines.push(`  ${block.id} [label="${label}"${style}];`);
  }

  for (const edge of cfg.edges.values()) {
    lines.push(`  ${edge.source} -> ${edge.target}${EDGE_ATTRIBUTES[edge.kind]};`);
  }

  lines.push('}');
  return lines.join('\n');
}

const RULE = '═══════════════════════════════════════════════════════════════';
const THIN_RULE = '───────────────────────────────────────────────────────────────';

export function formatViolation(violation: Violation): string {
  const location = `${violation.location.line}:${violation.location.column}`.padEnd(8);
  return `${location} ${violation.kind.padEnd(22)} ${violation.message}`;
}

/**
 * Format a compile result as human-readable report
 */
export function formatReport(result: CompileResult): string {
  const lines: string[] = [];

  lines.push(RULE);
  lines.push(`  Lowering Report: ${result.filename}`);
  lines.push(RULE);
  lines.push('');

  const verdict = result.accepted ? 'pass' : 'fail';
  const expected = result.expectation ? ` (expected ${result.expectation})` : '';

  lines.push('  Summary:');
  lines.push(`    Functions:  ${result.functions.length}`);
  lines.push(`    Accepted:   ${result.functions.filter((fn) => fn.accepted).length}`);
  lines.push(`    Violations: ${result.violations.length}`);
  lines.push(`    Verdict:    ${verdict}${expected}`);
  lines.push('');

  const reported = new Set(result.functions.flatMap((fn) => fn.violations));
  const fileViolations = result.violations.filter((violation) => !reported.has(violation));
  if (fileViolations.length > 0) {
    lines.push(THIN_RULE);
    lines.push('  File:');
    lines.push(THIN_RULE);
    for (const violation of fileViolations) {
      lines.push(`    ${formatViolation(violation)}`);
    }
    lines.push('');
  }

  for (const fn of result.functions) {
    lines.push(THIN_RULE);
    lines.push(`  ${fn.name} (line ${fn.location.line}): ${fn.accepted ? 'accepted' : 'rejected'}`);
    lines.push(THIN_RULE);
    for (const violation of fn.violations) {
      lines.push(`    ${formatViolation(violation)}`);
    }
    for (const error of fn.validationErrors) {
      lines.push(`    malformed CFG: ${error.message}`);
    }
    lines.push('');
  }

  lines.push(RULE);

  return lines.join('\n');
}

function serializeCFG(cfg: CFG): unknown {
  return {
    entry: cfg.entry,
    exit: cfg.exit,
    blocks: [...cfg.blocks.values()].map((block) => ({
      id: block.id,
      reachable: block.reachable,
      statements: block.statements.map(printStatement),
      terminator: formatTerminator(block.terminator),
    })),
    edges: [...cfg.edges.values()].map((edge) => ({
      source: edge.source,
      target: edge.target,
      kind: edge.kind,
    })),
    loops: cfg.loops.map((loop) => ({
      kind: loop.kind,
      line: loop.location.line,
      header: loop.header,
      exit: loop.exit,
      depth: loop.depth,
    })),
  };
}

function serializeFunction(fn: FunctionResult): unknown {
  return {
    name: fn.name,
    returnType: fn.returnType,
    params: fn.params.map((param) => ({
      name: param.name,
      type: param.type,
      isArray: param.isArray,
      isPointer: param.isPointer,
    })),
    accepted: fn.accepted,
    violations: fn.violations,
    validationErrors: fn.validationErrors,
    cfg: fn.cfg ? serializeCFG(fn.cfg) : null,
  };
}

/**
 * Format a compile result as JSON
 */
export function formatJSON(result: CompileResult, indent = 2): string {
  const serializable = {
    filename: result.filename,
    accepted: result.accepted,
    expectation: result.expectation,
    violations: result.violations,
    functions: result.functions.map(serializeFunction),
  };
  return JSON.stringify(serializable, null, indent);
}
