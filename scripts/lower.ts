#!/usr/bin/env npx tsx
/**
 * CLI script to lower and check a subset-C file
 * Usage: npx tsx scripts/lower.ts <file.c> [options]
 */

import { readFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { parse } from '../src/parser/index.js';
import { buildCFG } from '../src/cfg/index.js';
import { compile, exitCode } from '../src/compiler/index.js';
import { DEFAULT_POLICY, policyFromArgument, PolicyFileError, type LegalityPolicy } from '../src/legality/index.js';
import { formatCFG, formatDOT, formatJSON, formatReport } from '../src/output/index.js';

function usage(): void {
  console.log('Usage: npx tsx scripts/lower.ts <file.c> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --format=report   Human-readable verdicts (default)');
  console.log('  --format=json     Machine-readable JSON output');
  console.log('  --format=cfg      Block listing of every function');
  console.log('  --format=dot      Graphviz digraph of every function');
  console.log('  --policy=<name>   permissive, bounded (default) or strict');
  console.log('  --policy=<file>   JSON policy file');
  console.log('  --verbose         Show CFG statistics');
}

function main(): number {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    usage();
    return 2;
  }

  // Parse arguments
  let filePath = '';
  let format = 'report';
  let policyArgument: string | null = null;
  let verbose = false;

  for (const arg of args) {
    if (arg.startsWith('--format=')) {
      format = arg.slice('--format='.length);
    } else if (arg.startsWith('--policy=')) {
      policyArgument = arg.slice('--policy='.length);
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (!arg.startsWith('-')) {
      filePath = arg;
    }
  }

  if (!filePath) {
    console.error('Error: No file path provided');
    return 2;
  }

  let policy: LegalityPolicy = DEFAULT_POLICY;
  if (policyArgument !== null) {
    try {
      policy = policyFromArgument(policyArgument);
    } catch (err) {
      if (!(err instanceof PolicyFileError)) throw err;
      console.error(`Error: ${err.message}`);
      return 2;
    }
  }

  // Resolve and read file
  const absolutePath = resolve(process.cwd(), filePath);
  let source: string;

  try {
    source = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`Error: Could not read file '${absolutePath}': ${reason}`);
    return 2;
  }

  console.error(`Lowering ${filePath}...`);
  const startTime = Date.now();
  const result = compile(source, { filename: basename(filePath), policy });
  const elapsed = Date.now() - startTime;

  console.error(`Lowered ${result.functions.length} function(s) in ${elapsed}ms`);
  if (result.violations.length > 0) {
    console.error(`Found ${result.violations.length} violation(s)`);
  }

  if (format === 'cfg' || format === 'dot' || verbose) {
    // Rejected functions keep no CFG; lower them again for display
    for (const fn of parse(source, { filename: filePath }).functions) {
      const cfg = buildCFG(fn.body, fn.variables);
      if (verbose) {
        console.error('');
        console.error(`CFG Statistics (${fn.name}):`);
        console.error(`  Blocks: ${cfg.blocks.size}`);
        console.error(`  Edges: ${cfg.edges.size}`);
        console.error(`  Back edges (loops): ${cfg.backEdges.size}`);
        console.error(`  Unreachable blocks: ${[...cfg.blocks.values()].filter((block) => !block.reachable).length}`);
      }
      if (format === 'cfg') console.log(`function ${fn.name}:\n${formatCFG(cfg)}\n`);
      if (format === 'dot') console.log(formatDOT(cfg, fn.name));
    }
  }
  console.error('');

  switch (format) {
    case 'json':
      console.log(formatJSON(result));
      break;
    case 'cfg':
    case 'dot':
      break;
    case 'report':
    default:
      console.log(formatReport(result));
      break;
  }

  return exitCode(result);
}

process.exitCode = main();
