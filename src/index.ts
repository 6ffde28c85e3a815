/**
 * subc-cfg - Structured control-flow lowering for a bounded C subset
 *
 * Lowers function bodies to control flow graphs and checks them against a
 * configurable dialect policy.
 */

export * from './types/index.js';

export * from './utils/index.js';

export * from './parser/index.js';

export * from './cfg/index.js';

export * from './legality/index.js';

export * from './interpreter/index.js';

export * from './compiler/index.js';

export * from './harness/index.js';

export * from './output/index.js';
