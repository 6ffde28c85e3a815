/**
 * Output module exports
 */

export {
  formatCFG,
  formatDOT,
  formatReport,
  formatJSON,
  formatTerminator,
  formatViolation,
} from './formatter.js';

export type { FormatOptions } from './formatter.js';

export { printExpression, printStatement } from './printer.js';
