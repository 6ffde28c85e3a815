/**
 * Legality module exports
 */

export { checkLegality, checkProgram } from './checker.js';
export type { CheckedFunction } from './checker.js';
export { analyzeLoopBound, declaredTypeAt, writesVariable, SIMULATION_LIMIT } from './bounds.js';
export type { LoopBound } from './bounds.js';
export {
  DEFAULT_POLICY,
  POLICY_PRESETS,
  POLICY_PRESET_NAMES,
  isPolicyPreset,
  resolvePolicy,
} from './policy.js';
export type { LegalityPolicy, PolicyPreset, PolicyOverrides } from './policy.js';
export {
  policyFileSchema,
  policyFromJSON,
  loadPolicyFile,
  policyFromArgument,
  PolicyFileError,
} from './policy-schema.js';
export type { PolicyFile } from './policy-schema.js';
