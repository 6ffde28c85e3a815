/**
 * Legality policy
 *
 * The dialect rules the checker enforces, as named options. Nothing else in
 * the pipeline consults the policy.
 */

import { LOOP_KINDS, type LoopKind } from '../types/index.js';

export interface LegalityPolicy {
  /** Every loop must have a statically known trip count */
  readonly requireStaticBound: boolean;
  /** Upper limit on a proven trip count */
  readonly maxIterations: number | null;
  readonly allowedLoopKinds: readonly LoopKind[];
  readonly allowBreak: boolean;
  readonly allowContinue: boolean;
  /** Limit on the exits of one loop: its natural exit plus its breaks */
  readonly maxLoopExits: number | null;
  readonly maxLoopDepth: number | null;
  /** `return` anywhere but as the last statement of the function */
  readonly allowEarlyReturn: boolean;
  readonly allowDeadCode: boolean;
}

export type PolicyPreset = 'permissive' | 'bounded' | 'strict';

export const POLICY_PRESET_NAMES: readonly PolicyPreset[] = ['permissive', 'bounded', 'strict'];

const PERMISSIVE_POLICY: LegalityPolicy = {
  requireStaticBound: false,
  maxIterations: null,
  allowedLoopKinds: LOOP_KINDS,
  allowBreak: true,
  allowContinue: true,
  maxLoopExits: null,
  maxLoopDepth: null,
  allowEarlyReturn: true,
  allowDeadCode: true,
};

export const POLICY_PRESETS: Readonly<Record<PolicyPreset, LegalityPolicy>> = {
  permissive: PERMISSIVE_POLICY,
  bounded: {
    ...PERMISSIVE_POLICY,
    requireStaticBound: true,
  },
  strict: {
    requireStaticBound: true,
    maxIterations: 4096,
    allowedLoopKinds: ['while', 'for'],
    allowBreak: true,
    allowContinue: true,
    maxLoopExits: 1,
    maxLoopDepth: 3,
    allowEarlyReturn: false,
    allowDeadCode: false,
  },
};

export const DEFAULT_POLICY: LegalityPolicy = POLICY_PRESETS.bounded;

export function isPolicyPreset(name: string): name is PolicyPreset {
  return POLICY_PRESET_NAMES.some((preset) => preset === name);
}

/**
 * Options laid over a preset; `extends` names the preset (default `bounded`)
 */
export interface PolicyOverrides extends Partial<LegalityPolicy> {
  readonly extends?: PolicyPreset;
}

export function resolvePolicy(policy: PolicyPreset | PolicyOverrides = {}): LegalityPolicy {
  if (typeof policy === 'string') return POLICY_PRESETS[policy];
  const { extends: base = 'bounded', ...overrides } = policy;
  return { ...POLICY_PRESETS[base], ...overrides };
}
