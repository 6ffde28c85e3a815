/**
 * Policy files
 *
 * JSON documents of policy overrides, for the command line:
 *
 *   { "extends": "strict", "maxIterations": 256, "allowDeadCode": true }
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { POLICY_PRESET_NAMES, resolvePolicy, type LegalityPolicy } from './policy.js';

const limit = z.number().int().nonnegative().nullable();

export const policyFileSchema = z
  .object({
    extends: z.enum(['permissive', 'bounded', 'strict']),
    requireStaticBound: z.boolean(),
    maxIterations: limit,
    allowedLoopKinds: z.array(z.enum(['while', 'do-while', 'for'])),
    allowBreak: z.boolean(),
    allowContinue: z.boolean(),
    maxLoopExits: limit,
    maxLoopDepth: limit,
    allowEarlyReturn: z.boolean(),
    allowDeadCode: z.boolean(),
  })
  .partial()
  .strict();

export type PolicyFile = z.infer<typeof policyFileSchema>;

export class PolicyFileError extends Error {
  readonly code = 'E_POLICY_FILE';

  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = 'PolicyFileError';
  }
}

/**
 * Validate an already-decoded policy document
 */
export function policyFromJSON(value: unknown, path = '<inline>'): LegalityPolicy {
  const result = policyFileSchema.safeParse(value);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new PolicyFileError(`Invalid policy in ${path}: ${problems.join('; ')}`, path);
  }
  return resolvePolicy(result.data);
}

export function loadPolicyFile(path: string): LegalityPolicy {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PolicyFileError(`Cannot read policy file ${path}: ${reason}`, path);
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PolicyFileError(`Policy file ${path} is not valid JSON: ${reason}`, path);
  }
  return policyFromJSON(value, path);
}

/**
 * A preset name or the path of a policy file
 */
export function policyFromArgument(argument: string): LegalityPolicy {
  const preset = POLICY_PRESET_NAMES.find((name) => name === argument);
  return preset ? resolvePolicy(preset) : loadPolicyFile(argument);
}
