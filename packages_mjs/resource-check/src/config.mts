/**
 * Checker configuration
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.mjs';

export const DEFAULT_USER_AGENT = 'http-conformance/0.1';

/**
 * Recognised options and their defaults
 */
export const CheckerConfigSchema = z
  .object({
    /** Redirects followed from one starting URI */
    maxRedirects: z.number().int().min(0).max(20).default(5),
    /** Body bytes kept per response */
    bodyCaptureCap: z
      .number()
      .int()
      .min(1)
      .default(8 * 1024 * 1024),
    /** Per-fetch timeout in milliseconds */
    fetchTimeout: z.number().int().positive().default(10_000),
    /** Issue redirect, conditional, range and negotiation follow-ups */
    followRelatedFetches: z.boolean().default(true),
    /** Size of the range requested by the range probe */
    rangeProbeBytes: z.number().int().min(1).default(10),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  })
  .strict();

export type CheckerConfig = z.output<typeof CheckerConfigSchema>;
export type CheckerConfigInput = z.input<typeof CheckerConfigSchema>;

export const DEFAULT_CHECKER_CONFIG: Readonly<CheckerConfig> = Object.freeze(CheckerConfigSchema.parse({}));

/**
 * Validate options and fill in defaults
 *
 * @throws ConfigurationError listing every rejected option
 */
export function mergeConfig(config: CheckerConfigInput = {}): CheckerConfig {
  const result = CheckerConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid checker configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

const ENV_PREFIX = 'CONFORMANCE_';

function numberVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[ENV_PREFIX + name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  // NaN is rejected by the schema with the option's name
  return Number(raw);
}

function booleanVar(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[ENV_PREFIX + name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new ConfigurationError(`${ENV_PREFIX}${name} must be true or false, got "${raw}"`, [
    `${ENV_PREFIX}${name}: expected a boolean`,
  ]);
}

/**
 * Read options from CONFORMANCE_* environment variables.
 * Unset variables stay undefined so defaults apply.
 *
 * @example
 * // CONFORMANCE_MAX_REDIRECTS=2 CONFORMANCE_FOLLOW_RELATED_FETCHES=false
 * const checker = createResourceChecker(fetcher, configFromEnv());
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): CheckerConfigInput {
  return {
    maxRedirects: numberVar(env, 'MAX_REDIRECTS'),
    bodyCaptureCap: numberVar(env, 'BODY_CAPTURE_CAP'),
    fetchTimeout: numberVar(env, 'FETCH_TIMEOUT'),
    followRelatedFetches: booleanVar(env, 'FOLLOW_RELATED_FETCHES'),
    rangeProbeBytes: numberVar(env, 'RANGE_PROBE_BYTES'),
    userAgent: env[`${ENV_PREFIX}USER_AGENT`] || undefined,
  };
}
