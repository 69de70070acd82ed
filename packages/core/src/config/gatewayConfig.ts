/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_USER_AGENT } from '../version.js';

export const ApiRegistrationSchema = z.object({
  name: z.string().trim().min(1),
  callsPerSecond: z.number().positive(),
  maxConcurrent: z.number().int().positive(),
});

export const GatewayConfigSchema = z
  .object({
    /** Maximum transport calls per query, the first one included */
    maxRetries: z.number().int().min(1).default(3),
    baseRetryDelayMs: z.number().min(0).default(1000),
    cacheTtlSeconds: z.number().positive().default(86400),
    cacheEnabled: z.boolean().default(true),
    cacheDir: z.string().min(1).default('.apigate/cache'),
    boundedCacheMaxSize: z.number().int().positive().default(1000),
    backoffMultiplier: z.number().min(1).default(1.5),
    maxBackoffMultiplier: z.number().min(1).default(8),
    successStreakThreshold: z.number().int().min(0).default(5),
    accelerationFactor: z.number().gt(0).lt(1).default(0.8),
    autoRegisterDefaults: z.boolean().default(false),
    defaultCallsPerSecond: z.number().positive().default(1),
    defaultMaxConcurrent: z.number().int().positive().default(5),
    requestTimeoutMs: z.number().int().positive().default(30000),
    maxSockets: z.number().int().positive().default(20),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    apis: z.array(ApiRegistrationSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.apis.forEach((api, index) => {
      if (seen.has(api.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['apis', index, 'name'],
          message: `Duplicate API name "${api.name}"`,
        });
      }
      seen.add(api.name);
    });
  });

export type ApiRegistrationConfig = z.infer<typeof ApiRegistrationSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;

type EnvValueType = 'number' | 'boolean' | 'string';

type ScalarConfigKey = Exclude<keyof GatewayConfig, 'apis'>;

/**
 * Environment variables understood by {@link loadGatewayConfig}
 */
export const ENV_VARIABLES: Record<string, [ScalarConfigKey, EnvValueType]> = {
  APIGATE_MAX_RETRIES: ['maxRetries', 'number'],
  APIGATE_BASE_RETRY_DELAY_MS: ['baseRetryDelayMs', 'number'],
  APIGATE_CACHE_TTL_SECONDS: ['cacheTtlSeconds', 'number'],
  APIGATE_CACHE_ENABLED: ['cacheEnabled', 'boolean'],
  APIGATE_CACHE_DIR: ['cacheDir', 'string'],
  APIGATE_BOUNDED_CACHE_MAX_SIZE: ['boundedCacheMaxSize', 'number'],
  APIGATE_BACKOFF_MULTIPLIER: ['backoffMultiplier', 'number'],
  APIGATE_MAX_BACKOFF_MULTIPLIER: ['maxBackoffMultiplier', 'number'],
  APIGATE_SUCCESS_STREAK_THRESHOLD: ['successStreakThreshold', 'number'],
  APIGATE_ACCELERATION_FACTOR: ['accelerationFactor', 'number'],
  APIGATE_AUTO_REGISTER: ['autoRegisterDefaults', 'boolean'],
  APIGATE_DEFAULT_CALLS_PER_SECOND: ['defaultCallsPerSecond', 'number'],
  APIGATE_DEFAULT_MAX_CONCURRENT: ['defaultMaxConcurrent', 'number'],
  APIGATE_REQUEST_TIMEOUT_MS: ['requestTimeoutMs', 'number'],
  APIGATE_MAX_SOCKETS: ['maxSockets', 'number'],
  APIGATE_USER_AGENT: ['userAgent', 'string'],
};

function parseEnvValue(raw: string, type: EnvValueType): unknown {
  switch (type) {
    case 'number':
      // Left as a string so validation reports it
      return raw.trim() !== '' && Number.isFinite(Number(raw)) ? Number(raw) : raw;
    case 'boolean': {
      const normalized = raw.trim().toLowerCase();
      if (normalized === 'true' || normalized === '1') return true;
      if (normalized === 'false' || normalized === '0') return false;
      return raw;
    }
    default:
      return raw;
  }
}

/**
 * Collect config values from `APIGATE_*` variables
 */
export function readEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [variable, [key, type]] of Object.entries(ENV_VARIABLES)) {
    const raw = env[variable];
    if (raw !== undefined) {
      values[key] = parseEnvValue(raw, type);
    }
  }
  return values;
}

export function formatConfigIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${at}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate a configuration object and fill in defaults
 */
export function parseGatewayConfig(input: unknown): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid gateway configuration: ${formatConfigIssues(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Resolve the effective configuration: defaults, then `APIGATE_*`
 * environment variables, then explicit overrides. Overrides set to
 * `undefined` are ignored.
 */
export function loadGatewayConfig(
  overrides: GatewayConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): GatewayConfig {
  const explicit = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return parseGatewayConfig({ ...readEnvConfig(env), ...explicit });
}
