/**
 * Environment configuration
 *
 * Every setting is read from a SURGE_* variable. The selected network supplies
 * the Gateway URL and registry address unless they are set explicitly.
 */

import { z } from 'zod';
import { SurgeError } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import type { NetworkName } from './types.js';
import { DEFAULT_ORACLE_URL, NETWORKS } from './types.js';

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  SURGE_NETWORK: z.enum(['mainnet', 'stokenet']).default('mainnet'),
  SURGE_GATEWAY_URL: z.string().url().optional(),
  SURGE_ORACLE_URL: z.string().url().default(DEFAULT_ORACLE_URL),
  SURGE_ENV_REGISTRY: z.string().min(1).optional(),
  SURGE_ACCOUNT_DIR: z.string().min(1).default('.surge'),
  SURGE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SURGE_REQUEST_TIMEOUT_MS: positiveInt.default(30_000),
  SURGE_TX_POLL_INTERVAL_MS: positiveInt.default(1_000),
  SURGE_TX_MAX_POLL_ATTEMPTS: positiveInt.default(60),
  SURGE_EPOCHS_VALID: positiveInt.default(2),
});

export interface SurgeConfig {
  network: NetworkName;
  networkId: number;
  gatewayUrl: string;
  oracleUrl: string;
  envRegistry: string;
  accountDir: string;           // Where stored account keys live
  logLevel: LogLevel;
  requestTimeoutMs: number;
  pollIntervalMs: number;
  maxPollAttempts: number;
  epochsValid: number;
}

/**
 * Build the configuration from environment variables
 *
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SurgeConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw SurgeError.invalidConfig(
      issue ? issue.path.join('.') : 'environment',
      issue ? issue.message : 'invalid environment'
    );
  }

  const vars = result.data;
  const preset = NETWORKS[vars.SURGE_NETWORK];

  return {
    network: vars.SURGE_NETWORK,
    networkId: preset.networkId,
    gatewayUrl: vars.SURGE_GATEWAY_URL ?? preset.gatewayUrl,
    oracleUrl: vars.SURGE_ORACLE_URL,
    envRegistry: vars.SURGE_ENV_REGISTRY ?? preset.envRegistry,
    accountDir: vars.SURGE_ACCOUNT_DIR,
    logLevel: vars.SURGE_LOG_LEVEL,
    requestTimeoutMs: vars.SURGE_REQUEST_TIMEOUT_MS,
    pollIntervalMs: vars.SURGE_TX_POLL_INTERVAL_MS,
    maxPollAttempts: vars.SURGE_TX_MAX_POLL_ATTEMPTS,
    epochsValid: vars.SURGE_EPOCHS_VALID,
  };
}
