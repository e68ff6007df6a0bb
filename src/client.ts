/**
 * Wiring for a ready-to-use Surge client
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { loadConfig } from './config.js';
import type { SurgeConfig } from './config.js';
import { Exchange } from './exchange.js';
import { Gateway } from './gateway.js';
import { createLogger, setLogLevel } from './logger.js';
import { Oracle } from './oracle.js';
import { NETWORKS } from './types.js';

export interface SurgeClientOptions extends Partial<SurgeConfig> {
  http?: AxiosInstance;         // Shared HTTP client; built from the config when absent
  env?: NodeJS.ProcessEnv;
  loadVariables?: boolean;      // Defaults to true
}

export interface SurgeClient {
  config: SurgeConfig;
  gateway: Gateway;
  oracle: Oracle;
  exchange: Exchange;
}

const logger = createLogger('client');

/**
 * Apply option overrides; choosing a network brings its preset addresses along
 */
export function resolveConfig(base: SurgeConfig, overrides: Partial<SurgeConfig>): SurgeConfig {
  const pick = <K extends keyof SurgeConfig>(key: K): SurgeConfig[K] => overrides[key] ?? base[key];
  const network = pick('network');
  const preset = network === base.network ? null : NETWORKS[network];

  return {
    network,
    networkId: overrides.networkId ?? preset?.networkId ?? base.networkId,
    gatewayUrl: overrides.gatewayUrl ?? preset?.gatewayUrl ?? base.gatewayUrl,
    oracleUrl: pick('oracleUrl'),
    envRegistry: overrides.envRegistry ?? preset?.envRegistry ?? base.envRegistry,
    accountDir: pick('accountDir'),
    logLevel: pick('logLevel'),
    requestTimeoutMs: pick('requestTimeoutMs'),
    pollIntervalMs: pick('pollIntervalMs'),
    maxPollAttempts: pick('maxPollAttempts'),
    epochsValid: pick('epochsValid'),
  };
}

/**
 * Build a Gateway, Oracle and Exchange from the environment and options
 */
export async function createSurgeClient(options: SurgeClientOptions = {}): Promise<SurgeClient> {
  const { http: providedHttp, env, loadVariables = true, ...overrides } = options;
  const config = resolveConfig(loadConfig(env), overrides);
  setLogLevel(config.logLevel);

  const http = providedHttp ?? axios.create({ timeout: config.requestTimeoutMs });
  const gateway = new Gateway(http, {
    baseUrl: config.gatewayUrl,
    networkId: config.networkId,
    epochsValid: config.epochsValid,
    pollIntervalMs: config.pollIntervalMs,
    maxPollAttempts: config.maxPollAttempts,
  });
  const oracle = new Oracle(http, config.oracleUrl);
  const exchange = new Exchange(gateway, oracle, config.envRegistry);

  if (loadVariables) {
    await exchange.loadVariables();
  }
  logger.info({ network: config.network, gateway: config.gatewayUrl }, 'Surge client ready');
  return { config, gateway, oracle, exchange };
}
