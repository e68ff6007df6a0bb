/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { resolveConfig } from '../src/client.js';
import { ErrorCodes, SurgeError } from '../src/errors.js';
import { DEFAULT_ORACLE_URL, NETWORKS } from '../src/types.js';

function configError(env: NodeJS.ProcessEnv): SurgeError | undefined {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof SurgeError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

describe('Config', () => {
  it('should default to mainnet', () => {
    expect(loadConfig({})).toEqual({
      network: 'mainnet',
      networkId: 1,
      gatewayUrl: NETWORKS.mainnet.gatewayUrl,
      oracleUrl: DEFAULT_ORACLE_URL,
      envRegistry: NETWORKS.mainnet.envRegistry,
      accountDir: '.surge',
      logLevel: 'info',
      requestTimeoutMs: 30000,
      pollIntervalMs: 1000,
      maxPollAttempts: 60,
      epochsValid: 2,
    });
  });

  it('should take network presets and overrides from the environment', () => {
    const config = loadConfig({
      SURGE_NETWORK: 'stokenet',
      SURGE_ORACLE_URL: 'https://hermes.test/v2',
      SURGE_LOG_LEVEL: 'debug',
      SURGE_TX_MAX_POLL_ATTEMPTS: '5',
      SURGE_EPOCHS_VALID: ' 10 ',
    });

    expect(config.networkId).toBe(2);
    expect(config.gatewayUrl).toBe(NETWORKS.stokenet.gatewayUrl);
    expect(config.envRegistry).toBe(NETWORKS.stokenet.envRegistry);
    expect(config.oracleUrl).toBe('https://hermes.test/v2');
    expect(config.logLevel).toBe('debug');
    expect(config.maxPollAttempts).toBe(5);
    expect(config.epochsValid).toBe(10);
  });

  it('should prefer explicit addresses over the preset', () => {
    const config = loadConfig({
      SURGE_NETWORK: 'stokenet',
      SURGE_GATEWAY_URL: 'http://localhost:8080',
      SURGE_ENV_REGISTRY: 'component_custom',
    });

    expect(config.gatewayUrl).toBe('http://localhost:8080');
    expect(config.envRegistry).toBe('component_custom');
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ SURGE_NETWORK: '', SURGE_REQUEST_TIMEOUT_MS: '  ' }).network).toBe('mainnet');
  });

  it('should reject invalid values', () => {
    const network = configError({ SURGE_NETWORK: 'devnet' });
    expect(network?.code).toBe(ErrorCodes.INVALID_CONFIG);
    expect(network?.details?.key).toBe('SURGE_NETWORK');

    expect(configError({ SURGE_REQUEST_TIMEOUT_MS: '-3' })?.details?.key).toBe('SURGE_REQUEST_TIMEOUT_MS');
    expect(configError({ SURGE_TX_POLL_INTERVAL_MS: 'soon' })?.details?.key).toBe('SURGE_TX_POLL_INTERVAL_MS');
    expect(configError({ SURGE_GATEWAY_URL: 'not a url' })?.details?.key).toBe('SURGE_GATEWAY_URL');
    expect(configError({ SURGE_LOG_LEVEL: 'loud' })?.details?.key).toBe('SURGE_LOG_LEVEL');
  });

  describe('resolveConfig', () => {
    const base = loadConfig({});

    it('should bring the preset of an overridden network', () => {
      const config = resolveConfig(base, { network: 'stokenet' });

      expect(config.networkId).toBe(2);
      expect(config.gatewayUrl).toBe(NETWORKS.stokenet.gatewayUrl);
      expect(config.envRegistry).toBe(NETWORKS.stokenet.envRegistry);
    });

    it('should keep explicit overrides', () => {
      const config = resolveConfig(base, { network: 'stokenet', gatewayUrl: 'http://localhost:8080', maxPollAttempts: 3 });

      expect(config.gatewayUrl).toBe('http://localhost:8080');
      expect(config.maxPollAttempts).toBe(3);
      expect(config.pollIntervalMs).toBe(1000);
    });

    it('should ignore undefined overrides', () => {
      expect(resolveConfig(base, { logLevel: undefined })).toEqual(base);
    });
  });
});
