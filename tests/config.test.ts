/**
 * Tests for loadConfig
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

const credentials = {
  BINANCE_API_KEY: 'test-key',
  BINANCE_API_SECRET: 'test-secret',
};

describe('loadConfig', () => {
  it('should apply defaults for everything but the credentials', () => {
    const config = loadConfig(credentials);

    expect(config.binance).toEqual({
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      testnet: true,
      requestTimeoutMs: 10000,
      recvWindow: 5000,
    });
    expect(config.execution).toEqual({
      maxAttempts: 3,
      backoffBaseMs: 500,
      backoffFactor: 2,
      backoffMaxMs: 5000,
    });
    expect(config.tracking).toEqual({ pollIntervalMs: 2000 });
    expect(config.twap).toEqual({
      maxSlices: 50,
      maxIntervalSeconds: 300,
      failurePolicy: 'halt',
    });
    expect(config.logging).toEqual({ level: 'info', directory: 'logs' });
    expect(config.audit).toEqual({ file: 'logs/audit.log' });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ...credentials,
      BINANCE_TESTNET: 'false',
      EXECUTION_MAX_ATTEMPTS: '5',
      TWAP_FAILURE_POLICY: 'reslice',
      LOG_DIR: '/var/log/trader',
    });

    expect(config.binance.testnet).toBe(false);
    expect(config.execution.maxAttempts).toBe(5);
    expect(config.twap.failurePolicy).toBe('reslice');
    expect(config.audit.file).toBe('/var/log/trader/audit.log');
  });

  it('should require API credentials', () => {
    expect(() => loadConfig({ BINANCE_API_SECRET: 'test-secret' })).toThrow(
      new ConfigurationError('Missing required environment variable: BINANCE_API_KEY')
    );
  });

  it('should reject a non-numeric setting', () => {
    expect(() => loadConfig({ ...credentials, EXECUTION_BACKOFF_BASE_MS: 'soon' })).toThrow(
      'Environment variable EXECUTION_BACKOFF_BASE_MS must be a number'
    );
  });

  it.each([
    ['EXECUTION_MAX_ATTEMPTS', '0', 'must be at least 1'],
    ['EXECUTION_MAX_ATTEMPTS', '2.5', 'must be an integer'],
    ['EXECUTION_BACKOFF_BASE_MS', '-1', 'must be at least 0'],
    ['EXECUTION_BACKOFF_FACTOR', '0.5', 'must be at least 1'],
    ['ORDER_POLL_INTERVAL_MS', '0', 'must be at least 1'],
    ['TWAP_MAX_SLICES', '-3', 'must be at least 1'],
    ['TWAP_MAX_INTERVAL_SECONDS', '-10', 'must be at least 0'],
    ['BINANCE_RECV_WINDOW', '70000', 'must be at most 60000'],
    ['BINANCE_REQUEST_TIMEOUT_MS', 'Infinity', 'must be a number'],
  ])('should reject %s=%s', (key, value, problem) => {
    expect(() => loadConfig({ ...credentials, [key]: value })).toThrow(
      new ConfigurationError(`Environment variable ${key} ${problem}`)
    );
  });

  it('should accept a zero backoff', () => {
    const config = loadConfig({ ...credentials, EXECUTION_BACKOFF_BASE_MS: '0' });

    expect(config.execution.backoffBaseMs).toBe(0);
  });

  it('should reject an unknown TWAP failure policy', () => {
    expect(() => loadConfig({ ...credentials, TWAP_FAILURE_POLICY: 'retry' })).toThrow(
      'TWAP_FAILURE_POLICY must be one of halt, continue, reslice'
    );
  });
});
