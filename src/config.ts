import { ConfigurationError } from './errors.js';
import type { TwapFailurePolicy } from './twap/types.js';

type Env = Record<string, string | undefined>;

const FAILURE_POLICIES: readonly TwapFailurePolicy[] = ['halt', 'continue', 'reslice'];

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key] || defaultValue;
  if (value === undefined) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

interface NumberRange {
  min: number;
  max?: number;
  integer?: boolean;
}

function getEnvNumber(env: Env, key: string, defaultValue: number, range: NumberRange): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number`);
  }
  if (range.integer && !Number.isInteger(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be an integer`);
  }
  if (parsed < range.min) {
    throw new ConfigurationError(`Environment variable ${key} must be at least ${range.min}`);
  }
  if (range.max !== undefined && parsed > range.max) {
    throw new ConfigurationError(`Environment variable ${key} must be at most ${range.max}`);
  }
  return parsed;
}

const POSITIVE_INTEGER: NumberRange = { min: 1, integer: true };
const NON_NEGATIVE: NumberRange = { min: 0 };

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function getFailurePolicy(env: Env): TwapFailurePolicy {
  const value = getEnvVar(env, 'TWAP_FAILURE_POLICY', 'halt');
  const policy = FAILURE_POLICIES.find((p) => p === value);
  if (!policy) {
    throw new ConfigurationError(
      `TWAP_FAILURE_POLICY must be one of ${FAILURE_POLICIES.join(', ')}`
    );
  }
  return policy;
}

/**
 * Build the application configuration once at startup.
 * Core classes receive slices of this object and never read the environment.
 */
export function loadConfig(env: Env = process.env) {
  const logDir = getEnvVar(env, 'LOG_DIR', 'logs');

  return {
    // Binance Configuration
    binance: {
      apiKey: getEnvVar(env, 'BINANCE_API_KEY'),
      apiSecret: getEnvVar(env, 'BINANCE_API_SECRET'),
      testnet: getEnvBoolean(env, 'BINANCE_TESTNET', true),

      /** HTTP timeout per request (ms) */
      requestTimeoutMs: getEnvNumber(env, 'BINANCE_REQUEST_TIMEOUT_MS', 10000, POSITIVE_INTEGER),

      /** Signed request validity window (ms) */
      recvWindow: getEnvNumber(env, 'BINANCE_RECV_WINDOW', 5000, {
        ...POSITIVE_INTEGER,
        max: 60000,
      }),
    },

    // Execution Engine Configuration
    execution: {
      /** Total placement attempts per order, first one included */
      maxAttempts: getEnvNumber(env, 'EXECUTION_MAX_ATTEMPTS', 3, POSITIVE_INTEGER),
      backoffBaseMs: getEnvNumber(env, 'EXECUTION_BACKOFF_BASE_MS', 500, NON_NEGATIVE),
      backoffFactor: getEnvNumber(env, 'EXECUTION_BACKOFF_FACTOR', 2, { min: 1 }),
      backoffMaxMs: getEnvNumber(env, 'EXECUTION_BACKOFF_MAX_MS', 5000, NON_NEGATIVE),
    },

    // Order status polling for resting orders
    tracking: {
      pollIntervalMs: getEnvNumber(env, 'ORDER_POLL_INTERVAL_MS', 2000, POSITIVE_INTEGER),
    },

    // TWAP Configuration
    twap: {
      maxSlices: getEnvNumber(env, 'TWAP_MAX_SLICES', 50, POSITIVE_INTEGER),
      maxIntervalSeconds: getEnvNumber(env, 'TWAP_MAX_INTERVAL_SECONDS', 300, NON_NEGATIVE),
      failurePolicy: getFailurePolicy(env),
    },

    // Logging Configuration
    logging: {
      level: getEnvVar(env, 'LOG_LEVEL', 'info'),
      directory: logDir,
    },

    // Audit trail
    audit: {
      file: getEnvVar(env, 'AUDIT_LOG_FILE', `${logDir}/audit.log`),
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;
