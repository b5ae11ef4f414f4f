/**
 * Client configuration.
 *
 * Read once from the environment with defaults, then frozen. Explicit
 * overrides win over the environment (tests, embedding apps).
 */

import { ConfigError } from './errors';
import { isLogLevel, type LogLevel } from './logger';

export type PairingConfig = {
  /** Wall-clock limit for one pairing session, from start() */
  timeoutMs: number;
  /** Pause between wait polls and between transient-error retries */
  pollIntervalMs: number;
  requestPath: string;
  waitPath: string;
  responsePath: string;
};

export type ClientConfig = {
  serverUrl: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  pairing: PairingConfig;
};

export type ClientConfigOverrides = Partial<Omit<ClientConfig, 'pairing'>> & {
  pairing?: Partial<PairingConfig>;
};

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: ClientConfig = {
  serverUrl: 'http://localhost:3005',
  requestTimeoutMs: 15_000,
  logLevel: 'info',
  pairing: {
    timeoutMs: 120_000,
    pollIntervalMs: 1_000,
    requestPath: '/v1/auth/account/request',
    waitPath: '/v1/auth/account/wait',
    responsePath: '/v1/auth/account/response',
  },
};

function parsePositiveInt(setting: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(setting, `expected a positive integer, got "${raw}"`);
  }
  return checkPositiveInt(setting, Number(trimmed));
}

function checkPositiveInt(setting: string, value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(setting, `expected a positive integer, got ${value}`);
  }
  return value;
}

function parseLogLevel(setting: string, raw: string | undefined, fallback: LogLevel): LogLevel {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(setting, `unknown log level "${raw}"`);
  }
  return level;
}

function checkServerUrl(setting: string, value: string): string {
  try {
    const url = new URL(value);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigError(setting, `unsupported protocol ${url.protocol}`);
    }
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(setting, `not a URL: "${value}"`);
  }
  return value.replace(/\/+$/, '');
}

function checkPath(setting: string, value: string): string {
  if (!value.startsWith('/')) {
    throw new ConfigError(setting, `path must start with "/", got "${value}"`);
  }
  return value;
}

/**
 * Build the client configuration.
 *
 * @param env - Environment to read (defaults to process.env)
 * @param overrides - Values that take precedence over the environment
 * @throws ConfigError for a malformed number, URL, path or log level
 */
export function loadConfig(
  env: Env = process.env,
  overrides: ClientConfigOverrides = {}
): Readonly<ClientConfig> {
  const pairingOverrides = overrides.pairing ?? {};

  const pairing: PairingConfig = {
    timeoutMs:
      pairingOverrides.timeoutMs !== undefined
        ? checkPositiveInt('pairing.timeoutMs', pairingOverrides.timeoutMs)
        : parsePositiveInt(
            'KEYBRIDGE_PAIRING_TIMEOUT_MS',
            env.KEYBRIDGE_PAIRING_TIMEOUT_MS,
            DEFAULT_CONFIG.pairing.timeoutMs
          ),
    pollIntervalMs:
      pairingOverrides.pollIntervalMs !== undefined
        ? checkPositiveInt('pairing.pollIntervalMs', pairingOverrides.pollIntervalMs)
        : parsePositiveInt(
            'KEYBRIDGE_PAIRING_POLL_INTERVAL_MS',
            env.KEYBRIDGE_PAIRING_POLL_INTERVAL_MS,
            DEFAULT_CONFIG.pairing.pollIntervalMs
          ),
    requestPath: checkPath(
      'pairing.requestPath',
      pairingOverrides.requestPath ?? DEFAULT_CONFIG.pairing.requestPath
    ),
    waitPath: checkPath('pairing.waitPath', pairingOverrides.waitPath ?? DEFAULT_CONFIG.pairing.waitPath),
    responsePath: checkPath(
      'pairing.responsePath',
      pairingOverrides.responsePath ?? DEFAULT_CONFIG.pairing.responsePath
    ),
  };

  const config: ClientConfig = {
    serverUrl:
      overrides.serverUrl !== undefined
        ? checkServerUrl('serverUrl', overrides.serverUrl)
        : checkServerUrl(
            'KEYBRIDGE_SERVER_URL',
            env.KEYBRIDGE_SERVER_URL?.trim() || DEFAULT_CONFIG.serverUrl
          ),
    requestTimeoutMs:
      overrides.requestTimeoutMs !== undefined
        ? checkPositiveInt('requestTimeoutMs', overrides.requestTimeoutMs)
        : parsePositiveInt(
            'KEYBRIDGE_REQUEST_TIMEOUT_MS',
            env.KEYBRIDGE_REQUEST_TIMEOUT_MS,
            DEFAULT_CONFIG.requestTimeoutMs
          ),
    logLevel:
      overrides.logLevel !== undefined
        ? parseLogLevel('logLevel', overrides.logLevel, DEFAULT_CONFIG.logLevel)
        : parseLogLevel('KEYBRIDGE_LOG_LEVEL', env.KEYBRIDGE_LOG_LEVEL, DEFAULT_CONFIG.logLevel),
    pairing: Object.freeze(pairing),
  };

  return Object.freeze(config);
}
