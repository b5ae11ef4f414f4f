import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../config';
import { ConfigError } from '../errors';

function configError(run: () => unknown): ConfigError | undefined {
  try {
    run();
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  return undefined;
}

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      KEYBRIDGE_SERVER_URL: 'https://api.example.test//',
      KEYBRIDGE_REQUEST_TIMEOUT_MS: '2500',
      KEYBRIDGE_LOG_LEVEL: 'WARN',
      KEYBRIDGE_PAIRING_TIMEOUT_MS: ' 60000 ',
      KEYBRIDGE_PAIRING_POLL_INTERVAL_MS: '500',
    });

    expect(config.serverUrl).toBe('https://api.example.test');
    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.logLevel).toBe('warn');
    expect(config.pairing.timeoutMs).toBe(60000);
    expect(config.pairing.pollIntervalMs).toBe(500);
  });

  it('should treat blank variables as unset', () => {
    const config = loadConfig({ KEYBRIDGE_SERVER_URL: '  ', KEYBRIDGE_PAIRING_TIMEOUT_MS: '' });

    expect(config.serverUrl).toBe(DEFAULT_CONFIG.serverUrl);
    expect(config.pairing.timeoutMs).toBe(DEFAULT_CONFIG.pairing.timeoutMs);
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { KEYBRIDGE_SERVER_URL: 'https://env.example.test', KEYBRIDGE_PAIRING_POLL_INTERVAL_MS: '500' },
      { serverUrl: 'http://override.example.test', pairing: { pollIntervalMs: 250, waitPath: '/v2/wait' } }
    );

    expect(config.serverUrl).toBe('http://override.example.test');
    expect(config.pairing.pollIntervalMs).toBe(250);
    expect(config.pairing.waitPath).toBe('/v2/wait');
    expect(config.pairing.requestPath).toBe('/v1/auth/account/request');
  });

  it('should freeze the result', () => {
    const config = loadConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.pairing)).toBe(true);
  });

  it('should name the variable holding a malformed number', () => {
    const error = configError(() => loadConfig({ KEYBRIDGE_PAIRING_TIMEOUT_MS: '-5' }));

    expect(error?.setting).toBe('KEYBRIDGE_PAIRING_TIMEOUT_MS');
    expect(error?.message).toBe(
      'Invalid configuration for KEYBRIDGE_PAIRING_TIMEOUT_MS: expected a positive integer, got "-5"'
    );
  });

  it.each(['0', '1.5', 'ten'])('should reject request timeout %s', (raw) => {
    const error = configError(() => loadConfig({ KEYBRIDGE_REQUEST_TIMEOUT_MS: raw }));

    expect(error?.setting).toBe('KEYBRIDGE_REQUEST_TIMEOUT_MS');
  });

  it('should reject a non-positive override', () => {
    const error = configError(() => loadConfig({}, { pairing: { timeoutMs: 0 } }));

    expect(error?.setting).toBe('pairing.timeoutMs');
  });

  it('should reject server URLs that are not http or https', () => {
    expect(configError(() => loadConfig({ KEYBRIDGE_SERVER_URL: 'ftp://files.example.test' }))?.setting).toBe(
      'KEYBRIDGE_SERVER_URL'
    );
    expect(configError(() => loadConfig({ KEYBRIDGE_SERVER_URL: 'not a url' }))?.message).toBe(
      'Invalid configuration for KEYBRIDGE_SERVER_URL: not a URL: "not a url"'
    );
  });

  it('should reject unknown log levels and relative paths', () => {
    expect(configError(() => loadConfig({ KEYBRIDGE_LOG_LEVEL: 'loud' }))?.setting).toBe(
      'KEYBRIDGE_LOG_LEVEL'
    );
    expect(configError(() => loadConfig({}, { pairing: { requestPath: 'v1/request' } }))?.setting).toBe(
      'pairing.requestPath'
    );
  });
});
