/**
 * @keybridge/client
 *
 * Stateful half of the account trust core: configuration, HTTP, device
 * pairing (both sides), the account session store and data encryption.
 *
 * @example
 * ```typescript
 * import { createKeybridgeClient, MemoryStorage } from '@keybridge/client';
 *
 * const client = createKeybridgeClient({ storage: new MemoryStorage() });
 *
 * // New device: show session.link as a QR code, then wait
 * const { session, outcome } = client.linker.link();
 * const result = await outcome;
 *
 * // Signed-in device: approve the scanned link
 * await client.approve(scannedLink);
 * ```
 */

export { createKeybridgeClient, type KeybridgeClient, type KeybridgeClientOptions } from './client';

// Configuration, logging, errors
export {
  loadConfig,
  DEFAULT_CONFIG,
  type ClientConfig,
  type ClientConfigOverrides,
  type PairingConfig,
  type Env,
} from './config';
export {
  createLogger,
  setLogLevel,
  getLogLevel,
  fingerprint,
  type Logger,
  type LogLevel,
} from './logger';
export {
  PairingError,
  isPairingError,
  ConfigError,
  type PairingErrorCode,
} from './errors';

// HTTP
export { createApiClient, type AccessTokenProvider } from './api/client';
export {
  HttpPairingApi,
  MalformedResponseError,
  type PairingApi,
  type PairingPaths,
  type PairingRequestResult,
  type PairingWaitResult,
} from './api/pairing.api';

// Pairing
export * from './pairing';

// Account session and encryption
export * from './account';
export {
  createAccountStore,
  type AccountStore,
  type AccountState,
  type AccountStatus,
} from './stores/account.store';

// Storage
export { MemoryStorage, type KeyValueStorage } from './storage';
