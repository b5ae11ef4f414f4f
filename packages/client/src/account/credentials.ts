/**
 * Persisted account credentials.
 *
 * One JSON entry `{ token, secret }` (secret in base64) under a single key.
 * Whatever is found there is validated before use; a missing or corrupt
 * entry reads as "signed out".
 */

import { MASTER_SECRET_SIZE, base64ToBytes, bytesToBase64, isCryptoError } from '@keybridge/crypto';
import { createLogger } from '../logger';
import type { KeyValueStorage } from '../storage/types';

export const CREDENTIALS_KEY = 'keybridge:auth_credentials';

const logger = createLogger('credentials');

export type AccountCredentials = {
  token: string;
  /** 32-byte master secret */
  secret: Uint8Array;
};

type StoredCredentials = {
  token: string;
  secret: string;
};

function isStoredCredentials(value: unknown): value is StoredCredentials {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'token' in value &&
    'secret' in value &&
    typeof value.token === 'string' &&
    value.token.length > 0 &&
    typeof value.secret === 'string'
  );
}

export class CredentialStore {
  constructor(
    private readonly storage: KeyValueStorage,
    private readonly key: string = CREDENTIALS_KEY
  ) {}

  async load(): Promise<AccountCredentials | null> {
    const raw = await this.storage.getItem(this.key);
    if (raw === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      logger.warn('Stored credentials are not valid JSON');
      return null;
    }

    if (!isStoredCredentials(parsed)) {
      logger.warn('Stored credentials have an unexpected shape');
      return null;
    }

    let secret: Uint8Array;
    try {
      secret = base64ToBytes(parsed.secret);
    } catch (error) {
      if (!isCryptoError(error, 'INVALID_ENCODING')) throw error;
      logger.warn('Stored secret is not valid base64');
      return null;
    }

    if (secret.length !== MASTER_SECRET_SIZE) {
      secret.fill(0);
      logger.warn('Stored secret has the wrong length');
      return null;
    }

    return { token: parsed.token, secret };
  }

  async save(credentials: AccountCredentials): Promise<void> {
    const stored: StoredCredentials = {
      token: credentials.token,
      secret: bytesToBase64(credentials.secret),
    };
    await this.storage.setItem(this.key, JSON.stringify(stored));
  }

  async clear(): Promise<void> {
    await this.storage.removeItem(this.key);
  }
}
