/**
 * Record encryptors for synced JSON values.
 *
 * Two formats exist side by side:
 * - legacy: secret box over the master secret, no version byte
 * - data key: 0x00 || AES-256-GCM bundle under a per-record-set data key
 *
 * Batches never fail as a whole: a record that cannot be read decrypts
 * to null and is logged.
 */

import {
  CryptoError,
  clearBytes,
  concatBytes,
  openSecretBox,
  sealAesGcm,
  sealSecretBox,
  unsealAesGcm,
} from '@keybridge/crypto';
import { createLogger } from '../logger';

const logger = createLogger('records');

/** Version byte of data-key records */
export const RECORD_VERSION_AES = 0x00;

export interface RecordEncryptor {
  encrypt(values: readonly unknown[]): Promise<Uint8Array[]>;
  /** One entry per record; null where the record could not be decrypted or parsed */
  decrypt(records: readonly Uint8Array[]): Promise<unknown[]>;
  /** Zero-fill the key held by this encryptor */
  destroy(): void;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function encodeJson(value: unknown): Uint8Array {
  const json = JSON.stringify(value);
  if (json === undefined) {
    throw new CryptoError('Encryption failed', 'ENCRYPTION_FAILED');
  }
  return encoder.encode(json);
}

export function decodeJson(bytes: Uint8Array): unknown {
  return JSON.parse(decoder.decode(bytes));
}

abstract class KeyedRecordEncryptor implements RecordEncryptor {
  private readonly key: Uint8Array;
  private destroyed = false;

  constructor(key: Uint8Array) {
    // Own copy: the caller may clear theirs
    this.key = key.slice();
  }

  protected abstract seal(plaintext: Uint8Array, key: Uint8Array): Promise<Uint8Array>;
  protected abstract open(record: Uint8Array, key: Uint8Array): Promise<Uint8Array>;

  async encrypt(values: readonly unknown[]): Promise<Uint8Array[]> {
    const key = this.liveKey();
    const records: Uint8Array[] = [];
    for (const value of values) {
      const plaintext = encodeJson(value);
      try {
        records.push(await this.seal(plaintext, key));
      } finally {
        clearBytes(plaintext);
      }
    }
    return records;
  }

  async decrypt(records: readonly Uint8Array[]): Promise<unknown[]> {
    const key = this.liveKey();
    const values: unknown[] = [];
    for (const [index, record] of records.entries()) {
      values.push(await this.decryptOne(record, key, index));
    }
    return values;
  }

  destroy(): void {
    clearBytes(this.key);
    this.destroyed = true;
  }

  private async decryptOne(record: Uint8Array, key: Uint8Array, index: number): Promise<unknown> {
    let plaintext: Uint8Array;
    try {
      plaintext = await this.open(record, key);
    } catch (error) {
      logger.warn(`Record ${index} could not be decrypted:`, error);
      return null;
    }

    try {
      return decodeJson(plaintext);
    } catch (error) {
      logger.warn(`Record ${index} is not valid JSON:`, error);
      return null;
    } finally {
      clearBytes(plaintext);
    }
  }

  private liveKey(): Uint8Array {
    if (this.destroyed) {
      throw new CryptoError('Encryption key destroyed', 'KEY_CONSUMED');
    }
    return this.key;
  }
}

/**
 * Legacy records: secret box, keyed directly by the master secret.
 */
export class SecretBoxRecordEncryptor extends KeyedRecordEncryptor {
  protected async seal(plaintext: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
    return sealSecretBox(plaintext, key);
  }

  protected async open(record: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
    return openSecretBox(record, key);
  }
}

/**
 * Data-key records: version byte followed by an AES-256-GCM bundle.
 */
export class AesRecordEncryptor extends KeyedRecordEncryptor {
  protected async seal(plaintext: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
    return concatBytes(new Uint8Array([RECORD_VERSION_AES]), await sealAesGcm(plaintext, key));
  }

  protected async open(record: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
    if (record.length === 0 || record[0] !== RECORD_VERSION_AES) {
      throw new CryptoError('Decryption failed', 'UNSUPPORTED_VERSION');
    }
    return unsealAesGcm(record.subarray(1), key);
  }
}
