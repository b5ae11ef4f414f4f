/**
 * AccountEncryption
 *
 * Everything the signed-in account encrypts with, derived once from the
 * master secret when the session opens:
 *
 * - content keypair: ['Keybridge EnCoder', 'content'] - data keys are sealed to it
 * - anonymous id:    ['Keybridge Coder', 'analytics', 'id'] - first 16 bytes, hex
 *
 * Holds copies of its key material; destroy() zero-fills them.
 */

import {
  CryptoError,
  base64ToBytes,
  bytesToBase64,
  bytesToHex,
  clearAll,
  clearBytes,
  concatBytes,
  deriveBoxKeypair,
  deriveKey,
  openBox,
  openSecretBox,
  sealBox,
  sealSecretBox,
  type BoxKeypair,
} from '@keybridge/crypto';
import { createLogger } from '../logger';
import {
  AesRecordEncryptor,
  SecretBoxRecordEncryptor,
  decodeJson,
  encodeJson,
  type RecordEncryptor,
} from './records';

export const CONTENT_KEY_PATH = ['Keybridge EnCoder', 'content'] as const;
export const ANALYTICS_ID_PATH = ['Keybridge Coder', 'analytics', 'id'] as const;

/** Version byte of a data key sealed to the content keypair */
export const DATA_KEY_VERSION = 0x00;

const ANON_ID_BYTES = 16;

const logger = createLogger('encryption');

export class AccountEncryption {
  /** Stable per-account identifier that reveals nothing about the secret */
  readonly anonId: string;

  private destroyed = false;

  private constructor(
    private readonly masterSecret: Uint8Array,
    private readonly contentKeypair: BoxKeypair,
    anonId: string
  ) {
    this.anonId = anonId;
  }

  /**
   * Derive the account's working keys.
   *
   * @param masterSecret - 32-byte master secret (copied; the caller keeps ownership)
   */
  static create(masterSecret: Uint8Array): AccountEncryption {
    const contentKeypair = deriveBoxKeypair(masterSecret, CONTENT_KEY_PATH);

    const anonIdKey = deriveKey(masterSecret, ANALYTICS_ID_PATH);
    const anonId = bytesToHex(anonIdKey.subarray(0, ANON_ID_BYTES));
    clearBytes(anonIdKey);

    return new AccountEncryption(masterSecret.slice(), contentKeypair, anonId);
  }

  get contentPublicKey(): Uint8Array {
    return this.contentKeypair.publicKey;
  }

  /**
   * Encrypt a JSON value in the legacy format (secret box under the master secret).
   *
   * @returns base64 bundle
   */
  encryptRaw(value: unknown): string {
    const plaintext = encodeJson(value);
    try {
      return bytesToBase64(sealSecretBox(plaintext, this.liveSecret()));
    } finally {
      clearBytes(plaintext);
    }
  }

  /**
   * Decrypt a value produced by encryptRaw.
   *
   * @returns The value, or null if the bundle is unreadable
   */
  decryptRaw(encoded: string): unknown {
    const secret = this.liveSecret();
    let plaintext: Uint8Array;
    try {
      plaintext = openSecretBox(base64ToBytes(encoded), secret);
    } catch (error) {
      logger.warn('Raw value could not be decrypted:', error);
      return null;
    }

    try {
      return decodeJson(plaintext);
    } catch (error) {
      logger.warn('Raw value is not valid JSON:', error);
      return null;
    } finally {
      clearBytes(plaintext);
    }
  }

  /**
   * Seal a data key to the account's content public key.
   *
   * @returns 0x00 || sealed box
   */
  encryptDataKey(dataKey: Uint8Array): Uint8Array {
    this.liveSecret();
    return concatBytes(
      new Uint8Array([DATA_KEY_VERSION]),
      sealBox(dataKey, this.contentKeypair.publicKey)
    );
  }

  /**
   * Open a data key sealed by encryptDataKey on any device of this account.
   *
   * @throws CryptoError 'UNSUPPORTED_VERSION' for an unknown version byte
   * @throws CryptoError 'DECRYPTION_FAILED' if the box does not open
   */
  decryptDataKey(sealed: Uint8Array): Uint8Array {
    this.liveSecret();
    if (sealed.length === 0 || sealed[0] !== DATA_KEY_VERSION) {
      throw new CryptoError('Decryption failed', 'UNSUPPORTED_VERSION');
    }
    return openBox(sealed.subarray(1), this.contentKeypair.secretKey);
  }

  /**
   * Encryptor for a set of records.
   *
   * @param dataKey - Per-record-set data key; omit for legacy records under the master secret
   */
  openDataEncryption(dataKey?: Uint8Array): RecordEncryptor {
    if (dataKey) {
      return new AesRecordEncryptor(dataKey);
    }
    return new SecretBoxRecordEncryptor(this.liveSecret());
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  destroy(): void {
    clearAll(this.masterSecret, this.contentKeypair.secretKey);
    this.destroyed = true;
  }

  private liveSecret(): Uint8Array {
    if (this.destroyed) {
      throw new CryptoError('Account keys destroyed', 'KEY_CONSUMED');
    }
    return this.masterSecret;
  }
}
