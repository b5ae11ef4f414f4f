/**
 * @keybridge/crypto - Single-Use Box Keypair
 *
 * The requesting side of device pairing publishes a fresh public key and
 * must open exactly one bundle with it. This class owns the secret half
 * and refuses to use it twice.
 */

import { CryptoError } from '../types';
import { clearBytes } from '../utils/memory';
import { generateBoxKeypair } from './keygen';
import { openBox } from './open';

export class EphemeralBoxKeypair {
  readonly publicKey: Uint8Array;
  private secretKey: Uint8Array | null;

  private constructor(publicKey: Uint8Array, secretKey: Uint8Array) {
    this.publicKey = publicKey;
    this.secretKey = secretKey;
  }

  /**
   * Generate a fresh random keypair.
   */
  static generate(): EphemeralBoxKeypair {
    const { publicKey, secretKey } = generateBoxKeypair();
    return new EphemeralBoxKeypair(publicKey, secretKey);
  }

  /** True once the secret key has been used or discarded */
  get consumed(): boolean {
    return this.secretKey === null;
  }

  /**
   * Open one sealed box, then destroy the secret key.
   *
   * The key is destroyed whether or not decryption succeeds; a failed
   * open means tampering and the key must not be tried again.
   *
   * @throws CryptoError 'KEY_CONSUMED' if called after open() or discard()
   * @throws CryptoError 'DECRYPTION_FAILED' if the bundle does not open
   */
  open(bundle: Uint8Array): Uint8Array {
    const secretKey = this.secretKey;
    if (!secretKey) {
      throw new CryptoError('Ephemeral key already used', 'KEY_CONSUMED');
    }

    this.secretKey = null;
    try {
      return openBox(bundle, secretKey);
    } finally {
      clearBytes(secretKey);
    }
  }

  /**
   * Destroy the secret key without using it.
   */
  discard(): void {
    clearBytes(this.secretKey);
    this.secretKey = null;
  }
}
