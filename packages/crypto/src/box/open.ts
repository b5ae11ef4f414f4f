/**
 * @keybridge/crypto - Sealed Box Decryption
 *
 * Opens bundles produced by sealBox using only the recipient's secret key.
 */

import { CryptoError } from '../types';
import {
  BOX_MIN_BUNDLE_SIZE,
  BOX_PUBLIC_KEY_SIZE,
  BOX_SECRET_KEY_SIZE,
  SECRETBOX_NONCE_SIZE,
} from '../constants';
import { clearBytes } from '../utils/memory';
import { decryptSecretBox } from '../secretbox/decrypt';
import { computeBoxKey } from './shared-key';

/**
 * Decrypt a sealed box bundle.
 *
 * Fails closed: a wrong secret key, a modified byte anywhere in the bundle
 * or a truncated bundle all produce the same generic error.
 *
 * @param bundle - Bundle from sealBox
 * @param recipientSecretKey - 32-byte X25519 secret key matching the target public key
 * @returns Decrypted plaintext
 * @throws CryptoError with generic message on any failure
 */
export function openBox(bundle: Uint8Array, recipientSecretKey: Uint8Array): Uint8Array {
  if (recipientSecretKey.length !== BOX_SECRET_KEY_SIZE) {
    throw new CryptoError('Decryption failed', 'INVALID_PRIVATE_KEY_SIZE');
  }

  if (bundle.length < BOX_MIN_BUNDLE_SIZE) {
    throw new CryptoError('Decryption failed', 'DECRYPTION_FAILED');
  }

  const ephemeralPublicKey = bundle.slice(0, BOX_PUBLIC_KEY_SIZE);
  const nonce = bundle.slice(BOX_PUBLIC_KEY_SIZE, BOX_PUBLIC_KEY_SIZE + SECRETBOX_NONCE_SIZE);
  const ciphertext = bundle.slice(BOX_PUBLIC_KEY_SIZE + SECRETBOX_NONCE_SIZE);

  let boxKey: Uint8Array | null = null;
  try {
    boxKey = computeBoxKey(recipientSecretKey, ephemeralPublicKey);
    return decryptSecretBox(ciphertext, boxKey, nonce);
  } catch {
    throw new CryptoError('Decryption failed', 'DECRYPTION_FAILED');
  } finally {
    clearBytes(boxKey);
  }
}
