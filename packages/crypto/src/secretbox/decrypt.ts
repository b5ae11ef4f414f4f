/**
 * @keybridge/crypto - XSalsa20-Poly1305 Decryption
 *
 * NaCl secretbox construction, byte-compatible with crypto_secretbox_open_easy.
 */

import { xsalsa20poly1305 } from '@noble/ciphers/salsa';
import { CryptoError } from '../types';
import { SECRETBOX_KEY_SIZE, SECRETBOX_NONCE_SIZE, SECRETBOX_TAG_SIZE } from '../constants';

/**
 * Decrypt data encrypted with encryptSecretBox.
 *
 * The Poly1305 tag is verified before any plaintext is produced.
 *
 * @param ciphertext - Tag (16 bytes) followed by the ciphertext
 * @param key - 32-byte symmetric key
 * @param nonce - 24-byte nonce used for encryption
 * @returns Decrypted plaintext
 * @throws CryptoError with generic message on any failure
 */
export function decryptSecretBox(
  ciphertext: Uint8Array,
  key: Uint8Array,
  nonce: Uint8Array
): Uint8Array {
  if (key.length !== SECRETBOX_KEY_SIZE) {
    throw new CryptoError('Decryption failed', 'INVALID_KEY_SIZE');
  }

  if (nonce.length !== SECRETBOX_NONCE_SIZE) {
    throw new CryptoError('Decryption failed', 'INVALID_NONCE_SIZE');
  }

  if (ciphertext.length < SECRETBOX_TAG_SIZE) {
    throw new CryptoError('Decryption failed', 'DECRYPTION_FAILED');
  }

  try {
    return xsalsa20poly1305(key, nonce).decrypt(ciphertext);
  } catch {
    // Do NOT reveal whether the tag, key or nonce was wrong
    throw new CryptoError('Decryption failed', 'DECRYPTION_FAILED');
  }
}
