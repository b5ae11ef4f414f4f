/**
 * @keybridge/crypto - XSalsa20-Poly1305 Encryption
 *
 * NaCl secretbox construction, byte-compatible with crypto_secretbox_easy.
 */

import { xsalsa20poly1305 } from '@noble/ciphers/salsa';
import { CryptoError } from '../types';
import { SECRETBOX_KEY_SIZE, SECRETBOX_NONCE_SIZE } from '../constants';

/**
 * Encrypt data using XSalsa20-Poly1305.
 *
 * @param plaintext - Data to encrypt
 * @param key - 32-byte symmetric key
 * @param nonce - 24-byte nonce (MUST be unique per encryption with this key)
 * @returns Poly1305 tag (16 bytes) followed by the ciphertext
 * @throws CryptoError with generic message on any failure
 */
export function encryptSecretBox(
  plaintext: Uint8Array,
  key: Uint8Array,
  nonce: Uint8Array
): Uint8Array {
  if (key.length !== SECRETBOX_KEY_SIZE) {
    throw new CryptoError('Encryption failed', 'INVALID_KEY_SIZE');
  }

  if (nonce.length !== SECRETBOX_NONCE_SIZE) {
    throw new CryptoError('Encryption failed', 'INVALID_NONCE_SIZE');
  }

  try {
    return xsalsa20poly1305(key, nonce).encrypt(plaintext);
  } catch {
    throw new CryptoError('Encryption failed', 'ENCRYPTION_FAILED');
  }
}
