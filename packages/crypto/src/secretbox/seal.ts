/**
 * @keybridge/crypto - Secret Box Seal/Unseal
 *
 * Wide-nonce symmetric AEAD for local and synced records, where both
 * ends already share the key.
 *
 * Format: Nonce (24 bytes) || Poly1305 tag (16 bytes) || Ciphertext
 */

import { CryptoError } from '../types';
import { SECRETBOX_KEY_SIZE, SECRETBOX_NONCE_SIZE, SECRETBOX_TAG_SIZE } from '../constants';
import { generateNonce } from '../utils/random';
import { concatBytes } from '../utils/encoding';
import { encryptSecretBox } from './encrypt';
import { decryptSecretBox } from './decrypt';

/** Minimum sealed data size: nonce + tag (no plaintext) */
const MIN_SEALED_SIZE = SECRETBOX_NONCE_SIZE + SECRETBOX_TAG_SIZE;

/**
 * Seal data with a fresh random 24-byte nonce.
 *
 * @param plaintext - Data to encrypt
 * @param key - 32-byte symmetric key
 * @returns Sealed data: Nonce (24 bytes) || Tag (16 bytes) || Ciphertext
 * @throws CryptoError with generic message on any failure
 */
export function sealSecretBox(plaintext: Uint8Array, key: Uint8Array): Uint8Array {
  if (key.length !== SECRETBOX_KEY_SIZE) {
    throw new CryptoError('Encryption failed', 'INVALID_KEY_SIZE');
  }

  const nonce = generateNonce();
  const ciphertext = encryptSecretBox(plaintext, key, nonce);

  return concatBytes(nonce, ciphertext);
}

/**
 * Open data sealed with sealSecretBox.
 *
 * @param sealed - Sealed data from sealSecretBox
 * @param key - 32-byte symmetric key (must match encryption key)
 * @returns Decrypted plaintext
 * @throws CryptoError with generic message on any failure
 */
export function openSecretBox(sealed: Uint8Array, key: Uint8Array): Uint8Array {
  if (key.length !== SECRETBOX_KEY_SIZE) {
    throw new CryptoError('Decryption failed', 'INVALID_KEY_SIZE');
  }

  if (sealed.length < MIN_SEALED_SIZE) {
    throw new CryptoError('Decryption failed', 'DECRYPTION_FAILED');
  }

  const nonce = sealed.slice(0, SECRETBOX_NONCE_SIZE);
  const ciphertext = sealed.slice(SECRETBOX_NONCE_SIZE);

  return decryptSecretBox(ciphertext, key, nonce);
}
