/**
 * @keybridge/crypto - Random Generation Utilities
 *
 * Cryptographically secure random number generation using Web Crypto API.
 */

import { CryptoError } from '../types';
import { AES_IV_SIZE, MASTER_SECRET_SIZE, SECRETBOX_KEY_SIZE, SECRETBOX_NONCE_SIZE } from '../constants';

/** crypto.getRandomValues refuses requests above this many bytes */
const MAX_RANDOM_CHUNK = 65536;

/**
 * Generate cryptographically secure random bytes.
 *
 * @param length - Number of bytes to generate
 * @returns Random bytes
 * @throws CryptoError if crypto.getRandomValues is unavailable
 */
export function generateRandomBytes(length: number): Uint8Array {
  if (typeof crypto === 'undefined' || typeof crypto.getRandomValues !== 'function') {
    throw new CryptoError(
      'Secure random generation unavailable - requires Web Crypto',
      'RANDOM_GENERATION_FAILED'
    );
  }

  const bytes = new Uint8Array(length);
  for (let offset = 0; offset < length; offset += MAX_RANDOM_CHUNK) {
    crypto.getRandomValues(bytes.subarray(offset, Math.min(offset + MAX_RANDOM_CHUNK, length)));
  }
  return bytes;
}

/**
 * Generate a fresh 32-byte account master secret.
 *
 * Called exactly once per account, at creation. Every other device
 * receives this value through a backup key or device pairing.
 */
export function generateMasterSecret(): Uint8Array {
  return generateRandomBytes(MASTER_SECRET_SIZE);
}

/**
 * Generate a random 256-bit data encryption key.
 */
export function generateDataKey(): Uint8Array {
  return generateRandomBytes(SECRETBOX_KEY_SIZE);
}

/**
 * Generate a random 96-bit IV for AES-GCM encryption.
 *
 * NEVER reuse an IV with the same key - this would be catastrophic for security.
 *
 * @returns 12-byte random IV
 */
export function generateIv(): Uint8Array {
  return generateRandomBytes(AES_IV_SIZE);
}

/**
 * Generate a random 192-bit nonce for XSalsa20-Poly1305.
 *
 * 24 bytes is wide enough that random nonces do not collide in practice.
 *
 * @returns 24-byte random nonce
 */
export function generateNonce(): Uint8Array {
  return generateRandomBytes(SECRETBOX_NONCE_SIZE);
}
