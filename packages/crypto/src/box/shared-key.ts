/**
 * @keybridge/crypto - Box Key Agreement
 *
 * NaCl crypto_box_beforenm: X25519 shared point hashed through HSalsa20
 * with a zero input block. The result keys XSalsa20-Poly1305.
 */

import { x25519 } from '@noble/curves/ed25519';
import { hsalsa } from '@noble/ciphers/salsa';
import { u32 } from '@noble/ciphers/utils';
import { CryptoError } from '../types';
import { BOX_PUBLIC_KEY_SIZE, BOX_SECRET_KEY_SIZE } from '../constants';
import { clearAll } from '../utils/memory';

/** "expand 32-byte k" as four little-endian words */
const SIGMA = u32(new Uint8Array(new TextEncoder().encode('expand 32-byte k')));

/**
 * Compute the symmetric box key shared by a secret key and a peer's public key.
 *
 * Both sides arrive at the same key: boxKey(skA, pkB) === boxKey(skB, pkA).
 *
 * @param secretKey - Own 32-byte X25519 secret key
 * @param publicKey - Peer's 32-byte X25519 public key
 * @returns 32-byte XSalsa20-Poly1305 key
 * @throws CryptoError on wrong sizes or a low-order peer key
 */
export function computeBoxKey(secretKey: Uint8Array, publicKey: Uint8Array): Uint8Array {
  if (secretKey.length !== BOX_SECRET_KEY_SIZE) {
    throw new CryptoError('Key agreement failed', 'INVALID_PRIVATE_KEY_SIZE');
  }

  if (publicKey.length !== BOX_PUBLIC_KEY_SIZE) {
    throw new CryptoError('Key agreement failed', 'INVALID_PUBLIC_KEY_SIZE');
  }

  let shared: Uint8Array;
  try {
    shared = x25519.getSharedSecret(secretKey, publicKey);
  } catch {
    // noble rejects low-order points (all-zero shared secret)
    throw new CryptoError('Key agreement failed', 'DECRYPTION_FAILED');
  }

  const sharedCopy = new Uint8Array(shared);
  const key = new Uint32Array(8);
  hsalsa(SIGMA, u32(sharedCopy), new Uint32Array(4), key);
  clearAll(shared, sharedCopy);

  return new Uint8Array(key.buffer);
}

