/**
 * @keybridge/crypto - X25519 Keypair Generation
 *
 * Keypairs for public-key boxes. Seeded generation follows libsodium's
 * crypto_box_seed_keypair so a seed yields the same keypair on every client.
 */

import { x25519 } from '@noble/curves/ed25519';
import { sha512 } from '@noble/hashes/sha512';
import { CryptoError, type BoxKeypair } from '../types';
import { BOX_SECRET_KEY_SIZE, BOX_SEED_SIZE } from '../constants';
import { clearBytes } from '../utils/memory';

/**
 * Generate a random X25519 keypair.
 *
 * @returns Keypair with 32-byte public and secret keys
 */
export function generateBoxKeypair(): BoxKeypair {
  const secretKey = x25519.utils.randomPrivateKey();
  const publicKey = x25519.getPublicKey(secretKey);
  return { publicKey, secretKey };
}

/**
 * Derive an X25519 keypair deterministically from a 32-byte seed.
 *
 * secretKey = SHA-512(seed)[0..32]
 *
 * @param seed - 32-byte seed (typically a derived key)
 * @returns Deterministic keypair
 */
export function boxKeypairFromSeed(seed: Uint8Array): BoxKeypair {
  if (seed.length !== BOX_SEED_SIZE) {
    throw new CryptoError('Key generation failed', 'INVALID_KEY_SIZE');
  }

  const digest = sha512(seed);
  const secretKey = digest.slice(0, BOX_SECRET_KEY_SIZE);
  clearBytes(digest);

  return { publicKey: x25519.getPublicKey(secretKey), secretKey };
}

/**
 * Compute the public key for an X25519 secret key.
 */
export function getBoxPublicKey(secretKey: Uint8Array): Uint8Array {
  if (secretKey.length !== BOX_SECRET_KEY_SIZE) {
    throw new CryptoError('Key generation failed', 'INVALID_PRIVATE_KEY_SIZE');
  }
  return x25519.getPublicKey(secretKey);
}
