/**
 * @keybridge/crypto - Sealed Box Encryption
 *
 * Anonymous-sender public-key encryption. The sender needs nothing but the
 * recipient's public key: a throwaway X25519 keypair is generated per call
 * and its public half travels in the bundle.
 *
 * Format: Ephemeral public key (32 bytes) || Nonce (24 bytes) || Tag (16 bytes) || Ciphertext
 */

import { CryptoError } from '../types';
import { BOX_PUBLIC_KEY_SIZE } from '../constants';
import { generateNonce } from '../utils/random';
import { concatBytes } from '../utils/encoding';
import { clearAll } from '../utils/memory';
import { encryptSecretBox } from '../secretbox/encrypt';
import { generateBoxKeypair } from './keygen';
import { computeBoxKey } from './shared-key';

/**
 * Encrypt data to a recipient's public key.
 *
 * Each call produces a new ephemeral keypair; its secret key and the
 * derived box key are zero-filled before this function returns, so no
 * two bundles ever share sender key material.
 *
 * @param plaintext - Data to encrypt
 * @param recipientPublicKey - 32-byte X25519 public key
 * @returns Bundle: Ephemeral public key || Nonce || Tag || Ciphertext
 * @throws CryptoError with generic message on any failure
 */
export function sealBox(plaintext: Uint8Array, recipientPublicKey: Uint8Array): Uint8Array {
  if (recipientPublicKey.length !== BOX_PUBLIC_KEY_SIZE) {
    throw new CryptoError('Encryption failed', 'INVALID_PUBLIC_KEY_SIZE');
  }

  const ephemeral = generateBoxKeypair();
  let boxKey: Uint8Array | null = null;

  try {
    boxKey = computeBoxKey(ephemeral.secretKey, recipientPublicKey);
    const nonce = generateNonce();
    const ciphertext = encryptSecretBox(plaintext, boxKey, nonce);

    return concatBytes(ephemeral.publicKey, nonce, ciphertext);
  } catch {
    throw new CryptoError('Encryption failed', 'ENCRYPTION_FAILED');
  } finally {
    clearAll(ephemeral.secretKey, boxKey);
  }
}
