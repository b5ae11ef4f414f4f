/**
 * @keybridge/crypto - AES-256-GCM
 *
 * The AEAD shared with clients that only speak AES-GCM. A bundle carries
 * its own IV, drawn fresh for every seal; callers never choose one.
 *
 * Bundle: IV (12 bytes) || ciphertext || tag (16 bytes)
 */

import { CryptoError } from '../types';
import { AES_GCM_ALGORITHM, AES_IV_SIZE, AES_KEY_SIZE, AES_TAG_SIZE } from '../constants';
import { concatBytes, toArrayBuffer } from '../utils/encoding';
import { generateIv } from '../utils/random';

/** Smallest bundle: IV and tag around an empty plaintext */
const MIN_BUNDLE_SIZE = AES_IV_SIZE + AES_TAG_SIZE;

type GcmOperation = 'encrypt' | 'decrypt';

/**
 * One Web Crypto pass. The tag is appended on encrypt and checked
 * before any plaintext is released on decrypt.
 */
async function runGcm(
  operation: GcmOperation,
  key: Uint8Array,
  iv: Uint8Array,
  input: Uint8Array
): Promise<Uint8Array> {
  const cryptoKey = await crypto.subtle.importKey(
    'raw',
    toArrayBuffer(key),
    { name: AES_GCM_ALGORITHM },
    false,
    [operation]
  );
  const params: AesGcmParams = { name: AES_GCM_ALGORITHM, iv: toArrayBuffer(iv) };

  const output =
    operation === 'encrypt'
      ? await crypto.subtle.encrypt(params, cryptoKey, toArrayBuffer(input))
      : await crypto.subtle.decrypt(params, cryptoKey, toArrayBuffer(input));
  return new Uint8Array(output);
}

/**
 * Encrypt under a 32-byte key with a fresh random IV.
 *
 * @returns IV || ciphertext || tag (28 bytes for an empty plaintext)
 * @throws CryptoError 'INVALID_KEY_SIZE' for a key that is not 32 bytes
 */
export async function sealAesGcm(plaintext: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
  if (key.length !== AES_KEY_SIZE) {
    throw new CryptoError('Encryption failed', 'INVALID_KEY_SIZE');
  }

  const iv = generateIv();
  let ciphertext: Uint8Array;
  try {
    ciphertext = await runGcm('encrypt', key, iv, plaintext);
  } catch {
    throw new CryptoError('Encryption failed', 'ENCRYPTION_FAILED');
  }
  return concatBytes(iv, ciphertext);
}

/**
 * Open a bundle from sealAesGcm.
 *
 * A wrong key, a changed byte anywhere in the bundle and a truncated
 * bundle all fail the same way; no partial plaintext is returned.
 *
 * @throws CryptoError 'DECRYPTION_FAILED' (or 'INVALID_KEY_SIZE')
 */
export async function unsealAesGcm(bundle: Uint8Array, key: Uint8Array): Promise<Uint8Array> {
  if (key.length !== AES_KEY_SIZE) {
    throw new CryptoError('Decryption failed', 'INVALID_KEY_SIZE');
  }

  if (bundle.length < MIN_BUNDLE_SIZE) {
    throw new CryptoError('Decryption failed', 'DECRYPTION_FAILED');
  }

  try {
    return await runGcm(
      'decrypt',
      key,
      bundle.subarray(0, AES_IV_SIZE),
      bundle.subarray(AES_IV_SIZE)
    );
  } catch {
    throw new CryptoError('Decryption failed', 'DECRYPTION_FAILED');
  }
}
