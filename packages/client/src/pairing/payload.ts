/**
 * Plaintext sealed to the requester: secret (32 bytes) || UTF-8(handoffToken).
 * An empty tail means no handoff token.
 */

import {
  CryptoError,
  MASTER_SECRET_SIZE,
  clearBytes,
  concatBytes,
  type Result,
} from '@keybridge/crypto';

export type PairingPayload = {
  secret: Uint8Array;
  handoffToken?: string;
};

const encoder = new TextEncoder();

export function encodePairingPayload(secret: Uint8Array, handoffToken?: string): Uint8Array {
  if (secret.length !== MASTER_SECRET_SIZE) {
    throw new CryptoError('Encryption failed', 'INVALID_KEY_SIZE');
  }
  return concatBytes(secret, encoder.encode(handoffToken ?? ''));
}

export function decodePairingPayload(bytes: Uint8Array): Result<PairingPayload, 'invalid-payload'> {
  if (bytes.length < MASTER_SECRET_SIZE) {
    return { ok: false, error: 'invalid-payload' };
  }

  const secret = bytes.slice(0, MASTER_SECRET_SIZE);
  const tail = bytes.subarray(MASTER_SECRET_SIZE);
  if (tail.length === 0) {
    return { ok: true, value: { secret } };
  }

  try {
    const handoffToken = new TextDecoder('utf-8', { fatal: true }).decode(tail);
    return { ok: true, value: { secret, handoffToken } };
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    clearBytes(secret);
    return { ok: false, error: 'invalid-payload' };
  }
}
