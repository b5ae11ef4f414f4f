/**
 * Pairing link carried by the QR code the requesting device shows.
 *
 *   keybridge:///account?<base64url(ephemeral public key)>
 */

import {
  BOX_PUBLIC_KEY_SIZE,
  base64UrlToBytes,
  bytesToBase64Url,
  isCryptoError,
  type Result,
} from '@keybridge/crypto';

export const PAIRING_LINK_PREFIX = 'keybridge:///account?';

export type PairingLinkError = 'invalid-link' | 'invalid-public-key';

export function formatPairingLink(publicKey: Uint8Array): string {
  return PAIRING_LINK_PREFIX + bytesToBase64Url(publicKey);
}

/**
 * Extract the requester's public key from a scanned or pasted link.
 */
export function parsePairingLink(text: string): Result<Uint8Array, PairingLinkError> {
  const trimmed = text.trim();
  if (!trimmed.startsWith(PAIRING_LINK_PREFIX)) {
    return { ok: false, error: 'invalid-link' };
  }

  let publicKey: Uint8Array;
  try {
    publicKey = base64UrlToBytes(trimmed.slice(PAIRING_LINK_PREFIX.length));
  } catch (error) {
    if (isCryptoError(error, 'INVALID_ENCODING')) {
      return { ok: false, error: 'invalid-link' };
    }
    throw error;
  }

  if (publicKey.length !== BOX_PUBLIC_KEY_SIZE) {
    return { ok: false, error: 'invalid-public-key' };
  }
  return { ok: true, value: publicKey };
}
