/**
 * Approving side of device pairing: seal the account secret to the
 * requester's ephemeral key and post it. One request, no polling.
 */

import { BOX_PUBLIC_KEY_SIZE, clearBytes, sealBox } from '@keybridge/crypto';
import type { PairingApi } from '../api/pairing.api';
import { PairingError } from '../errors';
import { createLogger, fingerprint } from '../logger';
import { parsePairingLink } from './link';
import { encodePairingPayload } from './payload';

const logger = createLogger('pairing');

export type ApprovePairingOptions = {
  api: PairingApi;
  /** This device's 32-byte account master secret (not modified) */
  secret: Uint8Array;
  /** Appended to the payload for the new device */
  handoffToken?: string;
} & ({ link: string } | { publicKey: Uint8Array });

function resolvePublicKey(options: ApprovePairingOptions): Uint8Array {
  if ('link' in options) {
    const parsed = parsePairingLink(options.link);
    if (!parsed.ok) {
      throw new PairingError(`Invalid pairing link (${parsed.error})`, 'INVALID_LINK');
    }
    return parsed.value;
  }

  if (options.publicKey.length !== BOX_PUBLIC_KEY_SIZE) {
    throw new PairingError('Invalid pairing public key', 'INVALID_LINK');
  }
  return options.publicKey;
}

/**
 * Approve a pairing request shown by another device.
 *
 * @throws PairingError 'INVALID_LINK' for an unusable link or key
 * @throws PairingError 'RESPONSE_REJECTED' | 'RESPONSE_FAILED' from the server call
 */
export async function approvePairing(options: ApprovePairingOptions): Promise<void> {
  const publicKey = resolvePublicKey(options);

  const payload = encodePairingPayload(options.secret, options.handoffToken);
  let bundle: Uint8Array;
  try {
    bundle = sealBox(payload, publicKey);
  } finally {
    clearBytes(payload);
  }

  await options.api.respondToPairing(publicKey, bundle);
  logger.info('Approved pairing for key', fingerprint(publicKey));
}
