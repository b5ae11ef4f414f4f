/**
 * @keybridge/crypto - Key Hierarchy Functions
 *
 * Keypairs that live in the master secret's key tree. They are never stored:
 * every device re-derives them from the secret it holds.
 */

import type { BoxKeypair, DerivationSegment } from '../types';
import { boxKeypairFromSeed } from '../box/keygen';
import { clearBytes } from '../utils/memory';
import { deriveKey } from './derive';

/**
 * Derive a long-lived X25519 keypair from the master secret.
 *
 * The derived 32-byte key is used as a crypto_box seed, then zero-filled.
 *
 * @example
 * ```typescript
 * const content = deriveBoxKeypair(masterSecret, ['Keybridge EnCoder', 'content']);
 * ```
 */
export function deriveBoxKeypair(
  masterSecret: Uint8Array,
  path: readonly DerivationSegment[]
): BoxKeypair {
  const seed = deriveKey(masterSecret, path);
  try {
    return boxKeypairFromSeed(seed);
  } finally {
    clearBytes(seed);
  }
}
