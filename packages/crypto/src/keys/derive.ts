/**
 * @keybridge/crypto - Key Tree Derivation
 *
 * BIP32-style HMAC-SHA512 key tree over the account master secret.
 * The first path segment names the usage (root), every further segment
 * is a child index. Each node yields a 32-byte key (left half of the HMAC
 * output) and a 32-byte chain code (right half) that keys the next step.
 */

import { hmac } from '@noble/hashes/hmac';
import { sha512 } from '@noble/hashes/sha512';
import { CryptoError, type DerivationSegment } from '../types';
import { DERIVED_KEY_SIZE, MASTER_SECRET_SIZE } from '../constants';
import { clearBytes } from '../utils/memory';

const encoder = new TextEncoder();

/**
 * One node of the key tree.
 */
export type KeyTreeState = {
  /** 32-byte key at this node */
  key: Uint8Array;
  /** 32-byte chain code used to derive children */
  chainCode: Uint8Array;
};

function splitOutput(output: Uint8Array): KeyTreeState {
  const state = {
    key: output.slice(0, DERIVED_KEY_SIZE),
    chainCode: output.slice(DERIVED_KEY_SIZE),
  };
  clearBytes(output);
  return state;
}

function serializeSegment(segment: DerivationSegment): string {
  if (typeof segment === 'number') {
    if (!Number.isSafeInteger(segment) || segment < 0) {
      throw new CryptoError('Invalid derivation path', 'INVALID_DERIVATION_PATH');
    }
    return segment.toString(10);
  }

  if (segment.length === 0) {
    throw new CryptoError('Invalid derivation path', 'INVALID_DERIVATION_PATH');
  }
  return segment;
}

/**
 * Derive the root node for a usage.
 *
 * root = HMAC-SHA512(key = "<usage> Master Seed", data = masterSecret)
 */
export function deriveRootState(masterSecret: Uint8Array, usage: DerivationSegment): KeyTreeState {
  if (masterSecret.length !== MASTER_SECRET_SIZE) {
    throw new CryptoError('Key derivation failed', 'INVALID_KEY_SIZE');
  }

  const usageKey = encoder.encode(`${serializeSegment(usage)} Master Seed`);
  return splitOutput(hmac(sha512, usageKey, masterSecret));
}

/**
 * Derive a child node from its parent's chain code.
 *
 * child = HMAC-SHA512(key = chainCode, data = 0x00 || index)
 */
export function deriveChildState(chainCode: Uint8Array, index: DerivationSegment): KeyTreeState {
  const indexBytes = encoder.encode(serializeSegment(index));
  const data = new Uint8Array(1 + indexBytes.length);
  data[0] = 0x00;
  data.set(indexBytes, 1);

  return splitOutput(hmac(sha512, chainCode, data));
}

/**
 * Derive a 32-byte subkey from the master secret.
 *
 * Pure and deterministic: the same secret and path always give the same
 * key, distinct paths give independent keys. Safe to call concurrently.
 *
 * @param masterSecret - 32-byte account master secret
 * @param path - Non-empty path; path[0] is the usage, the rest child indices
 * @returns 32-byte derived key
 * @throws CryptoError 'INVALID_KEY_SIZE' or 'INVALID_DERIVATION_PATH' on bad input
 *
 * @example
 * ```typescript
 * const settingsKey = deriveKey(masterSecret, ['Keybridge Settings', 'v1']);
 * ```
 */
export function deriveKey(
  masterSecret: Uint8Array,
  path: readonly DerivationSegment[]
): Uint8Array {
  if (path.length === 0) {
    throw new CryptoError('Invalid derivation path', 'INVALID_DERIVATION_PATH');
  }

  const [usage, ...children] = path;
  let state = deriveRootState(masterSecret, usage);

  for (const index of children) {
    const next = deriveChildState(state.chainCode, index);
    clearBytes(state.key);
    clearBytes(state.chainCode);
    state = next;
  }

  clearBytes(state.chainCode);
  return state.key;
}
