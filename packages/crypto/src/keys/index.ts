/**
 * @keybridge/crypto - Key Management
 *
 * Key tree derivation over the account master secret.
 */

export { deriveKey, deriveRootState, deriveChildState, type KeyTreeState } from './derive';
export { deriveBoxKeypair } from './hierarchy';
