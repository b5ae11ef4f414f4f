/**
 * @keybridge/crypto - Box Module
 *
 * X25519 + XSalsa20-Poly1305 public-key encryption with ephemeral senders.
 */

export { generateBoxKeypair, boxKeypairFromSeed, getBoxPublicKey } from './keygen';
export { computeBoxKey } from './shared-key';
export { sealBox } from './seal';
export { openBox } from './open';
export { EphemeralBoxKeypair } from './ephemeral';
