/**
 * @keybridge/crypto - Secret Box Module
 *
 * XSalsa20-Poly1305 symmetric encryption for records sealed under a shared key.
 */

export { encryptSecretBox } from './encrypt';
export { decryptSecretBox } from './decrypt';
export { sealSecretBox, openSecretBox } from './seal';
