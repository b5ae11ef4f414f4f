/**
 * @keybridge/crypto - AES Module
 */

export { sealAesGcm, unsealAesGcm } from './gcm';
