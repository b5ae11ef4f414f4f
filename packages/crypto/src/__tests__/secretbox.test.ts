/**
 * @keybridge/crypto - XSalsa20-Poly1305 Secret Box Tests
 */

import { describe, it, expect } from 'vitest';
import { xsalsa20poly1305 } from '@noble/ciphers/salsa';
import { encryptSecretBox, decryptSecretBox, sealSecretBox, openSecretBox } from '../secretbox';
import { generateDataKey, generateNonce, generateRandomBytes } from '../utils';
import { SECRETBOX_NONCE_SIZE, SECRETBOX_TAG_SIZE } from '../constants';
import { isCryptoError } from '../types';

describe('Secret box', () => {
  describe('encryptSecretBox / decryptSecretBox', () => {
    it('should round-trip with an explicit nonce', () => {
      const key = generateDataKey();
      const nonce = generateNonce();
      const plaintext = new TextEncoder().encode('synced record');

      const ciphertext = encryptSecretBox(plaintext, key, nonce);

      expect(ciphertext.length).toBe(plaintext.length + SECRETBOX_TAG_SIZE);
      expect(new TextDecoder().decode(decryptSecretBox(ciphertext, key, nonce))).toBe(
        'synced record'
      );
    });

    it('should put the Poly1305 tag before the ciphertext', () => {
      const key = new Uint8Array(32).fill(1);
      const nonce = new Uint8Array(SECRETBOX_NONCE_SIZE).fill(2);
      const plaintext = new TextEncoder().encode('tag first');

      const ours = encryptSecretBox(plaintext, key, nonce);
      const reference = xsalsa20poly1305(key, nonce).encrypt(plaintext);

      expect(ours).toEqual(reference);
    });

    it('should reject a 16-byte nonce with INVALID_NONCE_SIZE', () => {
      expect(() => encryptSecretBox(new Uint8Array(1), generateDataKey(), new Uint8Array(16))).toThrow(
        expect.objectContaining({ code: 'INVALID_NONCE_SIZE' })
      );
    });
  });

  describe('sealSecretBox / openSecretBox', () => {
    it('should seal and open data correctly', () => {
      const key = generateDataKey();
      const plaintext = generateRandomBytes(1000);

      expect(openSecretBox(sealSecretBox(plaintext, key), key)).toEqual(plaintext);
    });

    it('should produce a 40-byte bundle for empty plaintext', () => {
      const key = generateDataKey();

      const sealed = sealSecretBox(new Uint8Array(0), key);

      expect(sealed.length).toBe(40);
      expect(openSecretBox(sealed, key).length).toBe(0);
    });

    it('should prefix the bundle with the 24-byte nonce', () => {
      const key = generateDataKey();
      const plaintext = new TextEncoder().encode('nonce prefix');

      const sealed = sealSecretBox(plaintext, key);
      const nonce = sealed.slice(0, SECRETBOX_NONCE_SIZE);

      expect(decryptSecretBox(sealed.slice(SECRETBOX_NONCE_SIZE), key, nonce)).toEqual(plaintext);
    });

    it('should use a fresh nonce for every seal', () => {
      const key = generateDataKey();
      const plaintext = new TextEncoder().encode('same');

      const a = sealSecretBox(plaintext, key);
      const b = sealSecretBox(plaintext, key);

      expect(a.slice(0, SECRETBOX_NONCE_SIZE)).not.toEqual(b.slice(0, SECRETBOX_NONCE_SIZE));
    });

    it('should fail on a flip of any single byte', () => {
      const key = generateDataKey();
      const sealed = sealSecretBox(new TextEncoder().encode('integrity'), key);

      for (let i = 0; i < sealed.length; i++) {
        const tampered = new Uint8Array(sealed);
        tampered[i] ^= 0x80;
        expect(() => openSecretBox(tampered, key)).toThrow('Decryption failed');
      }
    });

    it('should fail with the wrong key', () => {
      const sealed = sealSecretBox(new TextEncoder().encode('secret'), generateDataKey());

      let caught: unknown;
      try {
        openSecretBox(sealed, generateDataKey());
      } catch (e) {
        caught = e;
      }

      expect(isCryptoError(caught, 'DECRYPTION_FAILED')).toBe(true);
    });

    it('should reject bundles shorter than nonce + tag', () => {
      expect(() => openSecretBox(new Uint8Array(39), generateDataKey())).toThrow(
        'Decryption failed'
      );
    });

    it('should reject a 64-byte key', () => {
      expect(() => sealSecretBox(new Uint8Array(1), generateRandomBytes(64))).toThrow(
        'Encryption failed'
      );
    });
  });
});
