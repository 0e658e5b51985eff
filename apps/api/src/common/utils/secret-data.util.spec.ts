import { randomBytes } from 'crypto';
import { sealSecret, openSecret, parseEncryptionKey } from './secret-data.util';

describe('SecretData utility', () => {
  const testKey = randomBytes(32);

  describe('sealSecret', () => {
    it('should produce an iv:authTag:ciphertext envelope', () => {
      const secret = sealSecret('test-token', testKey);

      expect(secret.encrypted.split(':')).toHaveLength(3);
    });

    it('should produce different envelopes for the same plaintext', () => {
      const first = sealSecret('same-token', testKey);
      const second = sealSecret('same-token', testKey);

      expect(first.encrypted).not.toEqual(second.encrypted);
    });

    it('should not contain the plaintext', () => {
      const secret = sealSecret('https://example.com/webhook', testKey);

      expect(secret.encrypted).not.toContain('example.com');
    });
  });

  describe('openSecret', () => {
    it('should recover the sealed value', () => {
      expect(openSecret(sealSecret('test-secret', testKey), testKey)).toBe('test-secret');
    });

    it('should recover an empty value', () => {
      expect(openSecret(sealSecret('', testKey), testKey)).toBe('');
    });

    it('should reject a tampered ciphertext', () => {
      const parts = sealSecret('test', testKey).encrypted.split(':');
      parts[2] = Buffer.from('tampered').toString('base64');

      expect(() => openSecret({ encrypted: parts.join(':') }, testKey)).toThrow();
    });

    it('should reject the wrong key', () => {
      const secret = sealSecret('test', testKey);

      expect(() => openSecret(secret, randomBytes(32))).toThrow();
    });

    it('should reject a malformed envelope', () => {
      expect(() => openSecret({ encrypted: 'not:valid' }, testKey)).toThrow(
        'Invalid secret envelope',
      );
    });
  });

  describe('parseEncryptionKey', () => {
    it('should throw when no key is given', () => {
      expect(() => parseEncryptionKey(undefined)).toThrow(
        'ENCRYPTION_KEY environment variable is not set',
      );
    });

    it('should accept a base64-encoded 32-byte key', () => {
      const key = randomBytes(32);

      expect(parseEncryptionKey(key.toString('base64'))).toEqual(key);
    });

    it('should accept a 32-character key', () => {
      expect(parseEncryptionKey('abcdefghijklmnopqrstuvwxyz012345')).toHaveLength(32);
    });

    it('should reject other lengths', () => {
      expect(() => parseEncryptionKey('too-short')).toThrow(
        'ENCRYPTION_KEY must be exactly 32 bytes',
      );
    });
  });
});
