import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import type { SecretData } from '../../notifications/notifications.types';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // 96 bits for GCM
const AUTH_TAG_LENGTH = 16; // 128 bits

/**
 * Seals a credential into a SecretData envelope using AES-256-GCM.
 * Envelope format: base64(iv):base64(authTag):base64(ciphertext)
 */
export function sealSecret(plaintext: string, key: Buffer): SecretData {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });

  const ciphertext = Buffer.concat([
    cipher.update(plaintext, 'utf8'),
    cipher.final(),
  ]);

  const authTag = cipher.getAuthTag();

  return {
    encrypted: `${iv.toString('base64')}:${authTag.toString('base64')}:${ciphertext.toString('base64')}`,
  };
}

/**
 * Opens an envelope produced by sealSecret.
 */
export function openSecret(secret: SecretData, key: Buffer): string {
  const parts = secret.encrypted.split(':');
  if (parts.length !== 3) {
    throw new Error('Invalid secret envelope: expected iv:authTag:ciphertext');
  }

  const [ivB64, authTagB64, ciphertextB64] = parts;
  const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(ivB64, 'base64'), {
    authTagLength: AUTH_TAG_LENGTH,
  });
  decipher.setAuthTag(Buffer.from(authTagB64, 'base64'));

  return Buffer.concat([
    decipher.update(Buffer.from(ciphertextB64, 'base64')),
    decipher.final(),
  ]).toString('utf8');
}

/**
 * Resolves the 32-byte AES key from a raw value.
 * Accepts a base64 string that decodes to 32 bytes or a 32-character string.
 */
export function parseEncryptionKey(keyStr: string | undefined): Buffer {
  if (!keyStr) {
    throw new Error('ENCRYPTION_KEY environment variable is not set');
  }

  const base64Decoded = Buffer.from(keyStr, 'base64');
  if (base64Decoded.length === 32) {
    return base64Decoded;
  }

  const rawKey = Buffer.from(keyStr, 'utf8');
  if (rawKey.length === 32) {
    return rawKey;
  }

  throw new Error(
    `ENCRYPTION_KEY must be exactly 32 bytes. Got ${rawKey.length} bytes (utf8) or ${base64Decoded.length} bytes (base64).`,
  );
}
