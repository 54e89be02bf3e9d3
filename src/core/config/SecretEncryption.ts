// src/core/config/SecretEncryption.ts

import * as crypto from 'crypto';

const HEX_KEY = /^[0-9a-f]{64}$/i;

function parseKey(key: string, label: string): Buffer {
  if (!key || !HEX_KEY.test(key)) {
    throw new Error(`${label} must be a 32-byte hex string (64 hexadecimal characters)`);
  }
  return Buffer.from(key, 'hex');
}

/**
 * AES-256-GCM for user configuration records at rest.
 * Output format: iv:authTag:ciphertext, all hex.
 */
export class SecretEncryption {
  private currentKey: Buffer;
  private previousKeys: Buffer[];

  constructor(currentKey: string, previousKeys: string[] = []) {
    this.currentKey = parseKey(currentKey, 'Encryption key');
    this.previousKeys = previousKeys.map((key) => parseKey(key, 'Previous encryption key'));
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.currentKey, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    return [iv, cipher.getAuthTag(), ciphertext].map((part) => part.toString('hex')).join(':');
  }

  /**
   * Tries the current key, then each rotated-out key.
   */
  decrypt(encrypted: string): string {
    for (const key of [this.currentKey, ...this.previousKeys]) {
      const plaintext = this.tryDecrypt(encrypted, key);
      if (plaintext !== null) return plaintext;
    }
    throw new Error('Failed to decrypt record with any available key');
  }

  private tryDecrypt(encrypted: string, key: Buffer): string | null {
    const [iv, authTag, ciphertext] = encrypted.split(':');
    if (!iv || !authTag || ciphertext === undefined) return null;

    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(iv, 'hex'));
      decipher.setAuthTag(Buffer.from(authTag, 'hex'));
      return Buffer.concat([
        decipher.update(Buffer.from(ciphertext, 'hex')),
        decipher.final(),
      ]).toString('utf8');
    } catch {
      return null;
    }
  }
}
