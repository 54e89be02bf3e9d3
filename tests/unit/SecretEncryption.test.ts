// tests/unit/SecretEncryption.test.ts

import { describe, it, expect } from 'vitest';
import { SecretEncryption } from '../../src/core/config/SecretEncryption';

describe('SecretEncryption', () => {
  const currentKey = 'a'.repeat(64);
  const oldKey = 'b'.repeat(64);

  it('should reject keys that are not 32-byte hex strings', () => {
    expect(() => new SecretEncryption('abc')).toThrow('32-byte hex string');
    expect(() => new SecretEncryption('g'.repeat(64))).toThrow('32-byte hex string');
    expect(() => new SecretEncryption(currentKey, ['abc'])).toThrow(
      'Previous encryption key must be a 32-byte hex string'
    );
  });

  it('should decrypt what it encrypted', () => {
    const encryption = new SecretEncryption(currentKey);

    const encrypted = encryption.encrypt('{"clientSecret":"test-secret"}');

    expect(encrypted.split(':')).toHaveLength(3);
    expect(encrypted).not.toContain('test-secret');
    expect(encryption.decrypt(encrypted)).toBe('{"clientSecret":"test-secret"}');
  });

  it('should use a fresh IV for every encryption', () => {
    const encryption = new SecretEncryption(currentKey);

    expect(encryption.encrypt('same')).not.toBe(encryption.encrypt('same'));
  });

  it('should decrypt records written under a rotated-out key', () => {
    const before = new SecretEncryption(oldKey);
    const after = new SecretEncryption(currentKey, [oldKey]);

    expect(after.decrypt(before.encrypt('rotated'))).toBe('rotated');
  });

  it('should fail when no key matches', () => {
    const encrypted = new SecretEncryption(oldKey).encrypt('secret');

    expect(() => new SecretEncryption(currentKey).decrypt(encrypted)).toThrow(
      'Failed to decrypt record with any available key'
    );
  });

  it('should fail on malformed input', () => {
    expect(() => new SecretEncryption(currentKey).decrypt('not-encrypted')).toThrow(
      'Failed to decrypt record with any available key'
    );
  });
});
