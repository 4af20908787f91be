import { describe, expect, it } from 'vitest';
import { FieldContext, parseMasterKey, secureCompare, TokenCipher } from '../src/services/encryption';

describe('TokenCipher', () => {
  const cipher = new TokenCipher(Buffer.alloc(32, 7));

  it('decrypts what it encrypted', () => {
    const encrypted = cipher.encrypt('access-token-value', FieldContext.ACCESS_TOKEN);

    expect(encrypted).not.toContain('access-token-value');
    expect(cipher.decrypt(encrypted, FieldContext.ACCESS_TOKEN)).toBe('access-token-value');
  });

  it('uses a fresh IV for every value', () => {
    const first = cipher.encrypt('same', FieldContext.ACCESS_TOKEN);
    const second = cipher.encrypt('same', FieldContext.ACCESS_TOKEN);

    expect(first).not.toBe(second);
  });

  it('keeps field contexts apart', () => {
    const encrypted = cipher.encrypt('refresh-token-value', FieldContext.REFRESH_TOKEN);

    expect(() => cipher.decrypt(encrypted, FieldContext.ACCESS_TOKEN)).toThrow(
      'Decryption failed: data integrity check failed'
    );
  });

  it('detects tampering', () => {
    const payload: Record<string, unknown> = JSON.parse(
      Buffer.from(cipher.encrypt('value', FieldContext.ACCESS_TOKEN), 'base64').toString('utf8')
    );
    payload.data = Buffer.from('other').toString('base64');
    const tampered = Buffer.from(JSON.stringify(payload)).toString('base64');

    expect(() => cipher.decrypt(tampered, FieldContext.ACCESS_TOKEN)).toThrow(
      'Decryption failed: data integrity check failed'
    );
  });

  it('rejects payloads that are not ciphertext', () => {
    expect(() => cipher.decrypt(Buffer.from('{"iv":1}').toString('base64'), FieldContext.ACCESS_TOKEN)).toThrow(
      'Malformed encrypted payload'
    );
    expect(() => cipher.decrypt('not base64 json', FieldContext.ACCESS_TOKEN)).toThrow(
      'Invalid encrypted payload format'
    );
  });

  it('does not decrypt under another master key', () => {
    const other = new TokenCipher(Buffer.alloc(32, 8));
    const encrypted = cipher.encrypt('value', FieldContext.ACCESS_TOKEN);

    expect(() => other.decrypt(encrypted, FieldContext.ACCESS_TOKEN)).toThrow('Decryption failed');
  });

  it('refuses empty values', () => {
    expect(() => cipher.encrypt('', FieldContext.ACCESS_TOKEN)).toThrow('Cannot encrypt empty value');
  });
});

describe('parseMasterKey', () => {
  it('accepts a 32-byte base64 key', () => {
    expect(parseMasterKey(Buffer.alloc(32, 1).toString('base64'))).toHaveLength(32);
  });

  it('rejects a missing or short key', () => {
    expect(() => parseMasterKey(undefined)).toThrow('ENCRYPTION_KEY is not set');
    expect(() => parseMasterKey(Buffer.alloc(16).toString('base64'))).toThrow(
      'ENCRYPTION_KEY must be 32 bytes (got 16)'
    );
  });
});

describe('secureCompare', () => {
  it('compares strings of any length', () => {
    expect(secureCompare('test-secret', 'test-secret')).toBe(true);
    expect(secureCompare('test-secret', 'test-secreT')).toBe(false);
    expect(secureCompare('short', 'longer-value')).toBe(false);
  });
});
