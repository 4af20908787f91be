// src/services/encryption.ts
// AES-256-GCM encryption for OAuth tokens at rest

import crypto from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;        // 96 bits for GCM
const AUTH_TAG_LENGTH = 16;  // 128 bits
const KEY_LENGTH = 32;       // 256 bits

/**
 * Stored as base64 JSON: { iv, data, tag, v }
 */
interface EncryptedPayload {
  iv: string;
  data: string;
  tag: string;
  v: number;
}

/**
 * Each field type gets its own HKDF-derived key
 */
export enum FieldContext {
  ACCESS_TOKEN = 'access_token',
  REFRESH_TOKEN = 'refresh_token',
}

// Increment when rotating keys
const CURRENT_KEY_VERSION = 1;

/**
 * Parse and validate a base64 master key
 * @throws Error if key is missing or the wrong length
 */
export function parseMasterKey(keyBase64: string | undefined): Buffer {
  if (!keyBase64) {
    throw new Error(
      'ENCRYPTION_KEY is not set. Generate with: openssl rand -base64 32'
    );
  }

  const key = Buffer.from(keyBase64, 'base64');
  if (key.length !== KEY_LENGTH) {
    throw new Error(
      `ENCRYPTION_KEY must be ${KEY_LENGTH} bytes (got ${key.length}). ` +
      'Generate with: openssl rand -base64 32'
    );
  }

  return key;
}

function isPayload(value: unknown): value is EncryptedPayload {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.iv === 'string' &&
    typeof record.data === 'string' &&
    typeof record.tag === 'string' &&
    typeof record.v === 'number'
  );
}

export class TokenCipher {
  private readonly derivedKeys = new Map<string, Buffer>();

  constructor(private readonly masterKey: Buffer) {
    if (masterKey.length !== KEY_LENGTH) {
      throw new Error(`Master key must be ${KEY_LENGTH} bytes`);
    }
  }

  static fromBase64(keyBase64: string | undefined): TokenCipher {
    return new TokenCipher(parseMasterKey(keyBase64));
  }

  private deriveKey(context: FieldContext, version: number): Buffer {
    const cacheKey = `${context}:${version}`;
    const cached = this.derivedKeys.get(cacheKey);
    if (cached) return cached;

    const info = Buffer.from(`engagement-core:${context}:v${version}`, 'utf8');
    // No salt: the master key is already high-entropy
    const derived = Buffer.from(
      crypto.hkdfSync('sha256', this.masterKey, Buffer.alloc(0), info, KEY_LENGTH)
    );

    this.derivedKeys.set(cacheKey, derived);
    return derived;
  }

  encrypt(plaintext: string, context: FieldContext): string {
    if (plaintext.length === 0) {
      throw new Error('Cannot encrypt empty value');
    }

    const key = this.deriveKey(context, CURRENT_KEY_VERSION);
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

    const payload: EncryptedPayload = {
      iv: iv.toString('base64'),
      data: encrypted.toString('base64'),
      tag: cipher.getAuthTag().toString('base64'),
      v: CURRENT_KEY_VERSION,
    };

    return Buffer.from(JSON.stringify(payload)).toString('base64');
  }

  /**
   * @throws Error if the payload is malformed or fails the GCM integrity check
   */
  decrypt(encryptedBase64: string, context: FieldContext): string {
    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(encryptedBase64, 'base64').toString('utf8'));
    } catch (err) {
      throw new Error('Invalid encrypted payload format', { cause: err });
    }

    if (!isPayload(parsed)) {
      throw new Error('Malformed encrypted payload');
    }

    // Key version comes from the payload so rotated values still decrypt
    const key = this.deriveKey(context, parsed.v);
    const iv = Buffer.from(parsed.iv, 'base64');
    const authTag = Buffer.from(parsed.tag, 'base64');

    if (iv.length !== IV_LENGTH) throw new Error('Invalid IV length');
    if (authTag.length !== AUTH_TAG_LENGTH) throw new Error('Invalid auth tag length');

    const decipher = crypto.createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAuthTag(authTag);

    try {
      return Buffer.concat([
        decipher.update(Buffer.from(parsed.data, 'base64')),
        decipher.final(),
      ]).toString('utf8');
    } catch (err) {
      throw new Error('Decryption failed: data integrity check failed', { cause: err });
    }
  }
}

/**
 * Constant-time string comparison
 */
export function secureCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}
