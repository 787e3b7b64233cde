import { Inject, Injectable } from '@nestjs/common';
import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { APP_CONFIG, type AppConfig } from '../config/app-config';

const ENCRYPTED_PREFIX = 'enc:v1:';
const ALGORITHM = 'aes-256-gcm';
const IV_BYTES = 12;

/** 64 hex chars or base64 of exactly 32 bytes. */
export function decodeMasterKey(input: string): Buffer {
  const raw = input.trim();
  if (!raw) throw new Error('Empty master key');
  if (/^[0-9a-f]{64}$/i.test(raw)) return Buffer.from(raw, 'hex');

  const key = Buffer.from(raw, 'base64');
  if (key.length !== 32) {
    throw new Error(
      'APP_MASTER_KEY must decode to 32 bytes (base64) or be a 64-char hex string.',
    );
  }
  return key;
}

/**
 * AES-256-GCM for secrets persisted in the key-value store. Payloads read
 * `enc:v1:<iv>:<tag>:<ciphertext>` (base64 parts). An optional context is
 * bound as associated data, so a value only decrypts under the record it was
 * written for.
 */
@Injectable()
export class CryptoService {
  private readonly key: Buffer;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.key = decodeMasterKey(config.crypto.masterKey);
  }

  isEncrypted(value: string): boolean {
    return value.startsWith(ENCRYPTED_PREFIX);
  }

  encryptString(plaintext: string, context?: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    if (context) cipher.setAAD(Buffer.from(context, 'utf8'));

    const sealed = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const parts = [iv, cipher.getAuthTag(), sealed].map((b) => b.toString('base64'));
    return `${ENCRYPTED_PREFIX}${parts.join(':')}`;
  }

  decryptString(payload: string, context?: string): string {
    if (!this.isEncrypted(payload)) {
      throw new Error('Unsupported encrypted payload format');
    }
    const parts = payload.slice(ENCRYPTED_PREFIX.length).split(':');
    if (parts.length !== 3) throw new Error('Invalid encrypted payload format');

    const [iv, tag, sealed] = parts.map((p) => Buffer.from(p, 'base64'));
    const decipher = createDecipheriv(ALGORITHM, this.key, iv);
    if (context) decipher.setAAD(Buffer.from(context, 'utf8'));
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(sealed), decipher.final()]).toString('utf8');
  }
}
