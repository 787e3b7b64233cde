import { buildTestConfig } from '../testing/test-config';
import { CryptoService, decodeMasterKey } from './crypto.service';

describe('CryptoService', () => {
  const crypto = new CryptoService(buildTestConfig());

  it('encrypts with the versioned prefix and decrypts back', () => {
    const payload = crypto.encryptString('test-secret');

    expect(payload.startsWith('enc:v1:')).toBe(true);
    expect(payload).not.toContain('test-secret');
    expect(crypto.isEncrypted(payload)).toBe(true);
    expect(crypto.decryptString(payload)).toBe('test-secret');
  });

  it('uses a fresh IV per encryption', () => {
    expect(crypto.encryptString('same')).not.toBe(crypto.encryptString('same'));
  });

  it('rejects payloads sealed with another key', () => {
    const other = new CryptoService(
      buildTestConfig({ crypto: { masterKey: 'c'.repeat(64) } }),
    );
    const payload = other.encryptString('test-secret');

    expect(() => crypto.decryptString(payload)).toThrow();
  });

  it('only decrypts under the context it was sealed with', () => {
    const payload = crypto.encryptString('test-secret', 'trakt_tokens:alice');

    expect(crypto.decryptString(payload, 'trakt_tokens:alice')).toBe('test-secret');
    expect(() => crypto.decryptString(payload, 'trakt_tokens:bob')).toThrow();
    expect(() => crypto.decryptString(payload)).toThrow();
  });

  it('rejects plaintext and malformed payloads', () => {
    expect(() => crypto.decryptString('plain')).toThrow(
      'Unsupported encrypted payload format',
    );
    expect(() => crypto.decryptString('enc:v1:onlyone')).toThrow(
      'Invalid encrypted payload format',
    );
  });
});

describe('decodeMasterKey', () => {
  it('accepts 64-char hex and 32-byte base64', () => {
    expect(decodeMasterKey('ab'.repeat(32))).toHaveLength(32);
    expect(decodeMasterKey(Buffer.alloc(32, 7).toString('base64'))).toHaveLength(32);
  });

  it('rejects keys of the wrong size', () => {
    expect(() => decodeMasterKey('c2hvcnQ=')).toThrow(
      'APP_MASTER_KEY must decode to 32 bytes',
    );
    expect(() => decodeMasterKey('  ')).toThrow('Empty master key');
  });
});
