import { describe, it, expect } from 'vitest';
import { CryptConfigSchema, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should default to the bundled providers', () => {
    expect(loadConfig({})).toEqual({
      defaultCipher: 'RSA-PKCS1',
      defaultSigner: 'ECDSA-SECP256K1',
      logLevel: 'info',
    });
  });

  it('should read the environment', () => {
    const config = loadConfig({
      PEMC_DEFAULT_CIPHER: 'AES',
      PEMC_DEFAULT_SIGNER: ' ED25519 ',
      PEMC_LOG_LEVEL: 'DEBUG',
    });

    expect(config).toEqual({ defaultCipher: 'AES', defaultSigner: 'ED25519', logLevel: 'debug' });
  });

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ PEMC_DEFAULT_CIPHER: '', PEMC_LOG_LEVEL: '' }).defaultCipher).toBe('RSA-PKCS1');
  });

  it('should reject unknown log levels', () => {
    expect(() => loadConfig({ PEMC_LOG_LEVEL: 'loud' })).toThrow();
    expect(CryptConfigSchema.safeParse({ defaultCipher: '  ' }).success).toBe(false);
  });
});
