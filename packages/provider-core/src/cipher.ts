import type { Block, SecretText } from '@pemc/block';
import type { KeyPairOptions } from '@pemc/types';

export interface KeyPair {
  readonly privateKey: Block;
  readonly publicKey: Block;
}

export interface EncryptOptions {
  /** Encoding of the plaintext, recorded on the cipher block */
  readonly stringEncoding?: string;
}

/**
 * Asymmetric cipher capability.
 * Implementations are stateless and looked up by `name` in a provider registry.
 */
export interface ICipherProvider {
  readonly name: string;

  /** Encrypt text for the holder of the matching private key; returns a CIPHER block */
  encrypt(publicKey: Block, plaintext: string, options?: EncryptOptions): Block;

  /** Decrypt a CIPHER block; fails with a CryptError on malformed input, wrong key or bad padding */
  decrypt(privateKey: Block, cipher: Block, passphrase?: string): SecretText;

  /** Generate a cross-referenced key pair */
  createKeys(options?: KeyPairOptions): KeyPair;
}
