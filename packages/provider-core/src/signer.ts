import type { Block } from '@pemc/block';
import type { KeyPairOptions } from '@pemc/types';
import type { KeyPair } from './cipher.js';

/**
 * Signature capability.
 * Implementations are stateless and looked up by `name` in a provider registry.
 */
export interface ISignerProvider {
  readonly name: string;

  /** Sign the full text; returns a SIGNATURE block */
  sign(privateKey: Block, text: string, passphrase?: string): Block;

  /** Returns false for invalid or malformed signatures instead of throwing */
  validate(publicKey: Block, text: string, signature: Block): boolean;

  createKeys(options?: KeyPairOptions): KeyPair;
}
