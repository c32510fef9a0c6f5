import type { Block } from './block.js';

export type CryptErrorCode =
  | 'PEMC_CRYPT'
  | 'PEMC_FORMAT'
  | 'PEMC_KEY_NOT_FOUND'
  | 'PEMC_NOT_DECRYPTED'
  | 'PEMC_SIGNATURE_INVALID'
  | 'PEMC_PROVIDER_NOT_FOUND';

export interface CryptErrorOptions {
  /** The block being processed when the failure happened */
  readonly block?: Block;
  readonly cause?: unknown;
}

/**
 * Base class for every failure raised by pem-chain.
 * Provider failures (malformed ciphertext, wrong key, bad padding) use it directly.
 */
export class CryptError extends Error {
  readonly code: CryptErrorCode;
  readonly block: Block | undefined;

  constructor(message: string, options: CryptErrorOptions = {}, code: CryptErrorCode = 'PEMC_CRYPT') {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.block = options.block;
  }
}

/** The textual block format could not be parsed or a value cannot be written. */
export class BlockFormatError extends CryptError {
  constructor(message: string, options: CryptErrorOptions = {}) {
    super(message, options, 'PEMC_FORMAT');
  }
}

export class KeyNotFoundError extends CryptError {
  constructor(keyId: string, options: CryptErrorOptions = {}) {
    super(`Key not found: ${keyId}`, options, 'PEMC_KEY_NOT_FOUND');
  }
}

/** An embedded cipher block did not yield a secret. */
export class NotDecryptedError extends CryptError {
  constructor(block: Block) {
    super(`Embedded ${block.name} block was not decrypted`, { block }, 'PEMC_NOT_DECRYPTED');
  }
}

export class SignatureInvalidError extends CryptError {
  constructor(block: Block) {
    super(`Signature is not valid for ${block.getString('method') ?? 'unknown method'}`, { block }, 'PEMC_SIGNATURE_INVALID');
  }
}

export class ProviderNotFoundError extends CryptError {
  constructor(
    readonly capability: 'cipher' | 'signer',
    readonly providerName: string,
  ) {
    super(`No ${capability} provider registered as ${providerName}`, {}, 'PEMC_PROVIDER_NOT_FOUND');
  }
}
