import type { Block, SecretText } from '@pemc/block';

/**
 * Caller-supplied collaborator of the chain interpreter.
 * Resolves keys and pass-phrases and is told about everything the walk discovers.
 * Key storage and persistence are entirely up to the implementation.
 */
export interface IKeyResolutionContext {
  getPrivateKey(id: string): Block | undefined;

  getPublicKey(id: string): Block | undefined;

  /** Id of the locally held private key that belongs to a public key */
  getPrivateIdForPublicKeyId(publicKeyId: string): string | undefined;

  getPublicIdForPrivateKeyId(privateKeyId: string): string | undefined;

  getPassphrase(keyId: string, block: Block): string | undefined;

  /**
   * A cipher block was decrypted. The secret is disposed when the current
   * step of the walk ends; copy what is needed before returning.
   */
  foundSecret(block: Block, secret: SecretText): void;

  /** An embedded signature was validated */
  foundValidated(block: Block): void;

  foundPublicKey(block: Block): void;

  foundPrivateKey(block: Block): void;

  foundHash(block: Block): void;

  /** A block could not be processed because its key is unknown; the walk continues */
  errorKeyNotFound(block: Block): void;
}
