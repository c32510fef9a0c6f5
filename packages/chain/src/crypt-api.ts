import { type Block, BlockList, CryptError, type SecretText } from '@pemc/block';
import type {
  EncryptOptions,
  ICipherProvider,
  IProviderRegistry,
  ISignerProvider,
  KeyPair,
} from '@pemc/provider-core';
import { createDefaultRegistry } from '@pemc/providers';
import {
  BlockProperty,
  EMBEDDED_NEXT,
  Logger,
  parseLogLevel,
  type KeyCreationRequest,
} from '@pemc/types';
import { CryptConfigSchema, type CryptConfig, type CryptConfigInput } from './config.js';
import type { IKeyResolutionContext } from './context.js';
import { ChainInterpreter, type BlockOutcome, type BlockParser } from './interpreter.js';

export interface CryptApiOptions {
  /** Defaults to a registry with the bundled providers */
  readonly registry?: IProviderRegistry;
  readonly config?: CryptConfigInput;
  readonly logger?: Logger;
  /** Parser for decrypted embedded documents */
  readonly parse?: BlockParser;
}

export type EmbeddedSignatureScope = 'remainder' | 'next';

/**
 * Entry point for key generation, encryption, signing and document
 * interpretation. Providers are chosen by the `method` of the key or block
 * involved, falling back to the configured defaults.
 */
export class CryptApi {
  readonly config: CryptConfig;
  readonly logger: Logger;
  private readonly registry: IProviderRegistry;
  private readonly interpreter: ChainInterpreter;

  constructor(options: CryptApiOptions = {}) {
    this.config = CryptConfigSchema.parse(options.config ?? {});
    this.registry = options.registry ?? createDefaultRegistry();
    this.logger =
      options.logger ?? new Logger({ level: parseLogLevel(this.config.logLevel), component: 'pemc' });
    this.interpreter = new ChainInterpreter({
      registry: this.registry,
      defaultCipher: this.config.defaultCipher,
      defaultSigner: this.config.defaultSigner,
      logger: this.logger,
      ...(options.parse ? { parse: options.parse } : {}),
    });
  }

  getCipher(name: string): ICipherProvider {
    return this.registry.getCipher(name);
  }

  getSigner(name: string): ISignerProvider {
    return this.registry.getSigner(name);
  }

  getDefaultCipher(): ICipherProvider {
    return this.registry.getCipher(this.config.defaultCipher);
  }

  getDefaultSigner(): ISignerProvider {
    return this.registry.getSigner(this.config.defaultSigner);
  }

  /** Encryption key pair from the named cipher, or the default one */
  createKeys(request: KeyCreationRequest = {}): KeyPair {
    const cipher = request.method ? this.getCipher(request.method) : this.getDefaultCipher();
    return cipher.createKeys(keyPairOptions(request));
  }

  /** Signing key pair from the named signer, or the default one */
  createSignKeys(request: KeyCreationRequest = {}): KeyPair {
    const signer = request.method ? this.getSigner(request.method) : this.getDefaultSigner();
    return signer.createKeys(keyPairOptions(request));
  }

  encrypt(publicKey: Block, plaintext: string, options?: EncryptOptions): Block {
    return this.getCipher(publicKey.method ?? this.config.defaultCipher).encrypt(publicKey, plaintext, options);
  }

  /** The returned secret belongs to the caller, who disposes it. */
  decrypt(privateKey: Block, cipher: Block, passphrase?: string): SecretText {
    const method = cipher.method ?? privateKey.method ?? this.config.defaultCipher;
    return this.getCipher(method).decrypt(privateKey, cipher, passphrase);
  }

  sign(privateKey: Block, text: string, passphrase?: string): Block {
    return this.getSigner(privateKey.method ?? this.config.defaultSigner).sign(privateKey, text, passphrase);
  }

  validate(publicKey: Block, text: string, signature: Block): boolean {
    return this.getSigner(publicKey.method ?? this.config.defaultSigner).validate(publicKey, text, signature);
  }

  processBlocks(context: IKeyResolutionContext, list: BlockList): void {
    this.interpreter.process(context, list);
  }

  processBlock(context: IKeyResolutionContext, block: Block): BlockOutcome | undefined {
    return this.interpreter.processBlock(context, block);
  }

  /**
   * Encrypt a sub-document into a cipher block flagged `embedded`; the
   * interpreter splices it back in after decryption.
   */
  embed(publicKey: Block, content: Iterable<Block>): Block {
    const cipher = this.encrypt(publicKey, new BlockList(content).render());
    cipher.set(BlockProperty.EMBEDDED, true);
    return cipher;
  }

  /**
   * Prepend an embedded signature to `content`. With `remainder` the signature
   * covers every block that follows it in the document it ends up in, so it
   * must be the tail of that document; with `next` it covers only the first
   * block of `content`.
   */
  signEmbedded(
    privateKey: Block,
    content: Iterable<Block>,
    scope: EmbeddedSignatureScope = 'remainder',
    passphrase?: string,
  ): BlockList {
    const list = new BlockList(content);
    const first = list.at(0);
    if (!first) {
      throw new CryptError('Nothing to sign', { block: privateKey });
    }

    const text = scope === 'remainder' ? list.render() : first.toString();
    const signature = this.sign(privateKey, text, passphrase);
    signature.set(BlockProperty.EMBEDDED, scope === 'remainder' ? true : EMBEDDED_NEXT);

    return list.insertAll(0, [signature]);
  }
}

function keyPairOptions(request: KeyCreationRequest) {
  return {
    ...(request.length !== undefined ? { length: request.length } : {}),
    ...(request.passphrase ? { passphrase: request.passphrase } : {}),
  };
}
