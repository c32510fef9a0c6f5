import {
  type Block,
  type BlockList,
  CryptError,
  NotDecryptedError,
  type SecretText,
  SignatureInvalidError,
  parseBlocks,
} from '@pemc/block';
import type { IProviderRegistry } from '@pemc/provider-core';
import { BlockProperty, EMBEDDED_NEXT, Logger } from '@pemc/types';
import type { IKeyResolutionContext } from './context.js';

export type BlockOutcome =
  | { readonly type: 'secret'; readonly secret: SecretText }
  | { readonly type: 'publicKey'; readonly key: Block }
  | { readonly type: 'key'; readonly block: Block };

/** Turns decrypted text back into blocks for splicing */
export type BlockParser = (text: string) => BlockList;

/**
 * What an embedded signature covers: every following block (`remainder`),
 * only the next one (`next`), or nothing the walk can check (`detached`).
 */
export type SignatureScope = 'remainder' | 'next' | 'detached';

export function signatureScope(block: Block): SignatureScope {
  if (block.getBoolean(BlockProperty.EMBEDDED, false)) return 'remainder';
  return block.getString(BlockProperty.EMBEDDED) === EMBEDDED_NEXT ? 'next' : 'detached';
}

export interface ChainInterpreterOptions {
  readonly registry: IProviderRegistry;
  readonly defaultCipher: string;
  readonly defaultSigner: string;
  readonly logger?: Logger;
  readonly parse?: BlockParser;
}

/**
 * Single-pass interpreter for block documents.
 *
 * Walks the list with an explicit cursor. Decrypted embedded documents are
 * inserted right after their cipher block and visited by later steps; the
 * cursor moves by exactly one per step, so nothing is skipped or seen twice.
 *
 * Missing keys are reported to the context and the walk goes on, unless the
 * block is embedded: an embedded cipher that was not decrypted or an embedded
 * signature that was not checked aborts the walk, as do provider failures.
 */
export class ChainInterpreter {
  private readonly registry: IProviderRegistry;
  private readonly defaultCipher: string;
  private readonly defaultSigner: string;
  private readonly log: Logger;
  private readonly parse: BlockParser;

  constructor(options: ChainInterpreterOptions) {
    this.registry = options.registry;
    this.defaultCipher = options.defaultCipher;
    this.defaultSigner = options.defaultSigner;
    this.log = (options.logger ?? new Logger()).child('interpreter');
    this.parse = options.parse ?? parseBlocks;
  }

  process(context: IKeyResolutionContext, list: BlockList): void {
    let index = 0;
    while (index < list.size) {
      const block = list.get(index);
      this.log.trace('process', { index, block: block.name });

      let outcome: BlockOutcome | undefined;
      try {
        outcome = this.processBlock(context, block);
        this.applyEmbedding(context, list, index, block, outcome);
      } catch (err) {
        if (err instanceof CryptError) throw err;
        throw new CryptError(`Failed to process ${block.name} block`, { block, cause: err });
      } finally {
        if (outcome?.type === 'secret') outcome.secret.dispose();
      }

      index++;
    }
  }

  /**
   * Process one block without looking at its neighbours. A returned secret
   * belongs to the caller, who must dispose it.
   */
  processBlock(context: IKeyResolutionContext, block: Block): BlockOutcome | undefined {
    switch (block.kind) {
      case 'cipher':
        return this.decryptBlock(context, block);
      case 'signature': {
        const key = this.resolveSignatureKey(context, block);
        return key ? { type: 'publicKey', key } : undefined;
      }
      case 'publicKey':
        context.foundPublicKey(block);
        return { type: 'key', block };
      case 'privateKey':
        context.foundPrivateKey(block);
        return { type: 'key', block };
      case 'hash':
        context.foundHash(block);
        return undefined;
      case 'content':
        return undefined;
      case 'unknown':
        this.log.warn('unknown block type', { block: block.name });
        return undefined;
    }
  }

  private applyEmbedding(
    context: IKeyResolutionContext,
    list: BlockList,
    index: number,
    block: Block,
    outcome: BlockOutcome | undefined,
  ): void {
    if (block.kind === 'cipher') {
      if (!block.getBoolean(BlockProperty.EMBEDDED, false)) return;
      if (outcome?.type !== 'secret') throw new NotDecryptedError(block);

      const inserted = outcome.secret.use((text) => this.parse(text));
      this.log.trace('insert', { index, blocks: inserted.size });
      list.insertAll(index + 1, inserted);
      return;
    }

    if (block.kind !== 'signature') return;

    const scope = signatureScope(block);
    // detached signatures are validated by the caller
    if (scope === 'detached') return;
    // already reported through errorKeyNotFound
    if (outcome?.type !== 'publicKey') throw new CryptError('Signature key not found', { block });

    let text: string;
    if (scope === 'remainder') {
      text = list.render(index + 1);
    } else {
      const next = list.at(index + 1);
      if (!next) throw new CryptError('No block follows the embedded signature', { block });
      text = next.toString();
    }

    const signer = this.registry.getSigner(block.method ?? this.defaultSigner);
    if (!signer.validate(outcome.key, text, block)) {
      throw new SignatureInvalidError(block);
    }
    context.foundValidated(block);
  }

  private decryptBlock(context: IKeyResolutionContext, block: Block): BlockOutcome | undefined {
    const keyId = this.resolveCipherKeyId(context, block);
    if (!keyId) {
      context.errorKeyNotFound(block);
      return undefined;
    }

    const key = context.getPrivateKey(keyId);
    if (!key) {
      this.log.debug('private key not found', { block: block.name, keyId });
      context.errorKeyNotFound(block);
      return undefined;
    }

    const cipher = this.registry.getCipher(block.method ?? this.defaultCipher);
    const secret = cipher.decrypt(key, block, context.getPassphrase(keyId, block));
    try {
      context.foundSecret(block, secret);
    } catch (err) {
      secret.dispose();
      throw err;
    }
    return { type: 'secret', secret };
  }

  private resolveCipherKeyId(context: IKeyResolutionContext, block: Block): string | undefined {
    const symmetric = block.getBoolean(BlockProperty.SYMMETRIC, block.has(BlockProperty.KEY_ID));
    if (symmetric) {
      const keyId = block.getString(BlockProperty.KEY_ID);
      if (!keyId) this.log.debug('key id not found', { block: block.name });
      return keyId;
    }

    const privId = block.getString(BlockProperty.PRIV_ID);
    if (privId) return privId;

    const pubId = block.getString(BlockProperty.PUB_ID);
    if (!pubId) {
      this.log.debug('public key not found', { block: block.name });
      return undefined;
    }
    const mapped = context.getPrivateIdForPublicKeyId(pubId);
    if (!mapped) this.log.debug('private key not found for public key', { block: block.name, pubId });
    return mapped;
  }

  private resolveSignatureKey(context: IKeyResolutionContext, block: Block): Block | undefined {
    let pubId = block.getString(BlockProperty.PUB_ID);
    if (!pubId) {
      const privId = block.getString(BlockProperty.PRIV_ID);
      pubId = privId ? context.getPublicIdForPrivateKeyId(privId) : undefined;
    }

    const key = pubId ? context.getPublicKey(pubId) : undefined;
    if (!key) {
      this.log.debug('public key not found', { block: block.name, pubId });
      context.errorKeyNotFound(block);
    }
    return key;
  }
}
