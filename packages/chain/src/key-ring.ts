import { type Block, CryptError, KeyNotFoundError, type SecretText } from '@pemc/block';
import { BlockProperty } from '@pemc/types';
import type { IKeyResolutionContext } from './context.js';

export type KeyRingEventType =
  | 'secret'
  | 'validated'
  | 'publicKey'
  | 'privateKey'
  | 'hash'
  | 'keyNotFound';

export interface KeyRingEvent {
  readonly type: KeyRingEventType;
  readonly block: Block;
}

export type SecretListener = (block: Block, secret: SecretText) => void;

export interface KeyRingOptions {
  /** Called while a decrypted secret is still alive */
  readonly onSecret?: SecretListener;
}

/**
 * In-memory key-resolution context.
 * Keys are indexed by their `ident`; the public/private mapping follows the
 * `pubId`/`privId` cross references. Keys discovered in a document become
 * resolvable for the blocks that follow them.
 */
export class KeyRing implements IKeyResolutionContext {
  private readonly privateKeys = new Map<string, Block>();
  private readonly publicKeys = new Map<string, Block>();
  private readonly passphrases = new Map<string, string>();
  private readonly onSecret: SecretListener | undefined;
  readonly events: KeyRingEvent[] = [];

  constructor(options: KeyRingOptions = {}) {
    this.onSecret = options.onSecret;
  }

  addKey(block: Block): this {
    const ident = block.ident;
    if (!ident) {
      throw new CryptError(`${block.name} block has no ${BlockProperty.IDENT}`, { block });
    }
    switch (block.kind) {
      case 'privateKey':
        this.privateKeys.set(ident, block);
        break;
      case 'publicKey':
        this.publicKeys.set(ident, block);
        break;
      default:
        throw new CryptError(`${block.name} block is not a key`, { block });
    }
    return this;
  }

  addKeys(blocks: Iterable<Block>): this {
    for (const block of blocks) this.addKey(block);
    return this;
  }

  setPassphrase(keyId: string, passphrase: string): this {
    this.passphrases.set(keyId, passphrase);
    return this;
  }

  requirePrivateKey(id: string): Block {
    const key = this.privateKeys.get(id);
    if (!key) throw new KeyNotFoundError(id);
    return key;
  }

  requirePublicKey(id: string): Block {
    const key = this.publicKeys.get(id);
    if (!key) throw new KeyNotFoundError(id);
    return key;
  }

  eventsOf(type: KeyRingEventType): Block[] {
    return this.events.filter((e) => e.type === type).map((e) => e.block);
  }

  // IKeyResolutionContext

  getPrivateKey(id: string): Block | undefined {
    return this.privateKeys.get(id);
  }

  getPublicKey(id: string): Block | undefined {
    return this.publicKeys.get(id);
  }

  getPrivateIdForPublicKeyId(publicKeyId: string): string | undefined {
    const declared = this.publicKeys.get(publicKeyId)?.getString(BlockProperty.PRIV_ID);
    if (declared && this.privateKeys.has(declared)) return declared;

    for (const [id, key] of this.privateKeys) {
      if (key.getString(BlockProperty.PUB_ID) === publicKeyId) return id;
    }
    return undefined;
  }

  getPublicIdForPrivateKeyId(privateKeyId: string): string | undefined {
    const declared = this.privateKeys.get(privateKeyId)?.getString(BlockProperty.PUB_ID);
    if (declared && this.publicKeys.has(declared)) return declared;

    for (const [id, key] of this.publicKeys) {
      if (key.getString(BlockProperty.PRIV_ID) === privateKeyId) return id;
    }
    return undefined;
  }

  getPassphrase(keyId: string): string | undefined {
    return this.passphrases.get(keyId);
  }

  foundSecret(block: Block, secret: SecretText): void {
    this.events.push({ type: 'secret', block });
    this.onSecret?.(block, secret);
  }

  foundValidated(block: Block): void {
    this.events.push({ type: 'validated', block });
  }

  foundPublicKey(block: Block): void {
    this.events.push({ type: 'publicKey', block });
    this.discover(block, this.publicKeys);
  }

  foundPrivateKey(block: Block): void {
    this.events.push({ type: 'privateKey', block });
    this.discover(block, this.privateKeys);
  }

  foundHash(block: Block): void {
    this.events.push({ type: 'hash', block });
  }

  errorKeyNotFound(block: Block): void {
    this.events.push({ type: 'keyNotFound', block });
  }

  /** Register a key found in a document; a held key is never replaced. */
  private discover(block: Block, held: Map<string, Block>): void {
    const ident = block.ident;
    if (!ident) return;

    const existing = held.get(ident);
    if (!existing) {
      held.set(ident, block);
      return;
    }
    if (!Buffer.from(existing.payload).equals(Buffer.from(block.payload))) {
      throw new CryptError(`${block.name} ${ident} conflicts with a key already held`, { block });
    }
  }
}
