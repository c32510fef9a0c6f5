import { randomUUID } from 'node:crypto';
import { Block, CryptError, wipeMemory } from '@pemc/block';
import type { KeyPair } from '@pemc/provider-core';
import { BlockName, BlockProperty, type KeyFormat } from '@pemc/types';
import { KEY_PROTECTION, protectKey } from './key-protection.js';

export interface KeyMaterial {
  readonly method: string;
  readonly length: number;
  readonly publicKey: Uint8Array;
  readonly publicFormat: KeyFormat;
  /** Wiped once it has been wrapped */
  readonly privateKey: Uint8Array;
  readonly privateFormat: KeyFormat;
  readonly passphrase?: string;
}

/**
 * Wrap freshly generated key material into a cross-referenced pair of
 * key blocks, each with its own random identifier.
 */
export function buildKeyPair(material: KeyMaterial): KeyPair {
  const privId = randomUUID();
  const pubId = randomUUID();
  const created = new Date().toISOString();

  const privateBytes = material.passphrase
    ? protectKey(material.privateKey, material.passphrase)
    : new Uint8Array(material.privateKey);
  wipeMemory(material.privateKey);

  const publicKey = new Block(
    BlockName.PUBLIC_KEY,
    [
      [BlockProperty.METHOD, material.method],
      [BlockProperty.LENGTH, material.length],
      [BlockProperty.FORMAT, material.publicFormat],
      [BlockProperty.IDENT, pubId],
      [BlockProperty.PRIV_ID, privId],
      [BlockProperty.CREATED, created],
    ],
    new Uint8Array(material.publicKey),
  );

  const privateKey = new Block(
    BlockName.PRIVATE_KEY,
    [
      [BlockProperty.METHOD, material.method],
      [BlockProperty.LENGTH, material.length],
      [BlockProperty.FORMAT, material.privateFormat],
      [BlockProperty.IDENT, privId],
      [BlockProperty.PUB_ID, pubId],
      [BlockProperty.CREATED, created],
    ],
    privateBytes,
  );
  if (material.passphrase) {
    privateKey.set(BlockProperty.ENCRYPTED, KEY_PROTECTION);
  }

  return { privateKey, publicKey };
}

export function assertKind(block: Block, kind: Block['kind'], role: string): void {
  if (block.kind !== kind) {
    throw new CryptError(`Expected ${role} but got a ${block.name} block`, { block });
  }
}
