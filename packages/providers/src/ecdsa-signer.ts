import { secp256k1 } from '@noble/curves/secp256k1';
import { sha256 } from '@noble/hashes/sha256';
import { Block, CryptError, wipeMemory } from '@pemc/block';
import type { ISignerProvider, KeyPair } from '@pemc/provider-core';
import { BlockName, BlockProperty, type KeyPairOptions } from '@pemc/types';
import { assertKind, buildKeyPair } from './key-blocks.js';
import { unlockPrivateKey } from './key-protection.js';

export const ECDSA_SIGNER_NAME = 'ECDSA-SECP256K1';

const CURVE_BITS = 256;

function digest(text: string): Uint8Array {
  return sha256(new TextEncoder().encode(text));
}

/**
 * ECDSA over secp256k1 with a SHA-256 digest of the UTF-8 text.
 * Private keys are raw 32-byte scalars, public keys compressed points,
 * signatures 64-byte compact (r || s).
 */
export class EcdsaSigner implements ISignerProvider {
  readonly name = ECDSA_SIGNER_NAME;

  sign(privateKey: Block, text: string, passphrase?: string): Block {
    assertKind(privateKey, 'privateKey', 'a private key');

    const raw = unlockPrivateKey(privateKey, passphrase);
    let signature: Uint8Array;
    try {
      signature = secp256k1.sign(digest(text), raw).toCompactRawBytes();
    } catch (err) {
      throw new CryptError('ECDSA signing failed', { block: privateKey, cause: err });
    } finally {
      wipeMemory(raw);
    }

    const block = new Block(BlockName.SIGNATURE, [[BlockProperty.METHOD, this.name]], signature);
    const pubId = privateKey.getString(BlockProperty.PUB_ID);
    if (pubId) block.set(BlockProperty.PUB_ID, pubId);
    const privId = privateKey.ident;
    if (privId) block.set(BlockProperty.PRIV_ID, privId);
    block.set(BlockProperty.CREATED, new Date().toISOString());

    return block;
  }

  validate(publicKey: Block, text: string, signature: Block): boolean {
    if (publicKey.kind !== 'publicKey' || signature.kind !== 'signature') return false;
    try {
      return secp256k1.verify(signature.payload, digest(text), publicKey.payload);
    } catch {
      // malformed signature or key bytes
      return false;
    }
  }

  createKeys(options: KeyPairOptions = {}): KeyPair {
    if (options.length !== undefined && options.length !== CURVE_BITS) {
      throw new CryptError(`${this.name} keys are always ${CURVE_BITS} bits`);
    }

    const privateKey = secp256k1.utils.randomPrivateKey();
    const publicKey = secp256k1.getPublicKey(privateKey, true);

    return buildKeyPair({
      method: this.name,
      length: CURVE_BITS,
      publicKey,
      publicFormat: 'raw',
      privateKey,
      privateFormat: 'raw',
      ...(options.passphrase ? { passphrase: options.passphrase } : {}),
    });
  }
}
