import {
  constants,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  privateDecrypt,
  publicEncrypt,
  type KeyObject,
} from 'node:crypto';
import {
  Block,
  CryptError,
  SecretText,
  isSupportedEncoding,
  wipeMemory,
} from '@pemc/block';
import type { EncryptOptions, ICipherProvider, KeyPair } from '@pemc/provider-core';
import {
  BlockName,
  BlockProperty,
  DEFAULT_STRING_ENCODING,
  type KeyPairOptions,
} from '@pemc/types';
import { assertKind, buildKeyPair } from './key-blocks.js';
import { unlockPrivateKey } from './key-protection.js';

export const RSA_CIPHER_NAME = 'RSA-PKCS1';

export const DEFAULT_RSA_LENGTH = 1024;

const MIN_RSA_LENGTH = 512;
// PKCS#1 v1.5: 0x00 0x02 PS(>= 8 bytes) 0x00 M
const MIN_PADDING_STRING = 8;

/**
 * Plaintext bytes per RSA operation. Tuned for 1024-bit keys (128 - 11);
 * larger keys stay correct but use less of their capacity.
 */
export function encryptChunkSize(keyLength: number): number {
  return keyLength === 512 ? 53 : 117;
}

/**
 * Ciphertext bytes per RSA operation. Equals the modulus length for
 * multiples of 1024 bits and for 512-bit keys.
 */
export function decryptChunkSize(keyLength: number): number {
  return Math.max(Math.floor(keyLength / 1024) * 128, 64);
}

function removePkcs1Padding(block: Uint8Array): Uint8Array {
  if (block[0] !== 0x00 || block[1] !== 0x02) {
    throw new CryptError('RSA padding mismatch');
  }
  const separator = block.indexOf(0x00, 2);
  if (separator < 2 + MIN_PADDING_STRING) {
    throw new CryptError('RSA padding mismatch');
  }
  return block.subarray(separator + 1);
}

function importPublicKey(publicKey: Block): KeyObject {
  try {
    return createPublicKey({ key: Buffer.from(publicKey.payload), format: 'der', type: 'spki' });
  } catch (err) {
    throw new CryptError('Unsupported RSA public key', { block: publicKey, cause: err });
  }
}

function importPrivateKey(privateKey: Block, passphrase: string | undefined): KeyObject {
  const der = unlockPrivateKey(privateKey, passphrase);
  try {
    return createPrivateKey({
      key: Buffer.from(der.buffer, der.byteOffset, der.byteLength),
      format: 'der',
      type: 'pkcs8',
    });
  } catch (err) {
    throw new CryptError('Unsupported RSA private key', { block: privateKey, cause: err });
  } finally {
    wipeMemory(der);
  }
}

/**
 * RSA cipher that splits the plaintext into fixed-size chunks and encrypts
 * each one independently (PKCS#1 v1.5 padding). Chunk sizes derive from the
 * declared key length, so documents written by other implementations of the
 * same arithmetic decrypt here and vice versa.
 */
export class RsaChunkedCipher implements ICipherProvider {
  readonly name = RSA_CIPHER_NAME;

  encrypt(publicKey: Block, plaintext: string, options: EncryptOptions = {}): Block {
    assertKind(publicKey, 'publicKey', 'a public key');

    const encoding = options.stringEncoding ?? DEFAULT_STRING_ENCODING;
    if (!Buffer.isEncoding(encoding)) {
      throw new CryptError(`Unsupported string encoding: ${encoding}`, { block: publicKey });
    }

    const key = importPublicKey(publicKey);
    const keyLength = publicKey.getInt(BlockProperty.LENGTH, DEFAULT_RSA_LENGTH);
    const chunkSize = encryptChunkSize(keyLength);
    const data = Buffer.from(plaintext, encoding);
    const chunks: Buffer[] = [];

    try {
      for (let off = 0; off < data.length; off += chunkSize) {
        chunks.push(
          publicEncrypt(
            { key, padding: constants.RSA_PKCS1_PADDING },
            data.subarray(off, Math.min(off + chunkSize, data.length)),
          ),
        );
      }
    } catch (err) {
      throw new CryptError('RSA encryption failed', { block: publicKey, cause: err });
    } finally {
      wipeMemory(data);
    }

    const cipher = new Block(
      BlockName.CIPHER,
      [
        [BlockProperty.METHOD, this.name],
        [BlockProperty.LENGTH, keyLength],
        [BlockProperty.STRING_ENCODING, encoding],
      ],
      new Uint8Array(Buffer.concat(chunks)),
    );
    const pubId = publicKey.ident;
    if (pubId) cipher.set(BlockProperty.PUB_ID, pubId);
    const privId = publicKey.getString(BlockProperty.PRIV_ID);
    if (privId) cipher.set(BlockProperty.PRIV_ID, privId);

    return cipher;
  }

  decrypt(privateKey: Block, cipher: Block, passphrase?: string): SecretText {
    assertKind(privateKey, 'privateKey', 'a private key');
    assertKind(cipher, 'cipher', 'a cipher block');

    const encoding = cipher.getString(BlockProperty.STRING_ENCODING, DEFAULT_STRING_ENCODING);
    if (!isSupportedEncoding(encoding)) {
      throw new CryptError(`Unsupported string encoding: ${encoding}`, { block: cipher });
    }

    const key = importPrivateKey(privateKey, passphrase);
    const chunkSize = decryptChunkSize(privateKey.getInt(BlockProperty.LENGTH, DEFAULT_RSA_LENGTH));
    const data = cipher.payload;
    const parts: Buffer[] = [];

    try {
      for (let off = 0; off < data.length; off += chunkSize) {
        const raw = privateDecrypt(
          { key, padding: constants.RSA_NO_PADDING },
          data.subarray(off, Math.min(off + chunkSize, data.length)),
        );
        try {
          parts.push(Buffer.from(removePkcs1Padding(raw)));
        } finally {
          wipeMemory(raw);
        }
      }
      return new SecretText(Buffer.concat(parts), encoding);
    } catch (err) {
      throw new CryptError('RSA decryption failed', { block: cipher, cause: err });
    } finally {
      parts.forEach(wipeMemory);
    }
  }

  createKeys(options: KeyPairOptions = {}): KeyPair {
    const length = options.length ?? DEFAULT_RSA_LENGTH;
    if (!Number.isInteger(length) || length < MIN_RSA_LENGTH) {
      throw new CryptError(`RSA key length must be an integer of at least ${MIN_RSA_LENGTH} bits`);
    }

    const { publicKey, privateKey } = generateKeyPairSync('rsa', {
      modulusLength: length,
      publicKeyEncoding: { type: 'spki', format: 'der' },
      privateKeyEncoding: { type: 'pkcs8', format: 'der' },
    });

    return buildKeyPair({
      method: this.name,
      length,
      publicKey,
      publicFormat: 'spki',
      privateKey,
      privateFormat: 'pkcs8',
      ...(options.passphrase ? { passphrase: options.passphrase } : {}),
    });
  }
}
