import { randomBytes, createCipheriv, createDecipheriv } from 'node:crypto';
import { pbkdf2 } from '@noble/hashes/pbkdf2';
import { sha256 } from '@noble/hashes/sha256';
import { type Block, CryptError, wipeMemory } from '@pemc/block';
import { BlockProperty, type KeyProtection } from '@pemc/types';

export const KEY_PROTECTION: KeyProtection = 'AES-256-GCM';

const AES_KEY_SIZE = 32; // 256 bits
const SALT_SIZE = 16;
const IV_SIZE = 12; // 96 bits for GCM
const TAG_SIZE = 16; // 128 bits
const PBKDF2_ITERATIONS = 100_000;

function deriveKey(passphrase: string, salt: Uint8Array): Uint8Array {
  return pbkdf2(sha256, new TextEncoder().encode(passphrase), salt, {
    c: PBKDF2_ITERATIONS,
    dkLen: AES_KEY_SIZE,
  });
}

/**
 * Encrypt exported key bytes under a pass-phrase.
 * Layout: SALT || IV || TAG || CIPHERTEXT
 */
export function protectKey(keyBytes: Uint8Array, passphrase: string): Uint8Array {
  const salt = randomBytes(SALT_SIZE);
  const iv = randomBytes(IV_SIZE);
  const key = deriveKey(passphrase, salt);

  try {
    const cipher = createCipheriv('aes-256-gcm', key, iv);
    const encrypted = Buffer.concat([cipher.update(keyBytes), cipher.final()]);
    const tag = cipher.getAuthTag();

    const sealed = new Uint8Array(SALT_SIZE + IV_SIZE + TAG_SIZE + encrypted.length);
    sealed.set(salt, 0);
    sealed.set(iv, SALT_SIZE);
    sealed.set(tag, SALT_SIZE + IV_SIZE);
    sealed.set(encrypted, SALT_SIZE + IV_SIZE + TAG_SIZE);
    return sealed;
  } finally {
    wipeMemory(key);
  }
}

export function unprotectKey(sealed: Uint8Array, passphrase: string): Uint8Array {
  if (sealed.length < SALT_SIZE + IV_SIZE + TAG_SIZE) {
    throw new CryptError('Protected key is truncated');
  }

  const salt = sealed.subarray(0, SALT_SIZE);
  const iv = sealed.subarray(SALT_SIZE, SALT_SIZE + IV_SIZE);
  const tag = sealed.subarray(SALT_SIZE + IV_SIZE, SALT_SIZE + IV_SIZE + TAG_SIZE);
  const ciphertext = sealed.subarray(SALT_SIZE + IV_SIZE + TAG_SIZE);
  const key = deriveKey(passphrase, salt);

  try {
    const decipher = createDecipheriv('aes-256-gcm', key, iv);
    decipher.setAuthTag(tag);
    return new Uint8Array(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
  } catch (err) {
    throw new CryptError('Failed to unlock private key (wrong pass-phrase or tampered key)', { cause: err });
  } finally {
    wipeMemory(key);
  }
}

/**
 * Returns a fresh copy of the private key bytes, unlocked with the pass-phrase
 * when the block is marked `encrypted`. The caller wipes the copy after use.
 */
export function unlockPrivateKey(privateKey: Block, passphrase?: string): Uint8Array {
  const protection = privateKey.getString(BlockProperty.ENCRYPTED);
  if (protection === undefined) {
    return new Uint8Array(privateKey.payload);
  }
  if (protection !== KEY_PROTECTION) {
    throw new CryptError(`Unsupported key protection: ${protection}`, { block: privateKey });
  }
  if (!passphrase) {
    throw new CryptError('Private key is protected and no pass-phrase was given', { block: privateKey });
  }
  try {
    return unprotectKey(privateKey.payload, passphrase);
  } catch (err) {
    if (err instanceof CryptError) {
      throw new CryptError(err.message, { block: privateKey, cause: err.cause });
    }
    throw err;
  }
}
