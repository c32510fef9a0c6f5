import { ProviderRegistry } from '@pemc/provider-core';
import { RsaChunkedCipher } from './rsa-cipher.js';
import { EcdsaSigner } from './ecdsa-signer.js';

export {
  RsaChunkedCipher,
  RSA_CIPHER_NAME,
  DEFAULT_RSA_LENGTH,
  encryptChunkSize,
  decryptChunkSize,
} from './rsa-cipher.js';
export { EcdsaSigner, ECDSA_SIGNER_NAME } from './ecdsa-signer.js';
export { protectKey, unprotectKey, unlockPrivateKey, KEY_PROTECTION } from './key-protection.js';
export { buildKeyPair, type KeyMaterial } from './key-blocks.js';

/** Registry holding the bundled RSA cipher and ECDSA signer. */
export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .registerCipher(new RsaChunkedCipher())
    .registerSigner(new EcdsaSigner());
}
