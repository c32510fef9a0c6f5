export { Block, type PropertyInit } from './block.js';
export { BlockList } from './block-list.js';
export { parseBlocks, serializeBlocks } from './pem-format.js';
export { SecretText, wipeMemory, isSupportedEncoding, decodeText } from './secret-text.js';
export {
  CryptError,
  BlockFormatError,
  KeyNotFoundError,
  NotDecryptedError,
  SignatureInvalidError,
  ProviderNotFoundError,
  type CryptErrorCode,
  type CryptErrorOptions,
} from './errors.js';
