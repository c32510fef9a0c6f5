export type { IKeyResolutionContext } from './context.js';
export { CryptConfigSchema, loadConfig, type CryptConfig, type CryptConfigInput } from './config.js';
export {
  ChainInterpreter,
  signatureScope,
  type BlockOutcome,
  type BlockParser,
  type ChainInterpreterOptions,
  type SignatureScope,
} from './interpreter.js';
export {
  KeyRing,
  type KeyRingEvent,
  type KeyRingEventType,
  type KeyRingOptions,
  type SecretListener,
} from './key-ring.js';
export { CryptApi, type CryptApiOptions, type EmbeddedSignatureScope } from './crypt-api.js';
