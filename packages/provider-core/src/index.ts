export type { ICipherProvider, KeyPair, EncryptOptions } from './cipher.js';
export type { ISignerProvider } from './signer.js';
export {
  ProviderRegistry,
  normalizeProviderName,
  type IProviderRegistry,
  type Capability,
} from './registry.js';
