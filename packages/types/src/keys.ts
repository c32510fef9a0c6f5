export type KeyFormat = 'spki' | 'pkcs8' | 'raw';

export type KeyProtection = 'AES-256-GCM';

export interface KeyPairOptions {
  /** Key length in bits; fixed-curve providers accept only their own size */
  readonly length?: number;
  /** Protects the exported private key bytes when set */
  readonly passphrase?: string;
}

export interface KeyCreationRequest extends KeyPairOptions {
  /** Provider name; the configured default is used when absent */
  readonly method?: string;
}
