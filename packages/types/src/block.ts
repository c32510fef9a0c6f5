/**
 * Block vocabulary shared by every package: the declared type tags,
 * the kinds derived from them and the property names the interpreter reads.
 */

export type BlockKind =
  | 'publicKey'
  | 'privateKey'
  | 'cipher'
  | 'signature'
  | 'hash'
  | 'content'
  | 'unknown';

/** Declared type tags as they appear in `-----BEGIN <NAME>-----` lines */
export const BlockName = {
  PUBLIC_KEY: 'PUBLIC KEY',
  PRIVATE_KEY: 'PRIVATE KEY',
  CIPHER: 'CIPHER',
  SIGNATURE: 'SIGNATURE',
  HASH: 'HASH',
  CONTENT: 'CONTENT',
} as const;

export type KnownBlockName = (typeof BlockName)[keyof typeof BlockName];

const KIND_BY_NAME: Record<KnownBlockName, BlockKind> = {
  [BlockName.PUBLIC_KEY]: 'publicKey',
  [BlockName.PRIVATE_KEY]: 'privateKey',
  [BlockName.CIPHER]: 'cipher',
  [BlockName.SIGNATURE]: 'signature',
  [BlockName.HASH]: 'hash',
  [BlockName.CONTENT]: 'content',
};

function isKnownBlockName(name: string): name is KnownBlockName {
  return Object.prototype.hasOwnProperty.call(KIND_BY_NAME, name);
}

/** Map a declared tag to its kind. Matching ignores case and surrounding whitespace. */
export function kindOfName(name: string): BlockKind {
  const normalized = name.trim().toUpperCase();
  return isKnownBlockName(normalized) ? KIND_BY_NAME[normalized] : 'unknown';
}

export const BlockProperty = {
  METHOD: 'method',
  LENGTH: 'length',
  EMBEDDED: 'embedded',
  SYMMETRIC: 'symmetric',
  KEY_ID: 'keyId',
  PRIV_ID: 'privId',
  PUB_ID: 'pubId',
  IDENT: 'ident',
  ENCRYPTED: 'encrypted',
  STRING_ENCODING: 'stringEncoding',
  FORMAT: 'format',
  CREATED: 'created',
} as const;

export type PropertyValue = string | number | boolean;

/** Value of the `embedded` property that limits a signature to the next block */
export const EMBEDDED_NEXT = 'next';

export const DEFAULT_STRING_ENCODING = 'utf-8';
