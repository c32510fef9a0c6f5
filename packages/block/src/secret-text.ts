import { randomFillSync } from 'node:crypto';
import { DEFAULT_STRING_ENCODING } from '@pemc/types';

/**
 * Overwrite a buffer in place: zeros, random noise, zeros again.
 * Best-effort in JavaScript; copies made by the engine are out of reach.
 */
export function wipeMemory(data: Uint8Array): void {
  data.fill(0);
  randomFillSync(data);
  data.fill(0);
}

/** True when `encoding` can decode bytes, either through Buffer or a TextDecoder label. */
export function isSupportedEncoding(encoding: string): boolean {
  if (Buffer.isEncoding(encoding)) return true;
  try {
    new TextDecoder(encoding);
    return true;
  } catch {
    return false;
  }
}

export function decodeText(bytes: Uint8Array, encoding: string): string {
  if (Buffer.isEncoding(encoding)) {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(encoding);
  }
  return new TextDecoder(encoding).decode(bytes);
}

/**
 * Short-lived holder for decrypted text.
 *
 * The bytes are owned by the wrapper and overwritten on `dispose()`. Strings
 * obtained through `reveal()` are ordinary JS strings and cannot be wiped, so
 * callers should keep them scoped to a `use()` callback.
 */
export class SecretText {
  private bytes: Uint8Array | undefined;

  /** Takes ownership of `bytes`; the caller must not keep its own reference. */
  constructor(
    bytes: Uint8Array,
    readonly encoding: string = DEFAULT_STRING_ENCODING,
  ) {
    this.bytes = bytes;
  }

  static fromString(text: string): SecretText {
    return new SecretText(new Uint8Array(Buffer.from(text, 'utf-8')), DEFAULT_STRING_ENCODING);
  }

  get disposed(): boolean {
    return this.bytes === undefined;
  }

  get byteLength(): number {
    return this.bytes?.length ?? 0;
  }

  reveal(): string {
    if (!this.bytes) {
      throw new Error('SecretText has been disposed');
    }
    return decodeText(this.bytes, this.encoding);
  }

  use<T>(fn: (text: string) => T): T {
    return fn(this.reveal());
  }

  dispose(): void {
    if (!this.bytes) return;
    wipeMemory(this.bytes);
    this.bytes = undefined;
  }

  toString(): string {
    return '[SecretText]';
  }

  toJSON(): never {
    throw new Error('SecretText cannot be serialized');
  }
}
