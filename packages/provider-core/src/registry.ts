import { ProviderNotFoundError } from '@pemc/block';
import type { ICipherProvider } from './cipher.js';
import type { ISignerProvider } from './signer.js';

export type Capability = 'cipher' | 'signer';

/** Lookup-by-name access to providers; names are matched trimmed and case-insensitively. */
export interface IProviderRegistry {
  getCipher(name: string): ICipherProvider;
  getSigner(name: string): ISignerProvider;
  hasCipher(name: string): boolean;
  hasSigner(name: string): boolean;
}

export function normalizeProviderName(name: string): string {
  return name.trim().toUpperCase();
}

/**
 * In-memory provider registry.
 * Registering a second provider under the same name replaces the first.
 */
export class ProviderRegistry implements IProviderRegistry {
  private readonly ciphers = new Map<string, ICipherProvider>();
  private readonly signers = new Map<string, ISignerProvider>();

  registerCipher(provider: ICipherProvider): this {
    this.ciphers.set(normalizeProviderName(provider.name), provider);
    return this;
  }

  registerSigner(provider: ISignerProvider): this {
    this.signers.set(normalizeProviderName(provider.name), provider);
    return this;
  }

  unregister(capability: Capability, name: string): boolean {
    const map = capability === 'cipher' ? this.ciphers : this.signers;
    return map.delete(normalizeProviderName(name));
  }

  getCipher(name: string): ICipherProvider {
    const provider = this.ciphers.get(normalizeProviderName(name));
    if (!provider) throw new ProviderNotFoundError('cipher', name);
    return provider;
  }

  getSigner(name: string): ISignerProvider {
    const provider = this.signers.get(normalizeProviderName(name));
    if (!provider) throw new ProviderNotFoundError('signer', name);
    return provider;
  }

  hasCipher(name: string): boolean {
    return this.ciphers.has(normalizeProviderName(name));
  }

  hasSigner(name: string): boolean {
    return this.signers.has(normalizeProviderName(name));
  }

  listCiphers(): string[] {
    return [...this.ciphers.values()].map((p) => p.name);
  }

  listSigners(): string[] {
    return [...this.signers.values()].map((p) => p.name);
  }
}
