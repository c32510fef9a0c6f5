import { z } from 'zod';
import { ECDSA_SIGNER_NAME, RSA_CIPHER_NAME } from '@pemc/providers';

export const CryptConfigSchema = z.object({
  /** Cipher used when neither a key nor a block names one */
  defaultCipher: z.string().trim().min(1).default(RSA_CIPHER_NAME),
  /** Signer used when neither a key nor a block names one */
  defaultSigner: z.string().trim().min(1).default(ECDSA_SIGNER_NAME),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type CryptConfig = z.infer<typeof CryptConfigSchema>;

export type CryptConfigInput = z.input<typeof CryptConfigSchema>;

/**
 * Read configuration from the environment:
 * PEMC_DEFAULT_CIPHER, PEMC_DEFAULT_SIGNER, PEMC_LOG_LEVEL.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CryptConfig {
  return CryptConfigSchema.parse({
    defaultCipher: env.PEMC_DEFAULT_CIPHER || undefined,
    defaultSigner: env.PEMC_DEFAULT_SIGNER || undefined,
    logLevel: env.PEMC_LOG_LEVEL?.toLowerCase() || undefined,
  });
}
