import { Hono } from 'hono';
import { z } from 'zod';
import type { CryptApi } from '@pemc/chain';
import { BlockText, readBlock } from '../blocks.js';

const EncryptSchema = z.object({
  publicKey: BlockText,
  text: z.string(),
  stringEncoding: z.string().min(1).optional(),
});

const DecryptSchema = z.object({
  privateKey: BlockText,
  cipher: BlockText,
  passphrase: z.string().min(1).optional(),
});

const SignSchema = z.object({
  privateKey: BlockText,
  text: z.string(),
  passphrase: z.string().min(1).optional(),
});

const ValidateSchema = z.object({
  publicKey: BlockText,
  text: z.string(),
  signature: BlockText,
});

export function createCryptRouter(api: CryptApi) {
  const router = new Hono();

  // POST /encrypt - Encrypt text for a public key
  router.post('/encrypt', async (c) => {
    const parsed = EncryptSchema.safeParse(await c.req.json());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const { publicKey, text, stringEncoding } = parsed.data;
    const cipher = api.encrypt(
      readBlock(publicKey, 'publicKey'),
      text,
      stringEncoding ? { stringEncoding } : {},
    );
    return c.json({ cipher: cipher.toString() });
  });

  // POST /decrypt - Reveal the text of a cipher block
  router.post('/decrypt', async (c) => {
    const parsed = DecryptSchema.safeParse(await c.req.json());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const { privateKey, cipher, passphrase } = parsed.data;
    const secret = api.decrypt(readBlock(privateKey, 'privateKey'), readBlock(cipher, 'cipher'), passphrase);
    try {
      return c.json({ text: secret.reveal() });
    } finally {
      secret.dispose();
    }
  });

  // POST /sign - Detached signature over text
  router.post('/sign', async (c) => {
    const parsed = SignSchema.safeParse(await c.req.json());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const { privateKey, text, passphrase } = parsed.data;
    const signature = api.sign(readBlock(privateKey, 'privateKey'), text, passphrase);
    return c.json({ signature: signature.toString() });
  });

  // POST /validate - Check a detached signature
  router.post('/validate', async (c) => {
    const parsed = ValidateSchema.safeParse(await c.req.json());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const { publicKey, text, signature } = parsed.data;
    const valid = api.validate(readBlock(publicKey, 'publicKey'), text, readBlock(signature, 'signature'));
    return c.json({ valid });
  });

  return router;
}
