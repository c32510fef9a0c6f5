import { Hono } from 'hono';
import { z } from 'zod';
import type { CryptApi } from '@pemc/chain';

const CreateKeysSchema = z.object({
  kind: z.enum(['cipher', 'signer']).default('cipher'),
  method: z.string().min(1).optional(),
  length: z.number().int().positive().optional(),
  passphrase: z.string().min(1).optional(),
});

export function createKeysRouter(api: CryptApi) {
  const router = new Hono();

  // POST /keys - Create a key pair
  router.post('/', async (c) => {
    const body = await c.req.json();
    const parsed = CreateKeysSchema.safeParse(body);

    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const { kind, ...request } = parsed.data;
    const pair = kind === 'signer' ? api.createSignKeys(request) : api.createKeys(request);

    return c.json(
      {
        method: pair.publicKey.method,
        publicKeyId: pair.publicKey.ident,
        privateKeyId: pair.privateKey.ident,
        publicKey: pair.publicKey.toString(),
        privateKey: pair.privateKey.toString(),
      },
      201,
    );
  });

  return router;
}
