import { Hono } from 'hono';
import { z } from 'zod';
import { parseBlocks } from '@pemc/block';
import { KeyRing, type CryptApi } from '@pemc/chain';
import { BlockText } from '../blocks.js';

const ProcessDocumentSchema = z.object({
  document: BlockText,
  /** Key blocks in text form; one entry may hold several keys */
  keys: z.array(BlockText).default([]),
  /** Pass-phrases by private key id */
  passphrases: z.record(z.string().min(1)).default({}),
});

export function createDocumentsRouter(api: CryptApi) {
  const router = new Hono();

  // POST /documents/process - Interpret a document against the supplied keys
  router.post('/process', async (c) => {
    const parsed = ProcessDocumentSchema.safeParse(await c.req.json());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const { document, keys, passphrases } = parsed.data;
    const secrets: string[] = [];
    const ring = new KeyRing({ onSecret: (_block, secret) => secrets.push(secret.reveal()) });
    for (const text of keys) ring.addKeys(parseBlocks(text));
    for (const [keyId, passphrase] of Object.entries(passphrases)) ring.setPassphrase(keyId, passphrase);

    const list = parseBlocks(document);
    api.processBlocks(ring, list);

    return c.json({
      events: ring.events.map(({ type, block }) => ({
        type,
        block: block.name,
        ...(block.ident ? { ident: block.ident } : {}),
      })),
      secrets,
      document: list.toString(),
    });
  });

  return router;
}
