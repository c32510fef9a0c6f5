import { describe, it, expect, beforeAll } from 'vitest';
import { z } from 'zod';
import { Block, parseBlocks } from '@pemc/block';
import { loadConfig, type CryptApi } from '@pemc/chain';
import { createApp } from '@pemc/api-server';
import type { Hono } from 'hono';

const KeysResponse = z.object({
  method: z.string(),
  publicKeyId: z.string(),
  privateKeyId: z.string(),
  publicKey: z.string(),
  privateKey: z.string(),
});

const ErrorResponse = z.object({
  error: z.string(),
  code: z.string().optional(),
  details: z.array(z.unknown()).optional(),
});

const ProcessResponse = z.object({
  events: z.array(z.object({ type: z.string(), block: z.string(), ident: z.string().optional() })),
  secrets: z.array(z.string()),
  document: z.string(),
});

describe('API E2E', () => {
  let app: Hono;
  let api: CryptApi;

  beforeAll(() => {
    const result = createApp({ config: loadConfig({ PEMC_LOG_LEVEL: 'silent' }), requestLog: false });
    app = result.app;
    api = result.api;
  });

  async function request(method: string, path: string, body?: unknown) {
    const init: RequestInit = {
      method,
      headers: { 'Content-Type': 'application/json' },
    };
    if (body !== undefined) init.body = typeof body === 'string' ? body : JSON.stringify(body);

    return app.request(`http://localhost${path}`, init);
  }

  async function read<T extends z.ZodTypeAny>(res: Response, schema: T): Promise<z.infer<T>> {
    return schema.parse(await res.json());
  }

  async function createKeys(body: Record<string, unknown>) {
    const res = await request('POST', '/keys', body);
    expect(res.status).toBe(201);
    return read(res, KeysResponse);
  }

  describe('Health', () => {
    it('GET /health should return ok and the defaults', async () => {
      const res = await request('GET', '/health');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        defaultCipher: 'RSA-PKCS1',
        defaultSigner: 'ECDSA-SECP256K1',
      });
    });
  });

  describe('Keys', () => {
    it('POST /keys should create a cross-referenced cipher key pair', async () => {
      const data = await createKeys({ kind: 'cipher', length: 512 });
      const publicKey = parseBlocks(data.publicKey).get(0);
      const privateKey = parseBlocks(data.privateKey).get(0);

      expect(data.method).toBe('RSA-PKCS1');
      expect(publicKey.kind).toBe('publicKey');
      expect(publicKey.ident).toBe(data.publicKeyId);
      expect(privateKey.getString('pubId')).toBe(data.publicKeyId);
      expect(publicKey.getInt('length', 0)).toBe(512);
    });

    it('POST /keys should create signing keys', async () => {
      const data = await createKeys({ kind: 'signer' });
      expect(data.method).toBe('ECDSA-SECP256K1');
    });

    it('POST /keys should reject an invalid body', async () => {
      const res = await request('POST', '/keys', { kind: 'hash' });
      expect(res.status).toBe(400);
      expect((await read(res, ErrorResponse)).error).toBe('Invalid request');
    });

    it('POST /keys should answer 404 for an unknown provider', async () => {
      const res = await request('POST', '/keys', { kind: 'cipher', method: 'ROT13' });
      expect(res.status).toBe(404);
      expect(await read(res, ErrorResponse)).toEqual({
        error: 'No cipher provider registered as ROT13',
        code: 'PEMC_PROVIDER_NOT_FOUND',
      });
    });

    it('should answer 400 for a body that is not JSON', async () => {
      const res = await request('POST', '/keys', '{not json');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
    });
  });

  describe('Encryption', () => {
    let keys: z.infer<typeof KeysResponse>;

    beforeAll(async () => {
      keys = await createKeys({ kind: 'cipher', length: 512 });
    });

    it('POST /encrypt then /decrypt should round-trip text', async () => {
      const encrypted = await request('POST', '/encrypt', { publicKey: keys.publicKey, text: 'meet at noon' });
      expect(encrypted.status).toBe(200);
      const { cipher } = await read(encrypted, z.object({ cipher: z.string() }));
      expect(parseBlocks(cipher).get(0).getString('pubId')).toBe(keys.publicKeyId);

      const decrypted = await request('POST', '/decrypt', { privateKey: keys.privateKey, cipher });
      expect(decrypted.status).toBe(200);
      expect(await decrypted.json()).toEqual({ text: 'meet at noon' });
    });

    it('POST /decrypt should answer 422 with the wrong key', async () => {
      const other = await createKeys({ kind: 'cipher', length: 512 });
      const encrypted = await request('POST', '/encrypt', { publicKey: keys.publicKey, text: 'not for you' });
      const { cipher } = await read(encrypted, z.object({ cipher: z.string() }));

      const res = await request('POST', '/decrypt', { privateKey: other.privateKey, cipher });
      expect(res.status).toBe(422);
      expect((await read(res, ErrorResponse)).code).toBe('PEMC_CRYPT');
    });

    it('should need the pass-phrase of a protected key', async () => {
      const locked = await createKeys({ kind: 'cipher', length: 512, passphrase: 'test-secret' });
      const encrypted = await request('POST', '/encrypt', { publicKey: locked.publicKey, text: 'sealed' });
      const { cipher } = await read(encrypted, z.object({ cipher: z.string() }));

      const without = await request('POST', '/decrypt', { privateKey: locked.privateKey, cipher });
      expect(without.status).toBe(422);
      expect((await read(without, ErrorResponse)).error).toBe(
        'Private key is protected and no pass-phrase was given',
      );

      const withPhrase = await request('POST', '/decrypt', {
        privateKey: locked.privateKey,
        cipher,
        passphrase: 'test-secret',
      });
      expect(await withPhrase.json()).toEqual({ text: 'sealed' });
    });

    it('should answer 422 when a key field holds no block', async () => {
      const res = await request('POST', '/encrypt', { publicKey: 'just words', text: 'x' });
      expect(res.status).toBe(422);
      expect(await read(res, ErrorResponse)).toEqual({
        error: 'publicKey contains no block',
        code: 'PEMC_FORMAT',
      });
    });
  });

  describe('Signing', () => {
    let keys: z.infer<typeof KeysResponse>;

    beforeAll(async () => {
      keys = await createKeys({ kind: 'signer' });
    });

    it('POST /sign then /validate should accept the signed text only', async () => {
      const signed = await request('POST', '/sign', { privateKey: keys.privateKey, text: 'I agree' });
      expect(signed.status).toBe(200);
      const { signature } = await read(signed, z.object({ signature: z.string() }));

      const valid = await request('POST', '/validate', { publicKey: keys.publicKey, text: 'I agree', signature });
      expect(await valid.json()).toEqual({ valid: true });

      const tampered = await request('POST', '/validate', { publicKey: keys.publicKey, text: 'I agreed', signature });
      expect(await tampered.json()).toEqual({ valid: false });
    });
  });

  describe('Documents', () => {
    function buildDocument(body: string) {
      const cipherKeys = api.createKeys({ length: 512 });
      const signKeys = api.createSignKeys();
      const inner = api.signEmbedded(signKeys.privateKey, [Block.content(body)]);
      const cipher = api.embed(cipherKeys.publicKey, inner);
      return { cipherKeys, signKeys, inner, cipher };
    }

    it('POST /documents/process should decrypt, splice and validate', async () => {
      const { cipherKeys, signKeys, inner, cipher } = buildDocument('the terms');

      const res = await request('POST', '/documents/process', {
        document: cipher.toString(),
        keys: [cipherKeys.privateKey.toString() + signKeys.publicKey.toString()],
      });

      expect(res.status).toBe(200);
      const data = await read(res, ProcessResponse);
      expect(data.events).toEqual([
        { type: 'secret', block: 'CIPHER' },
        { type: 'validated', block: 'SIGNATURE' },
      ]);
      expect(data.secrets).toEqual([inner.toString()]);
      expect(data.document).toBe(cipher.toString() + inner.toString());
    });

    it('should report a cipher it has no key for', async () => {
      const { cipher } = buildDocument('unreadable');

      const res = await request('POST', '/documents/process', { document: `${cipher}${Block.content('plain')}` });

      expect(res.status).toBe(422);
      expect((await read(res, ErrorResponse)).code).toBe('PEMC_NOT_DECRYPTED');
    });

    it('should list a missing key for a plain cipher block and go on', async () => {
      const cipherKeys = api.createKeys({ length: 512 });
      const cipher = api.encrypt(cipherKeys.publicKey, 'out of reach');

      const res = await request('POST', '/documents/process', { document: cipher.toString() });

      expect(res.status).toBe(200);
      const data = await read(res, ProcessResponse);
      expect(data.events).toEqual([{ type: 'keyNotFound', block: 'CIPHER' }]);
      expect(data.secrets).toEqual([]);
    });

    it('should answer 422 for a tampered embedded document', async () => {
      const cipherKeys = api.createKeys({ length: 512 });
      const signKeys = api.createSignKeys();
      const inner = api.signEmbedded(signKeys.privateKey, [Block.content('pay 10')]);
      inner.get(1).payload = new Uint8Array(Buffer.from('pay 99'));
      const cipher = api.embed(cipherKeys.publicKey, inner);

      const res = await request('POST', '/documents/process', {
        document: cipher.toString(),
        keys: [cipherKeys.privateKey.toString(), signKeys.publicKey.toString()],
      });

      expect(res.status).toBe(422);
      expect(await read(res, ErrorResponse)).toMatchObject({ code: 'PEMC_SIGNATURE_INVALID' });
    });

    it('should answer 400 without a document', async () => {
      const res = await request('POST', '/documents/process', { keys: [] });
      expect(res.status).toBe(400);
    });
  });
});
