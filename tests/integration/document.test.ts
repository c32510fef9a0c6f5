import { describe, it, expect, beforeAll } from 'vitest';
import { Block, BlockList, SignatureInvalidError, parseBlocks } from '@pemc/block';
import { CryptApi, KeyRing } from '@pemc/chain';
import type { KeyPair } from '@pemc/provider-core';

describe('Document interpretation', () => {
  const api = new CryptApi({ config: { logLevel: 'silent' } });
  let alice: { cipher: KeyPair; signer: KeyPair };
  let bob: { cipher: KeyPair; signer: KeyPair };

  beforeAll(() => {
    alice = { cipher: api.createKeys(), signer: api.createSignKeys({ passphrase: 'test-secret' }) };
    bob = { cipher: api.createKeys({ length: 2048 }), signer: api.createSignKeys() };
  });

  it('should read a signed and encrypted document written as text', () => {
    // alice signs a note and encrypts it for bob; the public signing key travels along
    const note = api.signEmbedded(
      alice.signer.privateKey,
      [Block.content('first line\nsecond line'), new Block('HASH', { method: 'SHA-256' }, new Uint8Array(32))],
      'remainder',
      'test-secret',
    );
    const text = new BlockList([alice.signer.publicKey, api.embed(bob.cipher.publicKey, note)]).toString();

    const secrets: string[] = [];
    const ring = new KeyRing({ onSecret: (_b, s) => secrets.push(s.reveal()) }).addKey(bob.cipher.privateKey);
    const list = parseBlocks(text);
    api.processBlocks(ring, list);

    expect(list.toArray().map((b) => b.name)).toEqual(['PUBLIC KEY', 'CIPHER', 'SIGNATURE', 'CONTENT', 'HASH']);
    expect(list.get(3).text()).toBe('first line\nsecond line');
    expect(secrets).toEqual([note.toString()]);
    expect(ring.events.map((e) => e.type)).toEqual(['publicKey', 'secret', 'validated', 'hash']);
  });

  it('should process layered envelopes addressed to different readers', () => {
    // bob's part is nested inside alice's part; alice cannot open it
    const forBob = api.embed(bob.cipher.publicKey, [Block.content('for bob')]);
    const forAlice = api.embed(alice.cipher.publicKey, [Block.content('for alice'), forBob]);

    const aliceRing = new KeyRing().addKey(alice.cipher.privateKey);
    const aliceView = new BlockList([forAlice]);
    expect(() => api.processBlocks(aliceRing, aliceView)).toThrow('Embedded CIPHER block was not decrypted');
    expect(aliceRing.eventsOf('keyNotFound')).toHaveLength(1);

    const bothRing = new KeyRing().addKeys([alice.cipher.privateKey, bob.cipher.privateKey]);
    const fullView = new BlockList([forAlice]);
    api.processBlocks(bothRing, fullView);

    expect(fullView.toArray().filter((b) => b.kind === 'content').map((b) => b.text())).toEqual([
      'for alice',
      'for bob',
    ]);
  });

  it('should stop at a signature that no longer matches the text', () => {
    const signed = api.signEmbedded(bob.signer.privateKey, [Block.content('amount: 10')]);
    const original = Buffer.from('amount: 10').toString('base64');
    const altered = Buffer.from('amount: 90').toString('base64');
    const forged = signed.toString().replace(original, altered);
    const ring = new KeyRing().addKey(bob.signer.publicKey);

    expect(forged).not.toBe(signed.toString());
    expect(() => api.processBlocks(ring, parseBlocks(forged))).toThrow(SignatureInvalidError);
    expect(ring.eventsOf('validated')).toEqual([]);
  });

  it('should give every key pair fresh ids and material', () => {
    const first = api.createKeys({ length: 512 });
    const second = api.createKeys({ length: 512 });

    expect(first.publicKey.ident).not.toBe(second.publicKey.ident);
    expect(first.privateKey.ident).not.toBe(second.privateKey.ident);
    expect(first.publicKey.equals(second.publicKey)).toBe(false);
  });

  it('should decrypt across key sizes with the declared length', () => {
    const long = 'ü'.repeat(500);
    const cipher = api.encrypt(bob.cipher.publicKey, long);

    // 1000 UTF-8 bytes in 117-byte chunks, one 256-byte block each
    expect(cipher.payload).toHaveLength(9 * 256);
    const secret = api.decrypt(bob.cipher.privateKey, cipher);
    expect(secret.reveal()).toBe(long);
    secret.dispose();
  });
});
