import { describe, it, expect } from 'vitest';
import { Block } from './block.js';
import { BlockList } from './block-list.js';
import { parseBlocks, serializeBlocks } from './pem-format.js';
import { BlockFormatError } from './errors.js';

describe('parseBlocks', () => {
  it('should parse headers and payload', () => {
    const list = parseBlocks(
      [
        'preamble is ignored',
        '-----BEGIN CIPHER-----',
        'method: RSA-PKCS1',
        'embedded: true',
        '',
        'AQID',
        '-----END CIPHER-----',
      ].join('\n'),
    );

    expect(list.size).toBe(1);
    const block = list.get(0);
    expect(block.kind).toBe('cipher');
    expect(block.properties()).toEqual([
      ['method', 'RSA-PKCS1'],
      ['embedded', 'true'],
    ]);
    expect([...block.payload]).toEqual([1, 2, 3]);
  });

  it('should accept CRLF line endings and empty payloads', () => {
    const list = parseBlocks('-----BEGIN HASH-----\r\nalgo:sha256\r\n\r\n-----END HASH-----\r\n');

    expect(list.get(0).getString('algo')).toBe('sha256');
    expect(list.get(0).payload).toHaveLength(0);
  });

  it('should round-trip a document', () => {
    const original = new BlockList([
      new Block('PUBLIC KEY', { ident: 'k1', length: 1024, method: 'RSA-PKCS1' }, new Uint8Array(200).fill(7)),
      new Block('SIGNATURE', { embedded: 'next', pubId: 'k1', note: '' }, new Uint8Array([9])),
      Block.content('hello world'),
    ]);

    const parsed = parseBlocks(serializeBlocks(original));

    expect(parsed.equals(original)).toBe(true);
    expect(serializeBlocks(parsed)).toBe(serializeBlocks(original));
  });

  it('should keep leading spaces of values', () => {
    const block = new Block('CUSTOM', { note: ' padded' });
    const parsed = parseBlocks(block.toString());

    expect(parsed.get(0).getString('note')).toBe(' padded');
  });

  it('should fail on unterminated blocks', () => {
    expect(() => parseBlocks('-----BEGIN CIPHER-----\nmethod: x\n')).toThrow(BlockFormatError);
    expect(() => parseBlocks('-----BEGIN CIPHER-----\n\n-----END HASH-----\n')).toThrow('closed by END HASH');
    expect(() =>
      parseBlocks('-----BEGIN CIPHER-----\n\n-----BEGIN HASH-----\n\n-----END HASH-----\n'),
    ).toThrow('not closed');
  });

  it('should fail on malformed headers and payloads', () => {
    expect(() => parseBlocks('-----BEGIN CIPHER-----\nno colon here\n\n-----END CIPHER-----\n')).toThrow(
      'Malformed header line',
    );
    expect(() => parseBlocks('-----BEGIN CIPHER-----\n\n!!!\n-----END CIPHER-----\n')).toThrow(
      'Invalid payload line',
    );
  });
});
