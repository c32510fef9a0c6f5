import { Block } from './block.js';
import { BlockList } from './block-list.js';
import { BlockFormatError } from './errors.js';

const BEGIN = /^-----BEGIN (.+)-----$/;
const END = /^-----END (.+)-----$/;
const HEADER = /^([A-Za-z0-9_.-]+): ?(.*)$/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Parse PEM-style text into blocks:
 *
 * ```
 * -----BEGIN CIPHER-----
 * method: RSA-PKCS1
 * length: 1024
 *
 * <base64 payload>
 * -----END CIPHER-----
 * ```
 *
 * Text outside BEGIN/END pairs is ignored.
 */
export function parseBlocks(text: string): BlockList {
  const list = new BlockList();
  const lines = text.split(/\r?\n/);

  let i = 0;
  while (i < lines.length) {
    const begin = BEGIN.exec(lines[i] ?? '');
    i++;
    if (!begin?.[1]) continue;

    const name = begin[1];
    const properties: Array<[string, string]> = [];
    const body: string[] = [];
    let inHeader = true;
    let closed = false;

    while (i < lines.length) {
      const line = lines[i] ?? '';
      i++;

      const end = END.exec(line);
      if (end) {
        if (end[1] !== name) {
          throw new BlockFormatError(`Block ${name} closed by END ${end[1] ?? ''}`);
        }
        closed = true;
        break;
      }
      if (BEGIN.test(line)) {
        throw new BlockFormatError(`Block ${name} is not closed before the next BEGIN`);
      }

      if (inHeader) {
        if (line === '') {
          inHeader = false;
          continue;
        }
        const header = HEADER.exec(line);
        if (!header?.[1]) {
          throw new BlockFormatError(`Malformed header line in block ${name}: ${JSON.stringify(line)}`);
        }
        properties.push([header[1], header[2] ?? '']);
        continue;
      }

      const chunk = line.trim();
      if (!BASE64.test(chunk)) {
        throw new BlockFormatError(`Invalid payload line in block ${name}`);
      }
      body.push(chunk);
    }

    if (!closed) {
      throw new BlockFormatError(`Block ${name} has no END line`);
    }

    const payload = new Uint8Array(Buffer.from(body.join(''), 'base64'));
    list.add(new Block(name, properties, payload));
  }

  return list;
}

export function serializeBlocks(blocks: Iterable<Block>): string {
  return new BlockList(blocks).render();
}
