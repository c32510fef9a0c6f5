import {
  BlockName,
  BlockProperty,
  kindOfName,
  type BlockKind,
  type PropertyValue,
} from '@pemc/types';
import { BlockFormatError } from './errors.js';
import { decodeText } from './secret-text.js';

const PROPERTY_KEY = /^[A-Za-z0-9_.-]+$/;
const LINE_BREAK = /[\r\n]/;
const BASE64_LINE = 64;

const TRUE_VALUES = new Set(['true', 'yes', '1']);
const FALSE_VALUES = new Set(['false', 'no', '0']);

export type PropertyInit = Iterable<readonly [string, PropertyValue]> | Record<string, PropertyValue>;

function isEntryIterable(init: PropertyInit): init is Iterable<readonly [string, PropertyValue]> {
  return Symbol.iterator in init;
}

/**
 * One unit of a composite document: a declared type tag, an ordered
 * property bag and a raw payload.
 *
 * Property values are stored as strings so that a block survives a
 * serialize/parse round trip unchanged; the typed getters convert on read.
 */
export class Block {
  readonly name: string;
  payload: Uint8Array;
  private readonly props = new Map<string, string>();

  constructor(name: string, properties: PropertyInit = [], payload: Uint8Array = new Uint8Array(0)) {
    const trimmed = name.trim();
    if (!trimmed || LINE_BREAK.test(trimmed) || trimmed.includes('-----')) {
      throw new BlockFormatError(`Invalid block name: ${JSON.stringify(name)}`);
    }
    this.name = trimmed;
    this.payload = payload;

    const entries = isEntryIterable(properties) ? properties : Object.entries(properties);
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  /** Plain-text content block; the text is stored UTF-8 encoded. */
  static content(text: string, properties: PropertyInit = []): Block {
    return new Block(BlockName.CONTENT, properties, new Uint8Array(Buffer.from(text, 'utf-8')));
  }

  get kind(): BlockKind {
    return kindOfName(this.name);
  }

  get method(): string | undefined {
    return this.getString(BlockProperty.METHOD);
  }

  /** The block's own identifier, present on key blocks */
  get ident(): string | undefined {
    return this.getString(BlockProperty.IDENT);
  }

  has(key: string): boolean {
    return this.props.has(key);
  }

  set(key: string, value: PropertyValue): this {
    if (!PROPERTY_KEY.test(key)) {
      throw new BlockFormatError(`Invalid property key: ${JSON.stringify(key)}`, { block: this });
    }
    const text = String(value);
    if (LINE_BREAK.test(text)) {
      throw new BlockFormatError(`Property ${key} must be a single line`, { block: this });
    }
    this.props.set(key, text);
    return this;
  }

  delete(key: string): boolean {
    return this.props.delete(key);
  }

  getString(key: string): string | undefined;
  getString(key: string, fallback: string): string;
  getString(key: string, fallback?: string): string | undefined {
    return this.props.get(key) ?? fallback;
  }

  getInt(key: string, fallback: number): number {
    const raw = this.props.get(key);
    if (raw === undefined) return fallback;
    const value = Number.parseInt(raw.trim(), 10);
    return Number.isNaN(value) ? fallback : value;
  }

  /** Any value that is not a recognizable boolean (e.g. `next`) yields the fallback. */
  getBoolean(key: string, fallback: boolean): boolean {
    const raw = this.props.get(key)?.trim().toLowerCase();
    if (raw === undefined) return fallback;
    if (TRUE_VALUES.has(raw)) return true;
    if (FALSE_VALUES.has(raw)) return false;
    return fallback;
  }

  properties(): Array<[string, string]> {
    return [...this.props.entries()];
  }

  /** Payload decoded as text, used for content blocks */
  text(encoding = 'utf-8'): string {
    return decodeText(this.payload, encoding);
  }

  equals(other: Block): boolean {
    if (this.name !== other.name) return false;
    if (!Buffer.from(this.payload).equals(Buffer.from(other.payload))) return false;

    const mine = this.properties();
    const theirs = other.properties();
    return (
      mine.length === theirs.length &&
      mine.every(([key, value], i) => theirs[i]?.[0] === key && theirs[i]?.[1] === value)
    );
  }

  /** Textual form; this is the exact text a covering signature is computed over. */
  toString(): string {
    const lines = [`-----BEGIN ${this.name}-----`];
    for (const [key, value] of this.props) {
      lines.push(`${key}: ${value}`);
    }
    lines.push('');

    const body = Buffer.from(this.payload).toString('base64');
    for (let off = 0; off < body.length; off += BASE64_LINE) {
      lines.push(body.slice(off, off + BASE64_LINE));
    }
    lines.push(`-----END ${this.name}-----`);

    return `${lines.join('\n')}\n`;
  }
}
