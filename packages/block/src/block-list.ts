import { Block } from './block.js';

/**
 * Ordered, index-addressable document. Grows while it is being interpreted:
 * decrypted sub-documents are inserted behind the block that carried them.
 * Not safe for concurrent mutation; one list belongs to one interpretation.
 */
export class BlockList implements Iterable<Block> {
  private readonly blocks: Block[];

  constructor(blocks: Iterable<Block> = []) {
    this.blocks = [...blocks];
  }

  get size(): number {
    return this.blocks.length;
  }

  get(index: number): Block {
    const block = this.blocks[index];
    if (!block) {
      throw new RangeError(`Block index ${index} out of range (size ${this.blocks.length})`);
    }
    return block;
  }

  at(index: number): Block | undefined {
    return this.blocks[index];
  }

  add(...blocks: Block[]): this {
    this.blocks.push(...blocks);
    return this;
  }

  /** Insert `blocks` so that the first of them lands at `index`, shifting the rest back. */
  insertAll(index: number, blocks: Iterable<Block>): this {
    if (index < 0 || index > this.blocks.length) {
      throw new RangeError(`Insert index ${index} out of range (size ${this.blocks.length})`);
    }
    this.blocks.splice(index, 0, ...blocks);
    return this;
  }

  /** Concatenated text of the blocks in `[from, to)`, clamped to the list. */
  render(from = 0, to = this.blocks.length): string {
    return this.blocks
      .slice(Math.max(from, 0), Math.min(to, this.blocks.length))
      .map((block) => block.toString())
      .join('');
  }

  toArray(): readonly Block[] {
    return this.blocks;
  }

  equals(other: BlockList): boolean {
    return (
      this.size === other.size &&
      this.blocks.every((block, i) => {
        const theirs = other.at(i);
        return theirs !== undefined && block.equals(theirs);
      })
    );
  }

  toString(): string {
    return this.render();
  }

  [Symbol.iterator](): Iterator<Block> {
    return this.blocks[Symbol.iterator]();
  }
}
