import { describe, it, expect } from 'vitest';
import { Block } from './block.js';
import { BlockList } from './block-list.js';

function names(list: BlockList): string[] {
  return [...list].map((b) => b.text());
}

describe('BlockList', () => {
  it('should insert a sub-sequence after a given index', () => {
    const list = new BlockList([Block.content('a'), Block.content('d')]);

    list.insertAll(1, [Block.content('b'), Block.content('c')]);

    expect(names(list)).toEqual(['a', 'b', 'c', 'd']);
    expect(list.size).toBe(4);
  });

  it('should append when inserting at the end', () => {
    const list = new BlockList([Block.content('a')]);
    list.insertAll(1, [Block.content('b')]);

    expect(names(list)).toEqual(['a', 'b']);
  });

  it('should reject out of range access', () => {
    const list = new BlockList([Block.content('a')]);

    expect(() => list.get(1)).toThrow(RangeError);
    expect(() => list.insertAll(3, [])).toThrow(RangeError);
    expect(list.at(5)).toBeUndefined();
  });

  it('should render a clamped range', () => {
    const a = Block.content('a');
    const b = Block.content('b');
    const list = new BlockList([a, b]);

    expect(list.render(1)).toBe(b.toString());
    expect(list.render(0, 99)).toBe(a.toString() + b.toString());
    expect(list.render(2)).toBe('');
    expect(list.toString()).toBe(list.render(0, 2));
  });
});
