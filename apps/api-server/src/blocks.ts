import { type Block, BlockFormatError, parseBlocks } from '@pemc/block';
import { z } from 'zod';

/** A request field holding one or more blocks in their text form */
export const BlockText = z.string().min(1);

/** The first block of a text field; a field without blocks is a format error. */
export function readBlock(text: string, field: string): Block {
  const block = parseBlocks(text).at(0);
  if (!block) {
    throw new BlockFormatError(`${field} contains no block`);
  }
  return block;
}
