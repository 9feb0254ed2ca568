import { blockId, headingLevel } from "./ids.js";
import type { ContentBlock, HeadingInfo } from "./types.js";

/**
 * Append-only, renumbering block list. Every block is numbered once, at the moment it is
 * appended: index, id and offset come from its position in this list, and its heading
 * back-reference is translated from the source numbering through the ids of the headings
 * appended so far. Splitting a block therefore never renumbers anything already emitted.
 */
export class BlockSequence {
  readonly blocks: ContentBlock[] = [];
  private readonly headingList: HeadingInfo[] = [];
  private readonly renamedHeadings = new Map<string, string>();
  private offset = 0;

  constructor(
    private readonly pageId: string,
    private readonly idPrefix: string,
  ) {}

  get headings(): HeadingInfo[] {
    return this.headingList;
  }

  /** Translates a heading id from the source numbering; null when that heading was never appended. */
  resolveHeadingId(sourceId: string | null): string | null {
    if (sourceId === null) return null;
    return this.renamedHeadings.get(sourceId) ?? null;
  }

  /** Appends `source` (or one piece of it, when `text` is given) as a new block. */
  append(source: ContentBlock, text: string = source.text): ContentBlock {
    const index = this.blocks.length;
    const block: ContentBlock = {
      index,
      id: blockId(this.idPrefix, this.pageId, index),
      blockType: source.blockType,
      text,
      xpath: source.xpath,
      cssSelector: source.cssSelector,
      textOffset: this.offset,
      textLength: text.length,
      parentHeadingId: this.resolveHeadingId(source.parentHeadingId),
      htmlId: source.htmlId,
    };
    this.blocks.push(block);
    this.offset += text.length + 1;

    const level = headingLevel(block.blockType);
    if (level !== null && !this.renamedHeadings.has(source.id)) {
      this.renamedHeadings.set(source.id, block.id);
      this.headingList.push({
        level,
        text,
        blockId: block.id,
        blockIndex: index,
        htmlId: block.htmlId,
      });
    }
    return block;
  }
}

export interface CursorItem {
  source: ContentBlock;
  /** Text still to be placed; shorter than `source.text` after a split. */
  text: string;
  /** True when this item is the remainder of a block split while packing. */
  isRemainder: boolean;
}

/**
 * Read cursor over a block list. A split replaces the head with its remainder in place,
 * so the next chunk starts cleanly at that remainder.
 */
export class BlockCursor {
  private position = 0;
  private head: CursorItem | null = null;

  constructor(private readonly source: readonly ContentBlock[]) {}

  peek(): CursorItem | null {
    if (this.head) return this.head;
    const block = this.source[this.position];
    if (!block) return null;
    this.head = { source: block, text: block.text, isRemainder: false };
    return this.head;
  }

  advance(): void {
    this.head = null;
    this.position++;
  }

  /** Keep `remainder` of the current block as the new head. */
  replaceHead(remainder: string): void {
    const current = this.peek();
    if (!current) return;
    this.head = { source: current.source, text: remainder, isRemainder: true };
  }
}
