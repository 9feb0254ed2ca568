import type { Logger } from "../logger.js";
import { BlockSequence } from "./block-list.js";
import { tagPrefix } from "./embedding-text.js";
import { HeadingIndex, resolveHierarchy } from "./hierarchy.js";
import { headingLevel } from "./ids.js";
import { resolveChunkingOptions } from "./options.js";
import type { TokenStrategy } from "./tokenizer.js";
import type { ChunkingOptions, ContentBlock, HeadingInfo } from "./types.js";

const MIN_EMPTY_CHUNK_BUDGET = 10;

export interface NormalizedBlocks {
  blocks: ContentBlock[];
  headings: HeadingInfo[];
  /** Number of extra blocks created by splitting. */
  splits: number;
}

/**
 * Pre-splits every block that would not fit an empty chunk at its position, then
 * renumbers the page. Afterwards every non-heading block fits inside an empty chunk's
 * budget. Headings stay whole here; the builder cuts one that does not fit.
 */
export class BlockNormalizer {
  private readonly options: ChunkingOptions;

  constructor(
    private readonly strategy: TokenStrategy,
    options: Partial<ChunkingOptions> = {},
    private readonly logger?: Logger,
  ) {
    this.options = resolveChunkingOptions(options);
  }

  normalize(
    blocks: readonly ContentBlock[],
    headings: readonly HeadingInfo[],
    page: { pageId: string; title: string },
  ): NormalizedBlocks {
    const sourceHeadings = new HeadingIndex(headings);
    const out = new BlockSequence(page.pageId, this.options.idPrefix);
    let splits = 0;

    for (const block of blocks) {
      if (!block.text.trim()) continue;

      // Headings are never split.
      if (headingLevel(block.blockType) !== null) {
        out.append(block);
        continue;
      }

      const budget = this.emptyChunkBudget(block, sourceHeadings, page.title);
      if (this.strategy.count(block.text) <= budget) {
        out.append(block);
        continue;
      }

      const parts = this.strategy
        .split(block.text, budget)
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
      if (parts.length === 0) {
        out.append(block);
        continue;
      }
      splits += parts.length - 1;
      for (const part of parts) out.append(block, part);
    }

    if (splits > 0) {
      this.logger?.info("Split oversized blocks", { pageId: page.pageId, extraBlocks: splits });
    }
    return { blocks: out.blocks, headings: out.headings, splits };
  }

  /** `chunkSize - tags - 2 x overlap`, floored at a small constant. */
  private emptyChunkBudget(block: ContentBlock, headings: HeadingIndex, pageTitle: string): number {
    const { chunkSize, chunkOverlap, maxHeadingLevels } = this.options;
    const hierarchy = resolveHierarchy(block, headings, maxHeadingLevels);
    const tags = this.strategy.count(tagPrefix(pageTitle, hierarchy.truncated, this.options));
    return Math.max(MIN_EMPTY_CHUNK_BUDGET, chunkSize - tags - 2 * chunkOverlap);
  }
}
