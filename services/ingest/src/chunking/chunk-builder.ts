import type { Logger } from "../logger.js";
import { BlockCursor, BlockSequence } from "./block-list.js";
import { buildEmbeddingText, tagPrefix } from "./embedding-text.js";
import { HeadingIndex, resolveHierarchy, type ResolvedHierarchy } from "./hierarchy.js";
import { chunkId } from "./ids.js";
import { resolveChunkingOptions } from "./options.js";
import type { TokenStrategy } from "./tokenizer.js";
import type {
  BlockFragment,
  Chunk,
  ChunkingOptions,
  ContentBlock,
  HeadingInfo,
  PageMetadata,
  PageResult,
} from "./types.js";

/** Smallest content budget a chunk is ever given. */
const MIN_CONTENT_BUDGET = 10;
const TEXT_FRAGMENT_LENGTH = 100;
const NAVIGATION_TEXT_LENGTH = 80;

type PageInfo = Pick<PageMetadata, "pageId" | "title" | "spaceKey" | "version" | "lastModified" | "url">;

interface OverlapWindow {
  indices: number[];
  text: string;
  tokens: number;
  fragments: BlockFragment[];
}

const NO_OVERLAP: OverlapWindow = { indices: [], text: "", tokens: 0, fragments: [] };

function unique(values: readonly number[]): number[] {
  return [...new Set(values)];
}

function fragmentOf(block: ContentBlock): BlockFragment {
  return {
    blockIndex: block.index,
    blockId: block.id,
    blockType: block.blockType,
    xpath: block.xpath,
    cssSelector: block.cssSelector,
    htmlId: block.htmlId,
    textOffset: block.textOffset,
    textLength: block.text.length,
    fragmentStart: 0,
    fragmentEnd: block.text.length,
    text: block.text,
  };
}

/** Narrows `fragment` to `part`, a leading or trailing slice of its text. */
function sliceFragment(fragment: BlockFragment, part: string, fromEnd: boolean): BlockFragment {
  const found = fromEnd ? fragment.text.lastIndexOf(part) : fragment.text.indexOf(part);
  const shift = Math.max(0, found);
  return {
    ...fragment,
    textOffset: fragment.textOffset + shift,
    textLength: part.length,
    fragmentStart: fragment.fragmentStart + shift,
    fragmentEnd: fragment.fragmentStart + shift + part.length,
    text: part,
  };
}

/**
 * Anchor of the first block, else anchor of the nearest heading, else a text fragment
 * directive built from the start of the chunk text.
 */
export function buildNavigationUrl(
  pageUrl: string,
  firstBlockHtmlId: string | null,
  nearestHeadingHtmlId: string | null,
  text: string,
): string {
  if (firstBlockHtmlId) return `${pageUrl}#${firstBlockHtmlId}`;
  if (nearestHeadingHtmlId) return `${pageUrl}#${nearestHeadingHtmlId}`;
  const snippet = text.slice(0, NAVIGATION_TEXT_LENGTH).trim();
  // "-" delimits prefix/suffix in a text directive, so it is escaped too.
  return `${pageUrl}#:~:text=${encodeURIComponent(snippet).replace(/-/g, "%2D")}`;
}

/**
 * Packs normalized blocks into token-bounded chunks.
 *
 * Pass 1 builds chunks front to back. Each chunk's budget is split between the tag prefix,
 * the overlap taken from the end of the previous chunk, its own content, and a reserve for
 * the overlap pass 2 will take from the start of the following chunk. A block that does not
 * fit the remaining budget is cut at a sentence boundary; the cut is materialized as two
 * blocks so the next chunk starts at a block boundary.
 *
 * Pass 2 fills each chunk's forward overlap from the next chunk's core fragments, limited
 * to the reserve that chunk actually kept.
 */
export class ChunkBuilder {
  private readonly options: ChunkingOptions;

  constructor(
    private readonly strategy: TokenStrategy,
    options: Partial<ChunkingOptions> = {},
    private readonly logger?: Logger,
  ) {
    this.options = resolveChunkingOptions(options);
  }

  build(blocks: readonly ContentBlock[], headings: readonly HeadingInfo[], page: PageInfo): PageResult {
    const headingIndex = new HeadingIndex(headings);
    const cursor = new BlockCursor(blocks);
    const out = new BlockSequence(page.pageId, this.options.idPrefix);

    const chunks: Chunk[] = [];
    const reserves: number[] = [];

    while (cursor.peek()) {
      const built = this.buildOne(cursor, out, headingIndex, page, chunks[chunks.length - 1]);
      if (!built) break;
      chunks.push(built.chunk);
      reserves.push(built.reserve);
    }

    if (this.options.chunkOverlap > 0) this.applyNextOverlap(chunks, reserves, page.title);
    for (const chunk of chunks) chunk.tokenCount = this.strategy.count(chunk.embeddingText);

    this.logger?.debug("Chunks built", {
      pageId: page.pageId,
      chunks: chunks.length,
      blocks: out.blocks.length,
    });
    return { chunks, blocks: out.blocks, headings: out.headings };
  }

  private buildOne(
    cursor: BlockCursor,
    out: BlockSequence,
    headingIndex: HeadingIndex,
    page: PageInfo,
    previous: Chunk | undefined,
  ): { chunk: Chunk; reserve: number } | null {
    const head = cursor.peek();
    if (!head) return null;

    const { chunkSize, chunkOverlap } = this.options;

    let prevWindow = previous && chunkOverlap > 0
      ? this.collectOverlap(previous.highlight.coreFragments, true, chunkOverlap)
      : NO_OVERLAP;

    const hierarchy = resolveHierarchy(head.source, headingIndex, this.options.maxHeadingLevels);
    const tagTokens = this.strategy.count(tagPrefix(page.title, hierarchy.truncated, this.options));

    let reserve = chunkOverlap;
    let budget = chunkSize - tagTokens - prevWindow.tokens - reserve;
    if (budget <= 0) {
      prevWindow = NO_OVERLAP;
      budget = chunkSize - tagTokens - reserve;
      if (budget <= 0) {
        reserve = 0;
        budget = chunkSize - tagTokens;
        if (budget <= 0) budget = Math.max(MIN_CONTENT_BUDGET, Math.floor(chunkSize / 4));
      }
      this.logger?.debug("Chunk budget degraded", {
        pageId: page.pageId,
        tagTokens,
        budget,
        reserve,
      });
    }

    const startsMidBlock = head.isRemainder;
    let endsBySplit = false;
    const core: BlockFragment[] = [];

    for (let item = cursor.peek(); item && budget > 0; item = cursor.peek()) {
      const tokens = this.strategy.count(item.text);
      if (tokens <= budget) {
        core.push(fragmentOf(out.append(item.source, item.text)));
        budget -= tokens;
        cursor.advance();
        continue;
      }

      const { prefix, remainder } = this.strategy.takePrefix(item.text, budget, core.length === 0);
      if (!prefix) break;

      core.push(fragmentOf(out.append(item.source, prefix)));
      if (remainder.trim()) {
        cursor.replaceHead(remainder);
        endsBySplit = true;
        break;
      }
      budget -= this.strategy.count(prefix);
      cursor.advance();
    }

    if (core.length === 0) return null;

    return {
      chunk: this.assemble(core, prevWindow, hierarchy, page, startsMidBlock || endsBySplit),
      reserve,
    };
  }

  private assemble(
    core: BlockFragment[],
    prevWindow: OverlapWindow,
    hierarchy: ResolvedHierarchy,
    page: PageInfo,
    partial: boolean,
  ): Chunk {
    const { idPrefix } = this.options;
    const first = core[0];
    const last = core[core.length - 1];
    const coreIndices = core.map((f) => f.blockIndex);
    const prevIndices = prevWindow.indices.filter((i) => !coreIndices.includes(i));

    const normalizedText = core.map((f) => f.text).join(" ");
    const fullText = [prevWindow.text, normalizedText].filter((t) => t.length > 0).join(" ");

    const chunkIdBase = chunkId(idPrefix, page.pageId, first.blockIndex, last.blockIndex);
    const id = partial
      ? chunkId(idPrefix, page.pageId, first.blockIndex, last.blockIndex, {
          start: first.textOffset,
          end: first.textOffset + normalizedText.length,
        })
      : chunkIdBase;

    return {
      chunkId: id,
      pageId: page.pageId,
      spaceKey: page.spaceKey,
      pageTitle: page.title,
      pageVersion: page.version,
      lastModified: page.lastModified,
      blockIndices: unique([...prevIndices, ...coreIndices]),
      coreBlockIndices: coreIndices,
      overlapPrevBlockIndices: prevIndices,
      overlapNextBlockIndices: [],
      fullHeadingHierarchy: hierarchy.full,
      textHeadingHierarchy: hierarchy.truncated,
      nearestHeadingId: hierarchy.nearestHeadingHtmlId,
      normalizedText,
      overlapPrevText: prevWindow.text,
      overlapNextText: "",
      fullText,
      embeddingText: buildEmbeddingText(page.title, hierarchy.truncated, fullText, this.options),
      tokenCount: 0,
      xpathStart: first.xpath,
      cssSelectorStart: first.cssSelector,
      textOffsetStart: first.textOffset,
      textLength: normalizedText.length,
      navigationUrl: buildNavigationUrl(page.url, first.htmlId, hierarchy.nearestHeadingHtmlId, normalizedText),
      highlight: {
        textFragment: normalizedText.slice(0, TEXT_FRAGMENT_LENGTH),
        blockType: first.blockType,
        textOffset: first.textOffset,
        firstBlockHtmlId: first.htmlId,
        nearestHeadingHtmlId: hierarchy.nearestHeadingHtmlId,
        chunkIdBase,
        coreFragments: core,
        overlapPrevFragments: prevWindow.fragments,
        overlapNextFragments: [],
      },
    };
  }

  private applyNextOverlap(chunks: Chunk[], reserves: readonly number[], pageTitle: string): void {
    for (let i = 0; i < chunks.length - 1; i++) {
      const limit = Math.min(this.options.chunkOverlap, reserves[i]);
      if (limit <= 0) continue;

      const current = chunks[i];
      const window = this.collectOverlap(chunks[i + 1].highlight.coreFragments, false, limit);
      if (!window.text) continue;

      const nextIndices = window.indices.filter((idx) => !current.coreBlockIndices.includes(idx));
      current.overlapNextBlockIndices = nextIndices;
      current.overlapNextText = window.text;
      current.highlight.overlapNextFragments = window.fragments;
      current.blockIndices = unique([...current.blockIndices, ...nextIndices]);

      // Rebuilt from the three text parts, so partial-block windows stay exact.
      current.fullText = [current.overlapPrevText, current.normalizedText, current.overlapNextText]
        .filter((t) => t.length > 0)
        .join(" ");
      current.embeddingText = buildEmbeddingText(
        pageTitle,
        current.textHeadingHierarchy,
        current.fullText,
        this.options,
      );
    }
  }

  /**
   * Up to `limit` tokens of text taken from the end (`fromEnd`) or the start of a neighbour's
   * core fragments. A fragment that does not fit whole contributes a sentence-bounded (or,
   * failing that, word-bounded) slice and ends the window.
   */
  private collectOverlap(
    fragments: readonly BlockFragment[],
    fromEnd: boolean,
    limit: number,
  ): OverlapWindow {
    const ordered = fromEnd ? [...fragments].reverse() : [...fragments];
    const picked: BlockFragment[] = [];
    let remaining = limit;

    for (const fragment of ordered) {
      if (remaining <= 0) break;
      const tokens = this.strategy.count(fragment.text);
      if (tokens <= remaining) {
        picked.push(fragment);
        remaining -= tokens;
        continue;
      }

      const part = fromEnd
        ? this.strategy.takeSuffix(fragment.text, remaining)
        : this.strategy.takePrefix(fragment.text, remaining, true).prefix;
      if (part && this.strategy.count(part) <= remaining) {
        picked.push(sliceFragment(fragment, part, fromEnd));
      }
      break;
    }

    if (picked.length === 0) return NO_OVERLAP;
    if (fromEnd) picked.reverse();

    const text = picked.map((f) => f.text).join(" ");
    return {
      indices: unique(picked.map((f) => f.blockIndex)),
      text,
      tokens: this.strategy.count(text),
      fragments: picked,
    };
  }
}
