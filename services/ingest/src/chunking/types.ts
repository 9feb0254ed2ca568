/** Page-level data handed to the chunking core by a page source. */
export interface PageMetadata {
  pageId: string;
  title: string;
  spaceKey: string;
  spaceName: string;
  version: number;
  /** Opaque timestamp string, passed through unchanged. */
  lastModified: string;
  /** Canonical absolute URL of the rendered page. */
  url: string;
  labels: string[];
  /** Breadcrumb path (titles of ancestor pages). */
  ancestors: string[];
}

/**
 * Minimal semantic unit of a page: a paragraph, a list item, a table row, a heading...
 * Indices are contiguous from 0 within one page snapshot and `id` is derived from
 * the page id and the index only.
 */
export interface ContentBlock {
  index: number;
  id: string;
  /** Source tag name ("p", "li", "tr", "h2", ...). */
  blockType: string;
  text: string;
  xpath: string;
  cssSelector: string;
  /** Running character offset into the page's concatenated block text. */
  textOffset: number;
  textLength: number;
  /** Id of the nearest enclosing heading block. A lookup key, never an owning reference. */
  parentHeadingId: string | null;
  htmlId: string | null;
}

export interface HeadingInfo {
  level: number;
  text: string;
  blockId: string;
  blockIndex: number;
  htmlId: string | null;
}

/** Exact slice of one block that ended up in a chunk, for UI highlighting. */
export interface BlockFragment {
  blockIndex: number;
  blockId: string;
  blockType: string;
  xpath: string;
  cssSelector: string;
  htmlId: string | null;
  /** Absolute page offset of the fragment (block offset + fragmentStart). */
  textOffset: number;
  textLength: number;
  /** Character range inside the block text. */
  fragmentStart: number;
  fragmentEnd: number;
  text: string;
}

export interface HighlightMetadata {
  /** First 100 characters of the chunk's own text. */
  textFragment: string;
  blockType: string;
  textOffset: number;
  firstBlockHtmlId: string | null;
  nearestHeadingHtmlId: string | null;
  /** Chunk id without the `@start-end` suffix. */
  chunkIdBase: string;
  coreFragments: BlockFragment[];
  overlapPrevFragments: BlockFragment[];
  overlapNextFragments: BlockFragment[];
}

export interface Chunk {
  chunkId: string;
  pageId: string;
  spaceKey: string;
  pageTitle: string;
  pageVersion: number;
  lastModified: string;

  /** Previous-overlap, core and next-overlap indices in reading order, without duplicates. */
  blockIndices: number[];
  coreBlockIndices: number[];
  overlapPrevBlockIndices: number[];
  overlapNextBlockIndices: number[];

  /** Headings from least to most important, e.g. ["Setup", "Install", "Guide"]. */
  fullHeadingHierarchy: string[];
  /** The first `maxHeadingLevels` entries of the full hierarchy. */
  textHeadingHierarchy: string[];
  /** HTML id of the nearest heading, when it has one. */
  nearestHeadingId: string | null;

  normalizedText: string;
  overlapPrevText: string;
  overlapNextText: string;
  fullText: string;
  embeddingText: string;
  /** Token count of `embeddingText` under the strategy that built the chunk. */
  tokenCount: number;

  xpathStart: string;
  cssSelectorStart: string;
  textOffsetStart: number;
  textLength: number;
  navigationUrl: string;
  highlight: HighlightMetadata;
}

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
  maxHeadingLevels: number;
  includePageTag: boolean;
  includeSectionTag: boolean;
  idPrefix: string;
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  chunkSize: 512,
  chunkOverlap: 0,
  maxHeadingLevels: 2,
  includePageTag: true,
  includeSectionTag: true,
  idPrefix: "WIKI",
};

export interface PageResult {
  chunks: Chunk[];
  blocks: ContentBlock[];
  headings: HeadingInfo[];
}
