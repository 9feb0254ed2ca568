import { silentLogger, type Logger } from "../logger.js";
import { measure } from "../utils/timer.js";
import { ChunkBuilder } from "./chunk-builder.js";
import { BlockExtractor, type ExtractionOptions } from "./html-extractor.js";
import { BlockNormalizer } from "./normalizer.js";
import { resolveChunkingOptions } from "./options.js";
import {
  createTokenStrategy,
  DEFAULT_STRATEGY_SETTINGS,
  type StrategySettings,
  type TokenStrategy,
} from "./tokenizer.js";
import type { ChunkingOptions, PageMetadata, PageResult } from "./types.js";

export { ChunkBuilder, buildNavigationUrl } from "./chunk-builder.js";
export {
  BlockExtractor,
  DEFAULT_BLOCK_TAGS,
  DEFAULT_EXCLUDED_TAGS,
  DEFAULT_EXTRACTION_OPTIONS,
} from "./html-extractor.js";
export type { ExtractionOptions, ExtractionResult } from "./html-extractor.js";
export { BlockNormalizer } from "./normalizer.js";
export type { NormalizedBlocks } from "./normalizer.js";
export { HeadingIndex, resolveHierarchy } from "./hierarchy.js";
export { buildEmbeddingText } from "./embedding-text.js";
export { blockId, chunkId, headingLevel } from "./ids.js";
export { resolveChunkingOptions } from "./options.js";
export {
  createTokenStrategy,
  DEFAULT_STRATEGY_SETTINGS,
  SimpleTokenStrategy,
  StrategyCache,
  TiktokenStrategy,
} from "./tokenizer.js";
export type {
  StrategySettings,
  TiktokenEncodingName,
  TokenStrategy,
  TokenStrategyName,
} from "./tokenizer.js";
export { createSentenceSegmenter } from "./sentences.js";
export type { SentenceSegmenter, SentenceSegmenterName } from "./sentences.js";
export type {
  BlockFragment,
  Chunk,
  ChunkingOptions,
  ContentBlock,
  HeadingInfo,
  HighlightMetadata,
  PageMetadata,
  PageResult,
} from "./types.js";
export { DEFAULT_CHUNKING_OPTIONS } from "./types.js";

export interface ProcessDeps {
  strategy: TokenStrategy;
  chunking?: Partial<ChunkingOptions>;
  extraction?: Partial<ExtractionOptions>;
  logger?: Logger;
  showMetrics?: boolean;
}

/** Extract, normalize and build one page. */
export function processPage(page: PageMetadata, html: string, deps: ProcessDeps): PageResult {
  const logger = (deps.logger ?? silentLogger).child({ pageId: page.pageId });
  const chunking = resolveChunkingOptions(deps.chunking);
  const timing = { logger, showMetrics: deps.showMetrics };

  const extractor = new BlockExtractor({ ...deps.extraction, idPrefix: chunking.idPrefix }, logger);
  const extracted = measure("extract", () => extractor.extract(html, page.pageId), timing);
  if (extracted.blocks.length === 0) {
    logger.warn("No content blocks extracted", { title: page.title });
    return { chunks: [], blocks: [], headings: [] };
  }

  const normalizer = new BlockNormalizer(deps.strategy, chunking, logger);
  const normalized = measure(
    "normalize",
    () => normalizer.normalize(extracted.blocks, extracted.headings, page),
    timing,
  );

  const builder = new ChunkBuilder(deps.strategy, chunking, logger);
  return measure(
    "build",
    () => builder.build(normalized.blocks, normalized.headings, page),
    timing,
  );
}

/** One-shot helper that builds its own token strategy. */
export function chunkHtml(
  html: string,
  metadata: PageMetadata,
  options: Partial<ChunkingOptions> & { strategy?: StrategySettings } = {},
): PageResult {
  const { strategy = DEFAULT_STRATEGY_SETTINGS, ...chunking } = options;
  return processPage(metadata, html, { strategy: createTokenStrategy(strategy), chunking });
}
