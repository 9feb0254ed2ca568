import type { Tracer } from "@opentelemetry/api";
import { withSpan } from "@wiki-chunker/common";
import { processPage } from "../chunking/index.js";
import type { ExtractionOptions } from "../chunking/html-extractor.js";
import {
  DEFAULT_STRATEGY_SETTINGS,
  StrategyCache,
  type StrategySettings,
} from "../chunking/tokenizer.js";
import type { ChunkingOptions, PageMetadata, PageResult } from "../chunking/types.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { ResultSink } from "../sinks/types.js";
import { getTracer } from "../tracing.js";
import { BoundedQueue } from "../utils/bounded-queue.js";
import { measureAsync } from "../utils/timer.js";
import type { IngestResult, PageSource } from "./types.js";

export interface IngestOptions {
  concurrency?: number;
  queueSize?: number;
  chunking?: Partial<ChunkingOptions>;
  tokenizer?: StrategySettings;
  extraction?: Partial<ExtractionOptions>;
  /** Process exactly these pages instead of listing the source. */
  pageIds?: readonly string[];
  logger?: Logger;
  tracer?: Tracer;
  showMetrics?: boolean;
}

type PageOutcome =
  | { kind: "done"; page: PageMetadata; result: PageResult }
  | { kind: "failed"; pageId: string; error: string };

async function* fromList(ids: readonly string[]): AsyncGenerator<string> {
  yield* ids;
}

/**
 * Fetches and processes pages with `concurrency` workers and hands every result to
 * `sink` through a bounded queue drained by a single writer. Per-page failures are
 * logged and counted; the run goes on.
 */
export async function runIngest(
  source: PageSource,
  sink: ResultSink,
  options: IngestOptions = {},
): Promise<IngestResult> {
  const {
    concurrency = 4,
    queueSize = 16,
    tokenizer = DEFAULT_STRATEGY_SETTINGS,
    logger = silentLogger,
    tracer = getTracer(),
  } = options;

  const result: IngestResult = {
    pagesProcessed: 0,
    pagesEmpty: 0,
    pagesFailed: 0,
    chunksCreated: 0,
    blocksWritten: 0,
    errors: [],
  };

  return withSpan(tracer, "ingest.run", { source: source.name, concurrency }, async (span) => {
    const startedAt = new Date();
    const ids = (options.pageIds ? fromList(options.pageIds) : source.listPageIds())[
      Symbol.asyncIterator
    ]();
    const queue = new BoundedQueue<PageOutcome>(queueSize);

    async function processOne(pageId: string, strategies: StrategyCache): Promise<PageOutcome> {
      return withSpan<PageOutcome>(tracer, "ingest.page", { pageId }, async (pageSpan) => {
        try {
          const page = await measureAsync("fetch", () => source.getPage(pageId), {
            logger,
            showMetrics: options.showMetrics,
            meta: { pageId },
          });
          if (!page) return { kind: "failed", pageId, error: "Page not found" };

          const pageResult = processPage(page.metadata, page.html, {
            strategy: strategies.get(tokenizer),
            chunking: options.chunking,
            extraction: options.extraction,
            logger,
            showMetrics: options.showMetrics,
          });
          pageSpan.setAttribute("chunks", pageResult.chunks.length);
          return { kind: "done", page: page.metadata, result: pageResult };
        } catch (error) {
          if (error instanceof Error) pageSpan.recordException(error);
          return { kind: "failed", pageId, error: errorMessage(error) };
        }
      });
    }

    async function work(): Promise<void> {
      // Strategies may cache tokenizer state, so every worker owns one.
      const strategies = new StrategyCache(logger);
      for (;;) {
        const next = await ids.next();
        if (next.done) return;
        await queue.push(await processOne(next.value, strategies));
      }
    }

    async function write(): Promise<void> {
      for await (const outcome of queue) {
        if (outcome.kind === "failed") {
          logger.error("Page failed", { pageId: outcome.pageId, error: outcome.error });
          result.pagesFailed++;
          result.errors.push({ pageId: outcome.pageId, error: outcome.error });
          continue;
        }

        const { page, result: pageResult } = outcome;
        try {
          await sink.writePage(page, pageResult.blocks, pageResult.chunks);
        } catch (error) {
          logger.error("Sink write failed", { pageId: page.pageId, error: errorMessage(error) });
          result.pagesFailed++;
          result.errors.push({ pageId: page.pageId, error: errorMessage(error) });
          continue;
        }

        result.pagesProcessed++;
        result.chunksCreated += pageResult.chunks.length;
        result.blocksWritten += pageResult.blocks.length;
        if (pageResult.chunks.length === 0) result.pagesEmpty++;
        logger.info("Page written", {
          pageId: page.pageId,
          title: page.title,
          chunks: pageResult.chunks.length,
        });
      }
    }

    await sink.open();
    logger.info("Ingest started", { source: source.name, output: sink.outputPath, concurrency });

    const writeState: { failed: boolean; error?: unknown } = { failed: false };
    const writer = write().catch((error: unknown) => {
      writeState.failed = true;
      writeState.error = error;
      // Unblocks workers waiting on a full queue.
      queue.close();
    });
    const workers = await Promise.allSettled(Array.from({ length: concurrency }, () => work()));
    queue.close();
    await writer;
    if (writeState.failed) throw writeState.error;

    const finishedAt = new Date();
    await sink.close({
      source: source.name,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      ...result,
    });

    span.setAttributes({
      pages_processed: result.pagesProcessed,
      pages_failed: result.pagesFailed,
      chunks_created: result.chunksCreated,
    });

    // Listing failures are not per-page: they abort the run once the sink is closed.
    const failure = workers.find((w): w is PromiseRejectedResult => w.status === "rejected");
    if (failure) throw failure.reason;

    logger.info("Ingest finished", { ...result, errors: result.errors.length });
    return result;
  });
}
