import type { Chunk, ContentBlock, PageMetadata } from "../chunking/types.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { ResultSink, RunMetadata } from "./types.js";

/**
 * Fans every call out to several sinks. A failing sink does not stop the others; the first
 * failure is rethrown once all of them have been called.
 */
export class CompositeSink implements ResultSink {
  readonly name = "composite";

  constructor(
    private readonly sinks: readonly ResultSink[],
    private readonly logger: Logger = silentLogger,
  ) {
    if (sinks.length === 0) throw new Error("CompositeSink requires at least one sink");
  }

  get outputPath(): string {
    return this.sinks.map((s) => s.outputPath).join(" | ");
  }

  async open(): Promise<void> {
    for (const sink of this.sinks) await sink.open();
  }

  async writePage(
    page: PageMetadata,
    blocks: readonly ContentBlock[],
    chunks: readonly Chunk[],
  ): Promise<void> {
    await this.each("writePage", (sink) => sink.writePage(page, blocks, chunks));
  }

  async close(metadata?: RunMetadata): Promise<void> {
    await this.each("close", (sink) => sink.close(metadata));
  }

  private async each(action: string, call: (sink: ResultSink) => Promise<void>): Promise<void> {
    const errors: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        await call(sink);
      } catch (error) {
        this.logger.error("Sink failed", { sink: sink.name, action, error: errorMessage(error) });
        errors.push(error);
      }
    }
    if (errors.length > 0) throw errors[0];
  }
}
