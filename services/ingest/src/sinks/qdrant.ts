import type { Chunk, ContentBlock, PageMetadata } from "../chunking/types.js";
import type { EmbeddingClient } from "../embeddings/index.js";
import { SinkError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { QdrantClient } from "../qdrant/index.js";
import type { ResultSink } from "./types.js";

/**
 * Replaces a page's points in a Qdrant collection: previous points are deleted, then every
 * chunk's `embeddingText` is embedded and upserted with the chunk as payload.
 */
export class QdrantSink implements ResultSink {
  readonly name = "qdrant";
  totalChunks = 0;

  constructor(
    private readonly qdrant: QdrantClient,
    private readonly embedding: EmbeddingClient,
    readonly outputPath: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  async open(): Promise<void> {
    await this.qdrant.initCollection();
  }

  async writePage(
    page: PageMetadata,
    _blocks: readonly ContentBlock[],
    chunks: readonly Chunk[],
  ): Promise<void> {
    try {
      await this.qdrant.deletePageChunks(page.pageId);
      if (chunks.length === 0) return;

      const vectors = await this.embedding.embed(chunks.map((c) => c.embeddingText));
      await this.qdrant.upsertChunks(chunks, vectors);
    } catch (error) {
      throw new SinkError(this.name, `Failed to index page ${page.pageId}`, { cause: error });
    }
    this.totalChunks += chunks.length;
    this.logger.debug("Indexed page", { pageId: page.pageId, chunks: chunks.length });
  }

  async close(): Promise<void> {
    this.logger.info("Qdrant sink closed", { collection: this.outputPath, chunks: this.totalChunks });
  }
}
