import { createHash } from "node:crypto";
import { QdrantClient as QdrantSDK } from "@qdrant/js-client-rest";
import type { Chunk } from "../chunking/types.js";
import { silentLogger, type Logger } from "../logger.js";

export interface QdrantConfig {
  url: string;
  collectionName: string;
  apiKey?: string;
  vectorSize: number;
  logger?: Logger;
}

const UPSERT_BATCH = 100;

/** Deterministic UUID (md5 based) for a chunk id, so re-runs overwrite the same point. */
export function pointId(chunkId: string): string {
  const hex = createHash("md5").update(chunkId).digest("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export class QdrantClient {
  private readonly client: QdrantSDK;
  private readonly collectionName: string;
  private readonly vectorSize: number;
  private readonly logger: Logger;

  constructor(config: QdrantConfig) {
    this.client = new QdrantSDK({
      url: config.url,
      apiKey: config.apiKey,
    });
    this.collectionName = config.collectionName;
    this.vectorSize = config.vectorSize;
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Initialize collection if it doesn't exist
   */
  async initCollection(): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === this.collectionName);
    if (exists) return;

    await this.client.createCollection(this.collectionName, {
      vectors: {
        size: this.vectorSize,
        distance: "Cosine",
      },
    });

    // Payload indexes for filtering
    for (const field of ["pageId", "spaceKey"]) {
      await this.client.createPayloadIndex(this.collectionName, {
        field_name: field,
        field_schema: "keyword",
      });
    }

    this.logger.info("Created collection", { collection: this.collectionName });
  }

  /**
   * Upsert chunks with their embeddings; the whole chunk is stored as payload.
   */
  async upsertChunks(chunks: readonly Chunk[], embeddings: number[][]): Promise<void> {
    if (chunks.length !== embeddings.length) {
      throw new Error("Chunks and embeddings count mismatch");
    }

    const points = chunks.map((chunk, i) => ({
      id: pointId(chunk.chunkId),
      vector: embeddings[i],
      payload: { ...chunk },
    }));

    for (let i = 0; i < points.length; i += UPSERT_BATCH) {
      await this.client.upsert(this.collectionName, {
        wait: true,
        points: points.slice(i, i + UPSERT_BATCH),
      });
    }
  }

  /**
   * Delete all chunks for a specific page
   */
  async deletePageChunks(pageId: string): Promise<void> {
    await this.client.delete(this.collectionName, {
      wait: true,
      filter: {
        must: [
          {
            key: "pageId",
            match: { value: pageId },
          },
        ],
      },
    });
  }
}
