import { z } from "zod";
import { inBatches, postJson } from "./http.js";
import type { EmbeddingClient, EmbeddingConfig } from "./types.js";

const CohereResponseSchema = z.object({
  embeddings: z.object({ float: z.array(z.array(z.number())) }),
});

export class CohereEmbedding implements EmbeddingClient {
  readonly model: string;
  readonly dimensions: number;
  private readonly baseUrl = "https://api.cohere.com/v2";

  // Cohere's max texts per request
  private static readonly MAX_BATCH = 96;

  constructor(private readonly config: EmbeddingConfig) {
    this.model = config.model || "embed-multilingual-v3.0";
    this.dimensions = config.dimensions ?? 1024;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return inBatches(texts, CohereEmbedding.MAX_BATCH, async (batch) => {
      const raw = await postJson("Cohere", `${this.baseUrl}/embed`, this.config, {
        model: this.model,
        texts: batch,
        input_type: "search_document",
        embedding_types: ["float"],
      });
      return CohereResponseSchema.parse(raw).embeddings.float;
    });
  }

  async embedSingle(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    return embedding;
  }
}
