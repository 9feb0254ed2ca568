import { z } from "zod";
import { inBatches, postJson } from "./http.js";
import type { EmbeddingClient, EmbeddingConfig } from "./types.js";

const VoyageResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().optional(), embedding: z.array(z.number()) })),
});

export class VoyageEmbedding implements EmbeddingClient {
  readonly model: string;
  readonly dimensions: number;
  private readonly baseUrl = "https://api.voyageai.com/v1";

  private static readonly MAX_BATCH = 128;

  constructor(private readonly config: EmbeddingConfig) {
    this.model = config.model || "voyage-2";
    this.dimensions = config.dimensions ?? 1024;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return inBatches(texts, VoyageEmbedding.MAX_BATCH, async (batch) => {
      const raw = await postJson("Voyage", `${this.baseUrl}/embeddings`, this.config, {
        model: this.model,
        input: batch,
        input_type: "document",
      });
      return VoyageResponseSchema.parse(raw).data.map((item) => item.embedding);
    });
  }

  async embedSingle(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    return embedding;
  }
}
