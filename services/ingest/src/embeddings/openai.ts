import { z } from "zod";
import { inBatches, postJson } from "./http.js";
import type { EmbeddingClient, EmbeddingConfig } from "./types.js";

const OpenAIResponseSchema = z.object({
  data: z.array(z.object({ index: z.number(), embedding: z.array(z.number()) })),
});

export class OpenAIEmbedding implements EmbeddingClient {
  readonly model: string;
  readonly dimensions: number;
  private readonly baseUrl = "https://api.openai.com/v1";

  // OpenAI accepts at most 2048 inputs per request
  private static readonly MAX_BATCH = 2048;

  constructor(private readonly config: EmbeddingConfig) {
    this.model = config.model || "text-embedding-3-small";
    this.dimensions = config.dimensions ?? 1536;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return inBatches(texts, OpenAIEmbedding.MAX_BATCH, async (batch) => {
      const raw = await postJson("OpenAI", `${this.baseUrl}/embeddings`, this.config, {
        model: this.model,
        input: batch,
        dimensions: this.dimensions,
      });
      const { data } = OpenAIResponseSchema.parse(raw);
      return [...data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    });
  }

  async embedSingle(text: string): Promise<number[]> {
    const [embedding] = await this.embed([text]);
    return embedding;
  }
}
