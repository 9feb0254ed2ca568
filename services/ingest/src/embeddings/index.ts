import { CohereEmbedding } from "./cohere.js";
import { OpenAIEmbedding } from "./openai.js";
import type { EmbeddingClient, EmbeddingConfig, EmbeddingProvider } from "./types.js";
import { VoyageEmbedding } from "./voyage.js";

export type { EmbeddingClient, EmbeddingConfig, EmbeddingProvider } from "./types.js";
export { CohereEmbedding, OpenAIEmbedding, VoyageEmbedding };

export interface CreateEmbeddingClientOptions extends EmbeddingConfig {
  provider: EmbeddingProvider;
}

export function createEmbeddingClient(options: CreateEmbeddingClientOptions): EmbeddingClient {
  const { provider, ...config } = options;
  switch (provider) {
    case "openai":
      return new OpenAIEmbedding(config);
    case "voyage":
      return new VoyageEmbedding(config);
    case "cohere":
      return new CohereEmbedding(config);
    default: {
      const unknown: never = provider;
      throw new Error(`Unknown embedding provider: ${String(unknown)}`);
    }
  }
}
