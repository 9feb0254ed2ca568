export interface EmbeddingClient {
  /**
   * Generate embeddings for a batch of texts, in input order
   */
  embed(texts: string[]): Promise<number[][]>;

  embedSingle(text: string): Promise<number[]>;

  /**
   * Get the dimension of embeddings produced by this client
   */
  readonly dimensions: number;

  readonly model: string;
}

export interface EmbeddingConfig {
  apiKey: string;
  model: string;
  dimensions?: number;
  /** Backoff range for transient failures. */
  retryDelayMs?: { min: number; max: number };
}

export type EmbeddingProvider = "openai" | "voyage" | "cohere";
