import { withRetry } from "../utils/retry.js";
import type { EmbeddingConfig } from "./types.js";

/**
 * POSTs `body` as JSON with bearer auth and retries 429/5xx with backoff.
 * Non-2xx responses throw with the provider name and status in the message.
 */
export async function postJson(
  provider: string,
  url: string,
  config: EmbeddingConfig,
  body: unknown,
): Promise<unknown> {
  return withRetry(
    async () => {
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${config.apiKey}`,
        },
        body: JSON.stringify(body),
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`${provider} embedding failed (${response.status}): ${error}`);
      }
      return response.json();
    },
    { minDelayMs: config.retryDelayMs?.min, maxDelayMs: config.retryDelayMs?.max },
  );
}

/** Runs `embed` over consecutive slices of at most `maxBatch` texts. */
export async function inBatches(
  texts: string[],
  maxBatch: number,
  embed: (batch: string[]) => Promise<number[][]>,
): Promise<number[][]> {
  const results: number[][] = [];
  for (let i = 0; i < texts.length; i += maxBatch) {
    results.push(...(await embed(texts.slice(i, i + maxBatch))));
  }
  return results;
}
