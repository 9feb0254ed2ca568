import type { Chunk, ContentBlock, PageMetadata } from "../chunking/types.js";

export type RunMetadata = Record<string, unknown>;

/**
 * Receives the result of one page at a time. Calls are serialized by the pipeline's
 * single writer, so implementations need no locking.
 */
export interface ResultSink {
  readonly name: string;
  /** Human-readable location of the output, for logs. */
  readonly outputPath: string;
  open(): Promise<void>;
  writePage(page: PageMetadata, blocks: readonly ContentBlock[], chunks: readonly Chunk[]): Promise<void>;
  close(metadata?: RunMetadata): Promise<void>;
}
