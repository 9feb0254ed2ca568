import type { PageMetadata } from "../chunking/types.js";

/** One page as delivered by a source: metadata plus its rendered HTML. */
export interface SourcePage {
  metadata: PageMetadata;
  html: string;
}

/** Where pages come from. Implemented by the Confluence client and the local file source. */
export interface PageSource {
  readonly name: string;
  listPageIds(): AsyncIterable<string>;
  /** `null` when the page no longer exists or is filtered out. */
  getPage(pageId: string): Promise<SourcePage | null>;
}

export interface PageError {
  pageId: string;
  error: string;
}

export interface IngestResult {
  pagesProcessed: number;
  /** Pages that were fetched but produced no chunks. */
  pagesEmpty: number;
  pagesFailed: number;
  chunksCreated: number;
  blocksWritten: number;
  errors: PageError[];
}
