import type { z } from "zod";
import type { PageMetadata } from "../chunking/types.js";
import { ConfluenceApiError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { PageSource, SourcePage } from "../pipeline/types.js";
import { withRetry } from "../utils/retry.js";
import {
  ConfluenceContentListSchema,
  ConfluencePageSchema,
  type ConfluencePage,
  type LabelFilter,
} from "./types.js";

export interface ConfluenceClientConfig extends LabelFilter {
  baseUrl: string;
  apiPrefix?: string;
  /** Sent as a bearer token. Takes precedence over basic credentials. */
  authToken?: string;
  username?: string;
  apiToken?: string;
  /** Restrict listing to these space keys. Empty lists every page. */
  spaces?: readonly string[];
  pageListLimit?: number;
  timeoutMs?: number;
  maxRetries?: number;
  /** Backoff range for transient failures. */
  retryDelayMs?: { min: number; max: number };
  logger?: Logger;
}

const PAGE_EXPAND = ["body.view", "body.storage", "version", "space", "ancestors", "metadata.labels"].join(",");

function authorization(config: ConfluenceClientConfig): string | null {
  if (config.authToken) {
    return /^(bearer|basic)\s/i.test(config.authToken) ? config.authToken : `Bearer ${config.authToken}`;
  }
  if (config.username && config.apiToken) {
    const credentials = Buffer.from(`${config.username}:${config.apiToken}`).toString("base64");
    return `Basic ${credentials}`;
  }
  return null;
}

function labelsOf(item: { metadata?: ConfluencePage["metadata"] }): string[] {
  return item.metadata?.labels?.results.map((l) => l.name) ?? [];
}

/** Confluence REST v1 page source. */
export class ConfluenceClient implements PageSource {
  readonly name = "confluence";
  private readonly baseUrl: string;
  private readonly apiPrefix: string;
  private readonly authHeader: string | null;
  private readonly logger: Logger;

  constructor(private readonly config: ConfluenceClientConfig) {
    // Remove trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiPrefix = `/${(config.apiPrefix ?? "/rest/api").replace(/^\/+|\/+$/g, "")}`;
    this.authHeader = authorization(config);
    this.logger = config.logger ?? silentLogger;
  }

  private async fetch<T>(
    endpoint: string,
    params: Record<string, string | number>,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const query = new URLSearchParams(
      Object.entries(params).map(([k, v]): [string, string] => [k, String(v)]),
    );
    const url = `${this.baseUrl}${this.apiPrefix}${endpoint}?${query.toString()}`;
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.authHeader) headers.Authorization = this.authHeader;

    return withRetry(
      async () => {
        const response = await fetch(url, {
          headers,
          signal: AbortSignal.timeout(this.config.timeoutMs ?? 30000),
        });

        if (!response.ok) {
          throw new ConfluenceApiError(response.status, url, await response.text());
        }
        return schema.parse(await response.json());
      },
      {
        maxAttempts: this.config.maxRetries ?? 3,
        minDelayMs: this.config.retryDelayMs?.min ?? 1000,
        maxDelayMs: this.config.retryDelayMs?.max ?? 30000,
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn("Retrying Confluence request", {
            url,
            attempt,
            delayMs: Math.round(delayMs),
            error: error instanceof Error ? error.message : String(error),
          }),
      },
    );
  }

  /**
   * Ids of every page visible to the client, space by space, paginated with start/limit.
   * Pages rejected by the label filters are skipped.
   */
  async *listPageIds(): AsyncGenerator<string> {
    const spaces: ReadonlyArray<string | null> = this.config.spaces?.length ? this.config.spaces : [null];
    const limit = this.config.pageListLimit ?? 100;

    for (const spaceKey of spaces) {
      let start = 0;
      while (true) {
        const params: Record<string, string | number> = {
          type: "page",
          start,
          limit,
          expand: "metadata.labels",
        };
        if (spaceKey) params.spaceKey = spaceKey;

        const page = await this.fetch("/content", params, ConfluenceContentListSchema);
        for (const item of page.results) {
          if (this.shouldIncludePage(labelsOf(item), this.config)) yield item.id;
          else this.logger.debug("Skipping page (label filter)", { pageId: item.id });
        }

        if (page.results.length < limit) break;
        start += limit;
      }
    }
  }

  /** Rendered page with metadata, or null when the page does not exist. */
  async getPage(pageId: string): Promise<SourcePage | null> {
    let page: ConfluencePage;
    try {
      page = await this.fetch(
        `/content/${encodeURIComponent(pageId)}`,
        { expand: PAGE_EXPAND },
        ConfluencePageSchema,
      );
    } catch (error) {
      if (error instanceof ConfluenceApiError && error.status === 404) {
        this.logger.warn("Page not found", { pageId });
        return null;
      }
      throw error;
    }

    // Rendered HTML first, raw storage format as fallback
    const html = page.body?.view?.value || page.body?.storage?.value || "";
    return { metadata: this.extractMetadata(page), html };
  }

  extractMetadata(page: ConfluencePage): PageMetadata {
    const webui = page._links?.webui;
    let url = `${this.baseUrl}/pages/viewpage.action?pageId=${page.id}`;
    if (webui) url = /^https?:\/\//.test(webui) ? webui : `${this.baseUrl}${webui}`;

    return {
      pageId: page.id,
      title: page.title,
      spaceKey: page.space?.key ?? "",
      spaceName: page.space?.name ?? "",
      version: page.version?.number ?? 1,
      lastModified: page.version?.when ?? "",
      url,
      labels: labelsOf(page),
      ancestors: page.ancestors?.map((a) => a.title) ?? [],
    };
  }

  /**
   * Check if a page should be included based on label filters
   */
  shouldIncludePage(labels: readonly string[], filter: LabelFilter): boolean {
    // Check exclude labels first
    const { excludeLabels = [], includeLabels = [] } = filter;
    if (labels.some((label) => excludeLabels.includes(label))) return false;

    // If include labels specified, page must have at least one
    if (includeLabels.length > 0) return labels.some((label) => includeLabels.includes(label));

    return true;
  }
}
