/** Invalid configuration. Raised before any page is processed. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export class ConfluenceApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    body: string,
  ) {
    super(`Confluence API error (${status}) for ${url}: ${body.slice(0, 200)}`);
    this.name = "ConfluenceApiError";
  }
}

export class SinkError extends Error {
  constructor(
    public readonly sink: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${sink}] ${message}`, options);
    this.name = "SinkError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
