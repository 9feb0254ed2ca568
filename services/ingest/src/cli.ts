import { processPage, type PageResult } from "./chunking/index.js";
import { createTokenStrategy } from "./chunking/tokenizer.js";
import type { Config } from "./config.js";
import { ConfluenceClient } from "./confluence/client.js";
import { ConfigError } from "./errors.js";
import { LocalFileClient } from "./local/client.js";
import type { Logger } from "./logger.js";
import { runIngest, type IngestResult, type PageSource, type SourcePage } from "./pipeline/index.js";
import { createSink } from "./sinks/index.js";
import type { ResultSink } from "./sinks/types.js";

export type Source = "confluence" | "files";

export interface ParsedArgs {
  command: string;
  source: Source;
  /** Positional argument after the command (page id or file path). */
  target?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isSource(value: string): value is Source {
  return value === "confluence" || value === "files";
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  let command = "";
  let source: Source = "confluence";
  let target: string | undefined;

  let i = 0;
  while (i < args.length) {
    if (args[i] === "--source") {
      const val = args[i + 1] ?? "";
      if (!isSource(val)) {
        throw new UsageError(`Invalid --source value: ${val}. Must be confluence or files.`);
      }
      source = val;
      i += 2; // consume --source and its value
    } else {
      if (!command) {
        command = args[i];
      } else if (!target) {
        target = args[i];
      }
      i++;
    }
  }

  return { command, source, target };
}

export const HELP_TEXT = `
wiki-chunker - turn wiki pages into token-bounded, overlapping chunks

Commands:
  run               Process every page of the selected source into the configured sinks
  page <id>         Process one Confluence page and print its chunks as JSON
  file <path>       Process one local file and print its chunks as JSON
  help              Show this help

Options:
  --source <confluence|files>   Page source for "run" (default: confluence)

Main environment variables:
  CONFLUENCE_BASE_URL       Wiki base URL (required for the confluence source)
  CONFLUENCE_AUTH_TOKEN     Bearer token (or CONFLUENCE_USERNAME + CONFLUENCE_API_TOKEN)
  CONFLUENCE_PAGE_IDS       Comma-separated page ids; empty processes every page
  LOCAL_FILES_DIRECTORY     Directory scanned by the files source
  CHUNK_SIZE                Tokens per chunk (default: 512)
  CHUNK_OVERLAP             Overlap tokens between neighbouring chunks (default: 0)
  TOKEN_STRATEGY            simple or tiktoken (default: simple)
  OUTPUT_SINKS              Any of json,sqlite,qdrant (default: json)
  OUTPUT_DIR                Output directory (default: ./output)
  LOG_LEVEL                 debug, info, warn or error (default: info)

Examples:
  wiki-chunker run
  wiki-chunker run --source files
  wiki-chunker page 123456
  wiki-chunker file ./docs/guide.md
`;

export function createConfluenceClient(config: Config, logger: Logger): ConfluenceClient {
  if (!config.confluence) {
    throw new ConfigError("Confluence is not configured", ["set CONFLUENCE_BASE_URL"]);
  }
  return new ConfluenceClient({ ...config.confluence, logger });
}

export function createLocalFileClient(config: Config, logger: Logger): LocalFileClient {
  const { directory, extensions } = config.localFiles;
  if (!directory) {
    throw new ConfigError("Local files are not configured", ["set LOCAL_FILES_DIRECTORY"]);
  }
  return new LocalFileClient({ directory, extensions, logger });
}

function processSourcePage(page: SourcePage, config: Config, logger: Logger): PageResult {
  return processPage(page.metadata, page.html, {
    strategy: createTokenStrategy(config.tokenizer, logger),
    chunking: config.chunking,
    extraction: config.extraction,
    logger,
    showMetrics: config.showPerformanceMetrics,
  });
}

export interface RunDeps {
  source?: PageSource;
  sink?: ResultSink;
}

/** `run`: the whole source through the configured sinks. */
export async function handleRun(
  source: Source,
  config: Config,
  logger: Logger,
  deps: RunDeps = {},
): Promise<IngestResult> {
  const pageSource =
    deps.source ??
    (source === "files" ? createLocalFileClient(config, logger) : createConfluenceClient(config, logger));
  const pageIds = source === "confluence" && config.confluence?.pageIds.length
    ? config.confluence.pageIds
    : undefined;

  return runIngest(pageSource, deps.sink ?? createSink(config, logger), {
    concurrency: config.pipeline.concurrency,
    queueSize: config.pipeline.queueSize,
    chunking: config.chunking,
    tokenizer: config.tokenizer,
    extraction: config.extraction,
    pageIds,
    logger,
    showMetrics: config.showPerformanceMetrics,
  });
}

/** `page <id>`: one Confluence page. */
export async function handlePage(
  pageId: string | undefined,
  config: Config,
  logger: Logger,
  source: PageSource = createConfluenceClient(config, logger),
): Promise<PageResult> {
  if (!pageId) throw new UsageError("Usage: page <id>");
  const page = await source.getPage(pageId);
  if (!page) throw new UsageError(`Page ${pageId} not found`);
  return processSourcePage(page, config, logger);
}

/** `file <path>`: one local file, which need not be under LOCAL_FILES_DIRECTORY. */
export async function handleFile(
  path: string | undefined,
  config: Config,
  logger: Logger,
): Promise<PageResult> {
  if (!path) throw new UsageError("Usage: file <path>");
  const client = new LocalFileClient({
    directory: config.localFiles.directory ?? ".",
    extensions: config.localFiles.extensions,
    logger,
  });
  return processSourcePage(client.toSourcePage(await client.readFile(path)), config, logger);
}
