import { z } from "zod";
import { DEFAULT_BLOCK_TAGS, DEFAULT_EXCLUDED_TAGS } from "./chunking/html-extractor.js";
import { ChunkingOptionsFields } from "./chunking/options.js";
import { ConfigError } from "./errors.js";

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const ConfigSchema = z
  .object({
    // Optional: the files source runs without it
    confluence: z
      .object({
        baseUrl: z.string().url(),
        apiPrefix: z.string().default("/rest/api"),
        authToken: z.string().optional(),
        username: z.string().optional(),
        apiToken: z.string().optional(),
        pageIds: z.array(z.string()).default([]),
        spaces: z.array(z.string()).default([]),
        includeLabels: z.array(z.string()).default([]),
        excludeLabels: z.array(z.string()).default([]),
        pageListLimit: z.number().int().positive().default(100),
        timeoutMs: z.number().int().positive().default(30000),
        maxRetries: z.number().int().positive().default(3),
      })
      .optional(),

    pipeline: z.object({
      concurrency: z.number().int().positive().default(4),
      queueSize: z.number().int().positive().default(16),
    }),

    chunking: ChunkingOptionsFields,

    tokenizer: z.object({
      strategy: z.enum(["simple", "tiktoken"]).default("simple"),
      encoding: z.enum(["cl100k_base", "o200k_base"]).default("cl100k_base"),
      segmenter: z.enum(["simple", "intl"]).default("simple"),
    }),

    extraction: z.object({
      blockTags: z.array(z.string()).min(1),
      excludedTags: z.array(z.string()),
      excludedClasses: z.array(z.string()).default([]),
      excludedIds: z.array(z.string()).default([]),
    }),

    output: z.object({
      sinks: z.array(z.enum(["json", "sqlite", "qdrant"])).min(1),
      dir: z.string().default("./output"),
      prefix: z.string().default("wiki_chunks"),
      includeBlocks: z.boolean().default(false),
      sqlite: z.object({
        file: z.string().default("wiki_chunks.sqlite3"),
        table: z.string().regex(SQL_IDENTIFIER, "must be a SQL identifier").default("chunks"),
        payloadField: z.string().regex(SQL_IDENTIFIER, "must be a SQL identifier").default("payload"),
      }),
    }),

    // Required only by the qdrant sink
    embedding: z
      .object({
        provider: z.enum(["openai", "voyage", "cohere"]),
        apiKey: z.string().min(1),
        model: z.string().default("text-embedding-3-small"),
        dimensions: z.number().int().positive().default(1536),
      })
      .optional(),

    qdrant: z.object({
      url: z.string().default("http://localhost:6333"),
      collectionName: z.string().default("wiki-chunks"),
      apiKey: z.string().optional(),
    }),

    localFiles: z.object({
      directory: z.string().optional(),
      extensions: z.array(z.string()).default([".html", ".htm", ".md", ".txt"]),
    }),

    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    showPerformanceMetrics: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    if (config.chunking.chunkOverlap >= config.chunking.chunkSize) {
      ctx.addIssue({
        code: "custom",
        path: ["chunking", "chunkOverlap"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (config.output.sinks.includes("qdrant") && !config.embedding) {
      ctx.addIssue({
        code: "custom",
        path: ["embedding"],
        message: "the qdrant sink needs EMBEDDING_PROVIDER and EMBEDDING_API_KEY",
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;
export type SinkName = Config["output"]["sinks"][number];

type Env = Record<string, string | undefined>;

function list(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(",").map((v) => v.trim()).filter(Boolean);
}

function int(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function flag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return ["true", "1", "yes"].includes(value.trim().toLowerCase());
}

function text(value: string | undefined): string | undefined {
  return value || undefined;
}

/** Reads the configuration from `env`. Call dotenv first to pick up a `.env` file. */
export function loadConfig(env: Env = process.env): Config {
  const confluence = env.CONFLUENCE_BASE_URL
    ? {
        baseUrl: env.CONFLUENCE_BASE_URL,
        apiPrefix: text(env.CONFLUENCE_API_PREFIX),
        authToken: text(env.CONFLUENCE_AUTH_TOKEN),
        username: text(env.CONFLUENCE_USERNAME),
        apiToken: text(env.CONFLUENCE_API_TOKEN),
        pageIds: list(env.CONFLUENCE_PAGE_IDS),
        spaces: list(env.CONFLUENCE_SPACES),
        includeLabels: list(env.CONFLUENCE_INCLUDE_LABELS),
        excludeLabels: list(env.CONFLUENCE_EXCLUDE_LABELS),
        pageListLimit: int(env.CONFLUENCE_PAGE_LIST_LIMIT),
        timeoutMs: int(env.CONFLUENCE_TIMEOUT_MS),
        maxRetries: int(env.CONFLUENCE_MAX_RETRIES),
      }
    : undefined;

  const embedding = env.EMBEDDING_PROVIDER
    ? {
        provider: env.EMBEDDING_PROVIDER,
        apiKey: env.EMBEDDING_API_KEY,
        model: text(env.EMBEDDING_MODEL),
        dimensions: int(env.EMBEDDING_DIMENSIONS),
      }
    : undefined;

  const result = ConfigSchema.safeParse({
    confluence,
    pipeline: {
      concurrency: int(env.CONCURRENCY),
      queueSize: int(env.QUEUE_SIZE),
    },
    chunking: {
      chunkSize: int(env.CHUNK_SIZE),
      chunkOverlap: int(env.CHUNK_OVERLAP),
      maxHeadingLevels: int(env.MAX_HEADING_LEVELS),
      includePageTag: flag(env.INCLUDE_PAGE_TAG),
      includeSectionTag: flag(env.INCLUDE_SECTION_TAG),
      idPrefix: text(env.ID_PREFIX),
    },
    tokenizer: {
      strategy: text(env.TOKEN_STRATEGY),
      encoding: text(env.TIKTOKEN_ENCODING),
      segmenter: text(env.SENTENCE_SEGMENTER),
    },
    extraction: {
      blockTags: list(env.BLOCK_TAGS) ?? [...DEFAULT_BLOCK_TAGS],
      excludedTags: list(env.EXCLUDED_TAGS) ?? [...DEFAULT_EXCLUDED_TAGS],
      excludedClasses: list(env.EXCLUDED_CLASSES),
      excludedIds: list(env.EXCLUDED_IDS),
    },
    output: {
      sinks: list(env.OUTPUT_SINKS) ?? ["json"],
      dir: text(env.OUTPUT_DIR),
      prefix: text(env.OUTPUT_PREFIX),
      includeBlocks: flag(env.INCLUDE_BLOCKS_IN_OUTPUT),
      sqlite: {
        file: text(env.SQLITE_FILE),
        table: text(env.SQLITE_TABLE),
        payloadField: text(env.SQLITE_PAYLOAD_FIELD),
      },
    },
    embedding,
    qdrant: {
      url: text(env.QDRANT_URL),
      collectionName: text(env.QDRANT_COLLECTION),
      apiKey: text(env.QDRANT_API_KEY),
    },
    localFiles: {
      directory: text(env.LOCAL_FILES_DIRECTORY),
      extensions: list(env.LOCAL_FILES_EXTENSIONS),
    },
    logLevel: text(env.LOG_LEVEL),
    showPerformanceMetrics: flag(env.SHOW_PERFORMANCE_METRICS),
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.map(String).join(".")}: ${issue.message}`,
    );
    throw new ConfigError("Invalid configuration", issues);
  }
  return result.data;
}
