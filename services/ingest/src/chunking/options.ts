import { z } from "zod";
import { ConfigError } from "../errors.js";
import { DEFAULT_CHUNKING_OPTIONS, type ChunkingOptions } from "./types.js";

const defaults = DEFAULT_CHUNKING_OPTIONS;

/** Chunking fields with their defaults; shared with the environment config. */
export const ChunkingOptionsFields = z.object({
  chunkSize: z.number().int().positive().default(defaults.chunkSize),
  chunkOverlap: z.number().int().nonnegative().default(defaults.chunkOverlap),
  maxHeadingLevels: z.number().int().min(1).default(defaults.maxHeadingLevels),
  includePageTag: z.boolean().default(defaults.includePageTag),
  includeSectionTag: z.boolean().default(defaults.includeSectionTag),
  idPrefix: z.string().min(1).default(defaults.idPrefix),
});

export const ChunkingOptionsSchema = ChunkingOptionsFields.refine(
  (options) => options.chunkOverlap < options.chunkSize,
  { path: ["chunkOverlap"], message: "must be smaller than chunkSize" },
);

/** Fills defaults and rejects settings no page could be chunked with. */
export function resolveChunkingOptions(options: Partial<ChunkingOptions> = {}): ChunkingOptions {
  const result = ChunkingOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigError(
      "Invalid chunking options",
      result.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}
