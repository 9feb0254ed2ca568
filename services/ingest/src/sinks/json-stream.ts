import { createReadStream, existsSync } from "node:fs";
import { appendFile, mkdir, open, rm, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import { createInterface } from "node:readline";
import type { Chunk, ContentBlock, PageMetadata } from "../chunking/types.js";
import { SinkError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { fileTimestamp, toPageInfo } from "./serialize.js";
import type { ResultSink, RunMetadata } from "./types.js";

export interface JsonStreamSinkOptions {
  outputDir: string;
  filePrefix?: string;
  includeBlocks?: boolean;
  /** Clock for the file name. */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Writes one JSON document `{chunks, pages, blocks?, metadata}` without holding the run in
 * memory: chunks are streamed into the open array, page records and blocks are staged in
 * JSONL sidecars and spliced in on close.
 */
export class JsonStreamSink implements ResultSink {
  readonly name = "json";
  readonly outputPath: string;
  private readonly pagesSidecar: string;
  private readonly blocksSidecar: string;
  private readonly includeBlocks: boolean;
  private readonly logger: Logger;
  private readonly outputDir: string;
  private file: FileHandle | null = null;
  private firstChunk = true;

  totalChunks = 0;
  totalBlocks = 0;
  totalPages = 0;

  constructor(options: JsonStreamSinkOptions) {
    const stamp = fileTimestamp((options.now ?? (() => new Date()))());
    this.outputDir = options.outputDir;
    this.outputPath = join(options.outputDir, `${options.filePrefix ?? "wiki_chunks"}_${stamp}.json`);
    this.pagesSidecar = this.outputPath.replace(/\.json$/, ".pages.jsonl");
    this.blocksSidecar = this.outputPath.replace(/\.json$/, ".blocks.jsonl");
    this.includeBlocks = options.includeBlocks ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  async open(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    this.file = await open(this.outputPath, "w");
    await this.file.write('{"chunks":[\n');
    this.logger.info("Streaming output", { path: this.outputPath });
  }

  async writePage(
    page: PageMetadata,
    blocks: readonly ContentBlock[],
    chunks: readonly Chunk[],
  ): Promise<void> {
    const file = this.requireOpen();

    await appendFile(this.pagesSidecar, `${JSON.stringify(toPageInfo(page))}\n`);
    this.totalPages++;

    for (const chunk of chunks) {
      await file.write(`${this.firstChunk ? "" : ",\n"}${JSON.stringify(chunk)}`);
      this.firstChunk = false;
      this.totalChunks++;
    }

    if (this.includeBlocks && blocks.length > 0) {
      const lines = blocks.map((b) => `${JSON.stringify({ pageId: page.pageId, ...b })}\n`);
      await appendFile(this.blocksSidecar, lines.join(""));
      this.totalBlocks += blocks.length;
    }
  }

  async close(metadata: RunMetadata = {}): Promise<void> {
    const file = this.file;
    if (!file) return;
    this.file = null;

    try {
      await file.write("\n]");
      await file.write(',\n"pages":[\n');
      await this.spliceSidecar(file, this.pagesSidecar);
      await file.write("\n]");

      if (this.includeBlocks) {
        await file.write(',\n"blocks":[\n');
        await this.spliceSidecar(file, this.blocksSidecar);
        await file.write("\n]");
      }

      await file.write(`,\n"metadata":${JSON.stringify(metadata)}\n}`);
    } finally {
      await file.close();
    }
    this.logger.info("Output file closed", { path: this.outputPath, chunks: this.totalChunks });
  }

  private requireOpen(): FileHandle {
    if (!this.file) throw new SinkError(this.name, "JsonStreamSink is not opened");
    return this.file;
  }

  /** Copies a JSONL sidecar into the open array, then deletes it. */
  private async spliceSidecar(file: FileHandle, path: string): Promise<void> {
    // No sidecar when nothing was staged.
    if (!existsSync(path)) return;

    let first = true;
    const input = createReadStream(path, { encoding: "utf-8" });
    for await (const raw of createInterface({ input, crlfDelay: Infinity })) {
      const line = raw.trim();
      if (!line) continue;
      await file.write(`${first ? "" : ",\n"}${line}`);
      first = false;
    }
    await rm(path, { force: true });
  }
}
