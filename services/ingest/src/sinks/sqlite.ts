import { mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import Database from "better-sqlite3";
import type { Chunk, ContentBlock, PageMetadata } from "../chunking/types.js";
import { SinkError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { ResultSink } from "./types.js";

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface SqliteSinkOptions {
  /** Database file path, or ":memory:". */
  filename: string;
  table?: string;
  payloadField?: string;
  logger?: Logger;
}

/**
 * One row per chunk: `chunk_id` primary key plus a JSON payload with every other chunk
 * field. Rows are upserted with INSERT OR REPLACE in one transaction per page, so a re-run
 * overwrites the previous version of each chunk.
 */
export class SqliteSink implements ResultSink {
  readonly name = "sqlite";
  readonly outputPath: string;
  private readonly table: string;
  private readonly payloadField: string;
  private readonly logger: Logger;
  private db: Database.Database | null = null;
  private insert: Database.Statement<[string, string]> | null = null;

  totalChunks = 0;
  totalPages = 0;

  constructor(options: SqliteSinkOptions) {
    this.outputPath = options.filename;
    this.table = options.table ?? "chunks";
    this.payloadField = options.payloadField ?? "payload";
    this.logger = options.logger ?? silentLogger;

    // Names are interpolated into SQL, so only plain identifiers are accepted.
    for (const name of [this.table, this.payloadField]) {
      if (!SQL_IDENTIFIER.test(name)) {
        throw new SinkError(this.name, `Invalid SQL identifier: ${JSON.stringify(name)}`);
      }
    }
  }

  static inDirectory(outputDir: string, fileName: string, options: Omit<SqliteSinkOptions, "filename"> = {}) {
    return new SqliteSink({ ...options, filename: join(outputDir, fileName) });
  }

  async open(): Promise<void> {
    if (this.outputPath !== ":memory:") mkdirSync(dirname(this.outputPath), { recursive: true });

    const db = new Database(this.outputPath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.exec(
      `CREATE TABLE IF NOT EXISTS ${this.table} (` +
        `chunk_id TEXT PRIMARY KEY, ` +
        `${this.payloadField} TEXT NOT NULL)`,
    );
    this.insert = db.prepare<[string, string]>(
      `INSERT OR REPLACE INTO ${this.table} (chunk_id, ${this.payloadField}) VALUES (?, ?)`,
    );
    this.db = db;
    this.logger.info("SQLite output", { path: this.outputPath, table: this.table });
  }

  async writePage(
    _page: PageMetadata,
    _blocks: readonly ContentBlock[],
    chunks: readonly Chunk[],
  ): Promise<void> {
    const { db, insert } = this;
    if (!db || !insert) throw new SinkError(this.name, "SqliteSink is not opened");

    this.totalPages++;
    if (chunks.length === 0) return;

    const writeAll = db.transaction((rows: ReadonlyArray<readonly [string, string]>) => {
      for (const [id, payload] of rows) insert.run(id, payload);
    });

    try {
      writeAll(
        chunks.map((chunk) => {
          const { chunkId, ...payload } = chunk;
          return [chunkId, JSON.stringify(payload)] as const;
        }),
      );
    } catch (error) {
      throw new SinkError(this.name, "Failed to write chunks", { cause: error });
    }
    this.totalChunks += chunks.length;
  }

  /** Live handle, for inspection. Null until opened and after close. */
  get database(): Database.Database | null {
    return this.db;
  }

  async close(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    this.insert = null;
    this.logger.info("SQLite database closed", { path: this.outputPath, chunks: this.totalChunks });
  }
}
