import { readdir, readFile, stat } from "node:fs/promises";
import { basename, extname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { createHash } from "node:crypto";
import type { PageMetadata } from "../chunking/types.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { PageSource, SourcePage } from "../pipeline/types.js";
import { localFileToHtml } from "./convert.js";
import type { LocalFile } from "./types.js";

export interface LocalFileClientConfig {
  directory: string;
  extensions: readonly string[];
  logger?: Logger;
}

/** Page id of a file: `local_` plus the first 12 hex digits of the md5 of its relative path. */
export function localPageId(relativePath: string): string {
  return `local_${createHash("md5").update(relativePath).digest("hex").slice(0, 12)}`;
}

/** Pages read from a directory tree of .html, .md and .txt files. */
export class LocalFileClient implements PageSource {
  readonly name = "files";
  private readonly directory: string;
  private readonly extensions: Set<string>;
  private readonly logger: Logger;
  /** Page id to absolute path, filled while listing. */
  private readonly paths = new Map<string, string>();

  constructor(config: LocalFileClientConfig) {
    this.directory = resolve(config.directory);
    this.extensions = new Set(config.extensions.map((e) => e.toLowerCase()));
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Recursively scan directory and yield matching files
   */
  async *getAllFiles(): AsyncGenerator<LocalFile> {
    for await (const path of this.scanDirectory(this.directory)) {
      let file: LocalFile;
      try {
        file = await this.readFile(path);
      } catch (error) {
        this.logger.warn("Skipping unreadable file", { path, error: errorMessage(error) });
        continue;
      }
      yield file;
    }
  }

  async *listPageIds(): AsyncGenerator<string> {
    for await (const path of this.scanDirectory(this.directory)) {
      const pageId = localPageId(this.relativePath(path));
      this.paths.set(pageId, path);
      yield pageId;
    }
  }

  async getPage(pageId: string): Promise<SourcePage | null> {
    const path = this.paths.get(pageId);
    if (!path) return null;
    return this.toSourcePage(await this.readFile(path));
  }

  /** Reads one file, inside the source directory or not. */
  async readFile(path: string): Promise<LocalFile> {
    const filePath = resolve(path);
    const ext = extname(filePath).toLowerCase();
    const [content, fileStat] = await Promise.all([readFile(filePath, "utf-8"), stat(filePath)]);
    return {
      filePath,
      relativePath: this.relativePath(filePath),
      fileName: basename(filePath, extname(filePath)),
      extension: ext,
      content,
      modifiedAt: fileStat.mtime,
    };
  }

  toSourcePage(file: LocalFile): SourcePage {
    return {
      metadata: this.extractMetadata(file),
      html: localFileToHtml(file.content, file.extension),
    };
  }

  /**
   * Page metadata for a local file. Subdirectories become ancestors.
   */
  extractMetadata(file: LocalFile): PageMetadata {
    const parts = file.relativePath.split("/");
    const ancestors = parts.length > 1 ? parts.slice(0, -1) : [];

    return {
      pageId: localPageId(file.relativePath),
      title: file.fileName,
      spaceKey: "local",
      spaceName: "Local Files",
      version: 1,
      lastModified: file.modifiedAt.toISOString(),
      url: `file://${file.filePath}`,
      labels: [],
      ancestors,
    };
  }

  private relativePath(path: string): string {
    const rel = relative(this.directory, path);
    if (rel.startsWith("..") || isAbsolute(rel)) return basename(path);
    return rel.split(sep).join("/");
  }

  private async *scanDirectory(dir: string): AsyncGenerator<string> {
    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      this.logger.warn("Cannot read directory", { dir, error: errorMessage(error) });
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        yield* this.scanDirectory(fullPath);
      } else if (entry.isFile() && this.extensions.has(extname(entry.name).toLowerCase())) {
        yield fullPath;
      }
    }
  }
}
