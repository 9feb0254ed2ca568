import { chunkHtml } from "../../chunking/index.js";
import { headingLevel } from "../../chunking/ids.js";
import type { ContentBlock, HeadingInfo, PageMetadata, PageResult } from "../../chunking/types.js";
import type { LogLevel, LogMeta, Logger } from "../../logger.js";

export function pageMetadata(overrides: Partial<PageMetadata> = {}): PageMetadata {
  return {
    pageId: "p1",
    title: "T",
    spaceKey: "DOC",
    spaceName: "Docs",
    version: 3,
    lastModified: "2024-05-01T10:00:00.000Z",
    url: "https://wiki.test/p/1",
    labels: [],
    ancestors: [],
    ...overrides,
  };
}

export interface BlockSpec {
  type: string;
  text: string;
  htmlId?: string;
}

/**
 * Blocks numbered the way the extractor numbers them: running offsets, and each block
 * pointing at the nearest open heading of a smaller level.
 */
export function blocksFrom(
  specs: readonly BlockSpec[],
  pageId = "p1",
): { blocks: ContentBlock[]; headings: HeadingInfo[] } {
  const blocks: ContentBlock[] = [];
  const headings: HeadingInfo[] = [];
  let stack: HeadingInfo[] = [];
  let offset = 0;

  specs.forEach((entry, index) => {
    const level = headingLevel(entry.type);
    if (level !== null) stack = stack.filter((h) => h.level < level);
    const top = stack[stack.length - 1];
    const block: ContentBlock = {
      index,
      id: `WIKI:${pageId}-${index}`,
      blockType: entry.type,
      text: entry.text,
      xpath: `/body[1]/${entry.type}[${index + 1}]`,
      cssSelector: `body:nth-of-type(1) > ${entry.type}:nth-of-type(${index + 1})`,
      textOffset: offset,
      textLength: entry.text.length,
      parentHeadingId: top ? top.blockId : null,
      htmlId: entry.htmlId ?? null,
    };
    blocks.push(block);
    offset += entry.text.length + 1;
    if (level !== null) {
      const info: HeadingInfo = {
        level,
        text: entry.text,
        blockId: block.id,
        blockIndex: index,
        htmlId: block.htmlId,
      };
      headings.push(info);
      stack.push(info);
    }
  });

  return { blocks, headings };
}

export interface LogRecord {
  level: LogLevel;
  msg: string;
  meta: LogMeta;
}

/** Logger that keeps every record, children included, in one shared list. */
export function memoryLogger(): Logger & { records: LogRecord[] } {
  const records: LogRecord[] = [];

  function build(bindings: LogMeta): Logger {
    const write = (level: LogLevel) => (msg: string, meta?: LogMeta) => {
      records.push({ level, msg, meta: { ...bindings, ...meta } });
    };
    return {
      debug: write("debug"),
      info: write("info"),
      warn: write("warn"),
      error: write("error"),
      child: (extra) => build({ ...bindings, ...extra }),
    };
  }

  return Object.assign(build({}), { records });
}

/** A page of two one-block chunks, "WIKI:p1:0-0" and "WIKI:p1:1-1", with untagged embedding texts. */
export function twoChunkPage(): PageResult & { page: PageMetadata } {
  const page = pageMetadata();
  const result = chunkHtml("<p>First.</p><p>Second.</p>", page, {
    chunkSize: 3,
    includePageTag: false,
    includeSectionTag: false,
  });
  return { ...result, page };
}
