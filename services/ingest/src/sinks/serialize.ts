import type { PageMetadata } from "../chunking/types.js";

export interface PageInfo {
  pageId: string;
  pageTitle: string;
  space: { key: string; name: string };
  version: number;
  lastModified: string;
  url: string;
}

/** Short per-page record written next to the chunks. */
export function toPageInfo(page: PageMetadata): PageInfo {
  return {
    pageId: page.pageId,
    pageTitle: page.title,
    space: { key: page.spaceKey, name: page.spaceName },
    version: page.version,
    lastModified: page.lastModified,
    url: page.url,
  };
}

/** `YYYYMMDD_HHMMSS` in local time, for output file names. */
export function fileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
