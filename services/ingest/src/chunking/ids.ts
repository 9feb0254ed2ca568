export function blockId(prefix: string, pageId: string, index: number): string {
  return `${prefix}:${pageId}-${index}`;
}

/**
 * `{prefix}:{pageId}:{first}-{last}`, with `@{start}-{end}` appended when the chunk
 * begins or ends inside a block that was split while packing.
 */
export function chunkId(
  prefix: string,
  pageId: string,
  firstIndex: number,
  lastIndex: number,
  span?: { start: number; end: number },
): string {
  const base = `${prefix}:${pageId}:${firstIndex}-${lastIndex}`;
  return span ? `${base}@${span.start}-${span.end}` : base;
}

const HEADING_TYPE = /^h([1-6])$/;

/** Heading level for "h1".."h6", otherwise null. */
export function headingLevel(blockType: string): number | null {
  const match = HEADING_TYPE.exec(blockType.toLowerCase());
  return match ? Number(match[1]) : null;
}
