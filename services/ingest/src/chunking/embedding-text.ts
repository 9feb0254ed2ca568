export interface TagOptions {
  includePageTag: boolean;
  includeSectionTag: boolean;
}

function tagLines(pageTitle: string, hierarchy: readonly string[], options: TagOptions): string[] {
  const lines: string[] = [];
  if (options.includePageTag) lines.push(`[PAGE] ${pageTitle}`);
  if (options.includeSectionTag && hierarchy.length > 0) {
    lines.push(`[SECTION] ${hierarchy.join(" > ")}`);
  }
  return lines;
}

/**
 * ```
 * [PAGE] Title
 * [SECTION] Install > Guide
 * [TEXT] chunk text
 * ```
 * With both tags disabled (or nothing to put in them) the plain text is returned.
 */
export function buildEmbeddingText(
  pageTitle: string,
  hierarchy: readonly string[],
  text: string,
  options: TagOptions,
): string {
  const lines = tagLines(pageTitle, hierarchy, options);
  if (lines.length === 0) return text.trim();
  lines.push(`[TEXT] ${text.trim()}`);
  return lines.join("\n");
}

/** Everything `buildEmbeddingText` adds in front of the text, for budgeting. */
export function tagPrefix(
  pageTitle: string,
  hierarchy: readonly string[],
  options: TagOptions,
): string {
  const lines = tagLines(pageTitle, hierarchy, options);
  if (lines.length === 0) return "";
  lines.push("[TEXT] ");
  return lines.join("\n");
}
