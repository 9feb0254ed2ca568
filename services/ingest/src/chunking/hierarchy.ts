import { headingLevel } from "./ids.js";
import type { HeadingInfo } from "./types.js";

/** The fields of a block that hierarchy resolution looks at. */
export interface HeadingAnchor {
  index: number;
  id: string;
  blockType: string;
  text: string;
  parentHeadingId: string | null;
  htmlId: string | null;
}

export interface ResolvedHierarchy {
  /** Least to most important. */
  full: string[];
  /** First `maxLevels` entries of `full`. */
  truncated: string[];
  nearestHeadingHtmlId: string | null;
}

/** Headings of one page, kept in block order and addressable by block id. */
export class HeadingIndex {
  private readonly ordered: HeadingInfo[] = [];
  private readonly byId = new Map<string, HeadingInfo>();
  private readonly parents = new Map<string, HeadingInfo | null>();
  /** Ancestors of the last added heading, outermost first. */
  private readonly open: HeadingInfo[] = [];

  constructor(headings: Iterable<HeadingInfo> = []) {
    for (const h of headings) this.add(h);
  }

  /** Headings must be added in increasing block order. */
  add(heading: HeadingInfo): void {
    while (this.open.length > 0 && this.open[this.open.length - 1].level >= heading.level) {
      this.open.pop();
    }
    this.parents.set(heading.blockId, this.open.length > 0 ? this.open[this.open.length - 1] : null);
    this.open.push(heading);
    this.ordered.push(heading);
    this.byId.set(heading.blockId, heading);
  }

  get(blockId: string): HeadingInfo | undefined {
    return this.byId.get(blockId);
  }

  /**
   * `start` followed by each ancestor: the nearest earlier heading with a strictly
   * smaller level, then that heading's own parent, until none is left.
   */
  climb(start: HeadingInfo): HeadingInfo[] {
    const chain = [start];
    for (let parent = this.parentOf(start); parent; parent = this.parentOf(parent)) {
      chain.push(parent);
    }
    return chain;
  }

  private parentOf(heading: HeadingInfo): HeadingInfo | null {
    const linked = this.parents.get(heading.blockId);
    if (linked !== undefined) return linked;

    // Not indexed: look back from its position.
    for (let i = this.ordered.length - 1; i >= 0; i--) {
      const h = this.ordered[i];
      if (h.blockIndex < heading.blockIndex && h.level < heading.level) return h;
    }
    return null;
  }
}

/**
 * Hierarchy of a chunk whose first block is `first`. A heading block starts the chain at
 * itself and its own back-reference is ignored; any other block starts at the heading it
 * references. Tag budgeting and the stored chunk fields both go through here so they
 * always agree.
 */
export function resolveHierarchy(
  first: HeadingAnchor,
  index: HeadingIndex,
  maxLevels: number,
): ResolvedHierarchy {
  let start: HeadingInfo | undefined;

  const level = headingLevel(first.blockType);
  if (level !== null) {
    start = index.get(first.id) ?? {
      level,
      text: first.text,
      blockId: first.id,
      blockIndex: first.index,
      htmlId: first.htmlId,
    };
  } else if (first.parentHeadingId !== null) {
    start = index.get(first.parentHeadingId);
  }

  if (!start) return { full: [], truncated: [], nearestHeadingHtmlId: null };

  const full = index.climb(start).map((h) => h.text);
  return {
    full,
    truncated: full.slice(0, maxLevels),
    nearestHeadingHtmlId: start.htmlId,
  };
}
