import { parse, HTMLElement, TextNode, type Node } from "node-html-parser";
import type { Logger } from "../logger.js";
import { blockId, headingLevel } from "./ids.js";
import type { ContentBlock, HeadingInfo } from "./types.js";

export interface ExtractionOptions {
  /** Tags that start a block. Everything else is inline. */
  blockTags: readonly string[];
  /** Tags whose whole subtree is dropped before traversal. */
  excludedTags: readonly string[];
  /** Class prefixes whose elements are dropped. */
  excludedClasses: readonly string[];
  /** Id prefixes whose elements are dropped. */
  excludedIds: readonly string[];
  idPrefix: string;
}

export const DEFAULT_BLOCK_TAGS = [
  "p", "div", "blockquote", "pre", "ul", "ol", "table",
  "h1", "h2", "h3", "h4", "h5", "h6",
  "section", "article", "figure", "figcaption",
] as const;

export const DEFAULT_EXCLUDED_TAGS = ["code", "script", "style", "hr", "nav", "header", "footer"] as const;

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  blockTags: DEFAULT_BLOCK_TAGS,
  excludedTags: DEFAULT_EXCLUDED_TAGS,
  excludedClasses: [],
  excludedIds: [],
  idPrefix: "WIKI",
};

export interface ExtractionResult {
  blocks: ContentBlock[];
  headings: HeadingInfo[];
}

// Structural tags that separate words even when they are not configured as blocks.
const STRUCTURAL_TAGS = ["li", "tr", "td", "th", "dt", "dd"];
const LIST_TAGS = new Set(["ul", "ol"]);
const TABLE_SECTIONS = new Set(["thead", "tbody", "tfoot"]);
const NBSP = /\u00a0/g;

function tagOf(el: HTMLElement): string {
  return (el.rawTagName ?? "").toLowerCase();
}

function classesOf(el: HTMLElement): string[] {
  return (el.getAttribute("class") ?? "").split(/\s+/).filter((c) => c.length > 0);
}

function childElements(el: HTMLElement): HTMLElement[] {
  return el.childNodes.filter((n): n is HTMLElement => n instanceof HTMLElement);
}

/** 1-based position among preceding siblings with the same tag name. */
function sameTagPosition(el: HTMLElement): number {
  const parent: HTMLElement | null = el.parentNode;
  if (!parent) return 1;
  const tag = tagOf(el);
  let pos = 1;
  for (const sibling of parent.childNodes) {
    if (sibling === el) break;
    if (sibling instanceof HTMLElement && tagOf(sibling) === tag) pos++;
  }
  return pos;
}

function xpathSegment(el: HTMLElement): string {
  return `${tagOf(el)}[${sameTagPosition(el)}]`;
}

function cssSegment(el: HTMLElement): string {
  const tag = tagOf(el);
  if (el.id) return `${tag}#${el.id}`;
  const classes = classesOf(el);
  if (classes.length > 0) return `${tag}.${classes.join(".")}`;
  return `${tag}:nth-of-type(${sameTagPosition(el)})`;
}

interface DomPath {
  xpath: string[];
  css: string[];
}

function extend(path: DomPath, el: HTMLElement): DomPath {
  return { xpath: [...path.xpath, xpathSegment(el)], css: [...path.css, cssSegment(el)] };
}

/**
 * Accumulates raw text in reading order. Boundaries become a single separator so adjacent
 * paragraphs never fuse, while adjacent inline runs are joined as-is.
 */
class TextAccumulator {
  private parts: string[] = [];
  private atBoundary = true;

  addText(raw: string): void {
    const text = raw.replace(NBSP, " ");
    if (!text) return;
    if (!text.trim()) {
      const last = this.parts[this.parts.length - 1];
      if (last !== undefined && !/[ \n]$/.test(last)) this.parts.push(" ");
      return;
    }
    this.parts.push(text);
    this.atBoundary = false;
  }

  addBoundary(): void {
    if (this.atBoundary) return;
    this.parts.push("\n");
    this.atBoundary = true;
  }

  /** Normalized text collected so far; resets the accumulator. */
  flush(): string {
    const text = this.parts.join("").replace(/\s+/g, " ").trim();
    this.parts = [];
    this.atBoundary = true;
    return text;
  }
}

/**
 * Walks a page DOM and emits an ordered, flat block sequence plus a heading index.
 * Stateless between calls; every `extract` gets its own traversal state.
 */
export class BlockExtractor {
  private readonly options: ExtractionOptions;
  private readonly blockTags: Set<string>;
  private readonly boundaryTags: Set<string>;
  private readonly excludedTags: Set<string>;

  constructor(options: Partial<ExtractionOptions> = {}, private readonly logger?: Logger) {
    this.options = { ...DEFAULT_EXTRACTION_OPTIONS, ...options };
    this.blockTags = new Set(this.options.blockTags.map((t) => t.toLowerCase()));
    this.boundaryTags = new Set([...this.blockTags, ...STRUCTURAL_TAGS]);
    this.excludedTags = new Set(this.options.excludedTags.map((t) => t.toLowerCase()));
  }

  extract(html: string, pageId: string): ExtractionResult {
    const root = parse(html, {
      comment: false,
      // <pre> is left out so its children are parsed like any other element.
      blockTextElements: { script: true, noscript: true, style: true },
    });
    this.prune(root);

    const walk = new PageWalk(pageId, this.options.idPrefix, this);
    const body = root.querySelector("body");
    if (body) {
      walk.element(body, { xpath: [], css: [] });
    } else {
      walk.container(root, "body", { xpath: ["body[1]"], css: ["body:nth-of-type(1)"] });
    }

    this.logger?.debug("Blocks extracted", {
      pageId,
      blocks: walk.blocks.length,
      headings: walk.headings.length,
    });
    return { blocks: walk.blocks, headings: walk.headings };
  }

  isBlockTag(tag: string): boolean {
    return this.blockTags.has(tag);
  }

  /** Reading-order text of `el`, normalized. */
  textOf(el: HTMLElement): string {
    const acc = new TextAccumulator();
    this.collect(acc, el, true);
    return acc.flush();
  }

  collect(acc: TextAccumulator, node: Node, isRoot: boolean): void {
    if (node instanceof TextNode) {
      acc.addText(node.text);
      return;
    }
    if (!(node instanceof HTMLElement)) return;

    const tag = tagOf(node);
    if (tag === "br") {
      acc.addText(" ");
      return;
    }
    const boundary = !isRoot && this.boundaryTags.has(tag);
    if (boundary) acc.addBoundary();
    for (const child of node.childNodes) this.collect(acc, child, false);
    if (boundary) acc.addBoundary();
  }

  /** True when `el` or any descendant is a block tag. */
  containsBlock(el: HTMLElement): boolean {
    if (this.blockTags.has(tagOf(el))) return true;
    return childElements(el).some((child) => this.containsBlock(child));
  }

  private prune(parent: HTMLElement): void {
    for (const child of [...parent.childNodes]) {
      if (!(child instanceof HTMLElement)) continue;
      if (this.isExcluded(child)) {
        parent.removeChild(child);
      } else {
        this.prune(child);
      }
    }
  }

  private isExcluded(el: HTMLElement): boolean {
    const tag = tagOf(el);
    if (tag === "head" || this.excludedTags.has(tag)) return true;

    const { excludedIds, excludedClasses } = this.options;
    if (el.id && excludedIds.some((prefix) => el.id.startsWith(prefix))) return true;
    if (excludedClasses.length > 0) {
      return classesOf(el).some((cls) => excludedClasses.some((prefix) => cls.startsWith(prefix)));
    }
    return false;
  }
}

/** Traversal state for one page. */
class PageWalk {
  readonly blocks: ContentBlock[] = [];
  readonly headings: HeadingInfo[] = [];
  private headingStack: HeadingInfo[] = [];
  private offset = 0;

  constructor(
    private readonly pageId: string,
    private readonly idPrefix: string,
    private readonly extractor: BlockExtractor,
  ) {}

  element(el: HTMLElement, parentPath: DomPath): void {
    const tag = tagOf(el);
    const path = extend(parentPath, el);
    if (this.extractor.isBlockTag(tag)) {
      this.block(el, tag, path);
    } else {
      this.container(el, tag, path);
    }
  }

  /**
   * Non-block element. Loose text and inline children are emitted as blocks of the
   * container's own tag, flushed before every child that holds block content.
   */
  container(el: HTMLElement, tag: string, path: DomPath): void {
    const acc = new TextAccumulator();
    for (const child of el.childNodes) {
      if (child instanceof HTMLElement && this.extractor.containsBlock(child)) {
        this.emit(acc.flush(), tag, path, el);
        this.element(child, path);
      } else {
        this.extractor.collect(acc, child, false);
      }
    }
    this.emit(acc.flush(), tag, path, el);
  }

  private block(el: HTMLElement, tag: string, path: DomPath): void {
    if (LIST_TAGS.has(tag)) {
      this.list(el, path);
      return;
    }
    if (tag === "table") {
      this.table(el, path);
      return;
    }
    const level = headingLevel(tag);
    if (level !== null) {
      this.heading(el, tag, level, path);
      return;
    }

    const hasBlockChild = childElements(el).some((child) => this.extractor.isBlockTag(tagOf(child)));
    if (hasBlockChild) {
      this.mixed(el, tag, path);
    } else {
      this.emit(this.extractor.textOf(el), tag, path, el);
    }
  }

  /** Free-text runs are flushed as standalone blocks right before each nested block. */
  private mixed(el: HTMLElement, tag: string, path: DomPath): void {
    const acc = new TextAccumulator();
    for (const child of el.childNodes) {
      if (child instanceof HTMLElement && this.extractor.isBlockTag(tagOf(child))) {
        this.emit(acc.flush(), tag, path, el);
        this.element(child, path);
      } else {
        this.extractor.collect(acc, child, false);
      }
    }
    this.emit(acc.flush(), tag, path, el);
  }

  private list(listEl: HTMLElement, path: DomPath): void {
    for (const li of childElements(listEl)) {
      if (tagOf(li) !== "li") continue;
      const liPath = extend(path, li);
      const nested = childElements(li).some((child) => LIST_TAGS.has(tagOf(child)));

      if (!nested) {
        this.emit(this.extractor.textOf(li), "li", liPath, li);
        continue;
      }

      const acc = new TextAccumulator();
      for (const child of li.childNodes) {
        if (child instanceof HTMLElement && LIST_TAGS.has(tagOf(child))) {
          this.emit(acc.flush(), "li", liPath, li);
          this.list(child, extend(liPath, child));
        } else {
          this.extractor.collect(acc, child, false);
        }
      }
      this.emit(acc.flush(), "li", liPath, li);
    }
  }

  /** One block per row; only the row's own cells, joined with " | ". */
  private table(tableEl: HTMLElement, path: DomPath): void {
    for (const child of childElements(tableEl)) {
      const tag = tagOf(child);
      if (TABLE_SECTIONS.has(tag)) {
        const sectionPath = extend(path, child);
        for (const row of childElements(child)) {
          if (tagOf(row) === "tr") this.row(row, extend(sectionPath, row));
        }
      } else if (tag === "tr") {
        this.row(child, extend(path, child));
      }
    }
  }

  private row(row: HTMLElement, path: DomPath): void {
    const cells = childElements(row)
      .filter((cell) => {
        const tag = tagOf(cell);
        return tag === "td" || tag === "th";
      })
      .map((cell) => this.extractor.textOf(cell))
      .filter((text) => text.length > 0);
    if (cells.length > 0) this.emit(cells.join(" | "), "tr", path, row);
  }

  private heading(el: HTMLElement, tag: string, level: number, path: DomPath): void {
    const text = this.extractor.textOf(el);
    if (!text) return;

    // Pop first so the heading points at its nearest ancestor, not at a sibling.
    this.headingStack = this.headingStack.filter((h) => h.level < level);
    const block = this.emit(text, tag, path, el);
    if (!block) return;

    const info: HeadingInfo = {
      level,
      text,
      blockId: block.id,
      blockIndex: block.index,
      htmlId: block.htmlId,
    };
    this.headings.push(info);
    this.headingStack.push(info);
  }

  private emit(text: string, blockType: string, path: DomPath, el: HTMLElement): ContentBlock | null {
    if (!text) return null;
    const index = this.blocks.length;
    const top = this.headingStack[this.headingStack.length - 1];
    const block: ContentBlock = {
      index,
      id: blockId(this.idPrefix, this.pageId, index),
      blockType,
      text,
      xpath: "/" + path.xpath.join("/"),
      cssSelector: path.css.join(" > "),
      textOffset: this.offset,
      textLength: text.length,
      parentHeadingId: top ? top.blockId : null,
      htmlId: el.id || null,
    };
    this.blocks.push(block);
    this.offset += text.length + 1;
    return block;
  }
}
