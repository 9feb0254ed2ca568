import { describe, it, expect } from "vitest";
import { chunkHtml, processPage } from "../../chunking/index.js";
import { RuleBasedSegmenter } from "../../chunking/sentences.js";
import { createTokenStrategy, SimpleTokenStrategy } from "../../chunking/tokenizer.js";
import { memoryLogger, pageMetadata } from "../helpers/fixtures.js";

const strategy = new SimpleTokenStrategy(new RuleBasedSegmenter());

const HTML = [
  '<h1 id="guide">Guide</h1>',
  "<p>Welcome to the guide.</p>",
  '<h2 id="install">Install</h2>',
  "<p>Run the installer. Accept the defaults.</p>",
  "<ul><li>Linux</li><li>macOS</li></ul>",
].join("");

describe("processPage", () => {
  it("extracts, normalizes and chunks a page", () => {
    const result = processPage(pageMetadata(), HTML, { strategy, chunking: { chunkSize: 512 } });

    expect(result.blocks.map((b) => b.text)).toEqual([
      "Guide",
      "Welcome to the guide.",
      "Install",
      "Run the installer. Accept the defaults.",
      "Linux",
      "macOS",
    ]);
    expect(result.headings.map((h) => h.text)).toEqual(["Guide", "Install"]);
    expect(result.chunks).toHaveLength(1);
    expect(result.chunks[0].chunkId).toBe("WIKI:p1:0-5");
    expect(result.chunks[0].navigationUrl).toBe("https://wiki.test/p/1#guide");
  });

  it("starts a new chunk per section when chunks are small", () => {
    const result = processPage(pageMetadata(), HTML, {
      strategy,
      chunking: { chunkSize: 16, includePageTag: false },
    });
    expect(result.chunks.map((c) => c.chunkId)).toEqual(["WIKI:p1:0-2", "WIKI:p1:3-3", "WIKI:p1:4-6"]);

    const install = result.chunks[1];
    expect(install.normalizedText).toBe("Run the installer.");
    expect(install.fullHeadingHierarchy).toEqual(["Install", "Guide"]);
    expect(install.embeddingText).toBe("[SECTION] Install > Guide\n[TEXT] Run the installer.");
    expect(install.nearestHeadingId).toBe("install");
    expect(install.navigationUrl).toBe("https://wiki.test/p/1#install");
  });

  it("uses the configured id prefix for blocks and chunks", () => {
    const result = processPage(pageMetadata(), "<p>Only text.</p>", {
      strategy,
      chunking: { idPrefix: "KB" },
    });
    expect(result.blocks[0].id).toBe("KB:p1-0");
    expect(result.chunks[0].chunkId).toBe("KB:p1:0-0");
  });

  it("warns and returns nothing for a page without content", () => {
    const logger = memoryLogger();
    const result = processPage(pageMetadata(), "<div>   </div>", { strategy, logger });

    expect(result).toEqual({ chunks: [], blocks: [], headings: [] });
    expect(logger.records).toContainEqual({
      level: "warn",
      msg: "No content blocks extracted",
      meta: { pageId: "p1", title: "T" },
    });
  });

  it("logs stage timings at info with metrics enabled", () => {
    const logger = memoryLogger();
    processPage(pageMetadata(), HTML, { strategy, logger, showMetrics: true });
    const stages = logger.records.filter((r) => r.level === "info").map((r) => r.msg);
    expect(stages).toEqual(["extract finished", "normalize finished", "build finished"]);
  });

  it("keeps text written without spaces between sentences exact across blocks and overlaps", () => {
    const sentences = Array.from({ length: 30 }, (_, i) => `文${i}です。`);
    const text = sentences.join("");
    const { blocks, chunks } = processPage(pageMetadata(), `<p>${text}</p>`, {
      strategy: createTokenStrategy({ strategy: "simple", segmenter: "intl", encoding: "cl100k_base" }),
      chunking: { chunkSize: 20, chunkOverlap: 4, includePageTag: false, includeSectionTag: false },
    });

    expect(blocks.map((b) => b.text).join("")).toBe(text);
    expect(blocks[0].text).toBe(sentences.slice(0, 6).join(""));
    expect(chunks).toHaveLength(5);
    expect(chunks[0].overlapNextText).toBe("文8です。文9です。");
    expect(chunks[1].overlapPrevText).toBe("文6です。文7です。");
    for (const chunk of chunks) {
      const { coreFragments, overlapPrevFragments, overlapNextFragments } = chunk.highlight;
      for (const f of [...coreFragments, ...overlapPrevFragments, ...overlapNextFragments]) {
        expect(blocks[f.blockIndex].text.slice(f.fragmentStart, f.fragmentEnd)).toBe(f.text);
      }
    }
  });
});

describe("chunkHtml", () => {
  it("builds its own strategy from settings", () => {
    const result = chunkHtml("<p>Hello there.</p>", pageMetadata(), {
      chunkSize: 64,
      strategy: { strategy: "simple", segmenter: "intl", encoding: "cl100k_base" },
    });
    expect(result.chunks.map((c) => c.embeddingText)).toEqual(["[PAGE] T\n[TEXT] Hello there."]);
  });
});
