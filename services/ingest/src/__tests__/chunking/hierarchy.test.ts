import { describe, it, expect } from "vitest";
import { HeadingIndex, resolveHierarchy } from "../../chunking/hierarchy.js";
import { blocksFrom } from "../helpers/fixtures.js";

const { blocks, headings } = blocksFrom([
  { type: "h1", text: "Guide", htmlId: "guide" },
  { type: "p", text: "intro" },
  { type: "h2", text: "Install" },
  { type: "p", text: "steps" },
  { type: "h3", text: "Linux", htmlId: "linux" },
  { type: "p", text: "apt" },
  { type: "h2", text: "Config" },
  { type: "p", text: "edit" },
]);
const index = new HeadingIndex(headings);

describe("HeadingIndex.climb", () => {
  it("walks up through strictly smaller levels", () => {
    expect(index.climb(headings[2]).map((h) => h.text)).toEqual(["Linux", "Install", "Guide"]);
  });

  it("skips earlier siblings of the same level", () => {
    expect(index.climb(headings[3]).map((h) => h.text)).toEqual(["Config", "Guide"]);
  });

  it("handles skipped levels", () => {
    const { headings: skipped } = blocksFrom([
      { type: "h1", text: "Top" },
      { type: "h3", text: "Deep" },
      { type: "h2", text: "Mid" },
    ]);
    const idx = new HeadingIndex(skipped);
    expect(idx.climb(skipped[2]).map((h) => h.text)).toEqual(["Mid", "Top"]);
  });

  it("links headings added one at a time", () => {
    const { headings: added } = blocksFrom([
      { type: "h1", text: "A" },
      { type: "h2", text: "B" },
      { type: "h3", text: "C" },
      { type: "h2", text: "D" },
      { type: "h3", text: "E" },
    ]);
    const idx = new HeadingIndex();
    for (const h of added) idx.add(h);
    expect(idx.climb(added[2]).map((h) => h.text)).toEqual(["C", "B", "A"]);
    expect(idx.climb(added[4]).map((h) => h.text)).toEqual(["E", "D", "A"]);
  });

  it("climbs from the position of a heading it never indexed", () => {
    const extra = { level: 3, text: "Extra", blockId: "WIKI:p1-8", blockIndex: 8, htmlId: null };
    expect(index.climb(extra).map((h) => h.text)).toEqual(["Extra", "Config", "Guide"]);
  });
});

describe("resolveHierarchy", () => {
  it("starts at the referenced heading for a content block", () => {
    expect(resolveHierarchy(blocks[5], index, 2)).toEqual({
      full: ["Linux", "Install", "Guide"],
      truncated: ["Linux", "Install"],
      nearestHeadingHtmlId: "linux",
    });
  });

  it("starts at the block itself for a heading block", () => {
    expect(resolveHierarchy(blocks[6], index, 5)).toEqual({
      full: ["Config", "Guide"],
      truncated: ["Config", "Guide"],
      nearestHeadingHtmlId: null,
    });
  });

  it("returns an empty hierarchy for a block before any heading", () => {
    const { blocks: plain } = blocksFrom([{ type: "p", text: "x" }]);
    expect(resolveHierarchy(plain[0], index, 2)).toEqual({
      full: [],
      truncated: [],
      nearestHeadingHtmlId: null,
    });
  });

  it("returns an empty hierarchy when the referenced heading is unknown", () => {
    const orphan = { ...blocks[1], parentHeadingId: "WIKI:p1-99" };
    expect(resolveHierarchy(orphan, index, 2).full).toEqual([]);
  });
});
