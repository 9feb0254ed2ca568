import { describe, it, expect } from "vitest";
import { BlockNormalizer } from "../../chunking/normalizer.js";
import { RuleBasedSegmenter } from "../../chunking/sentences.js";
import { SimpleTokenStrategy } from "../../chunking/tokenizer.js";
import { blocksFrom, memoryLogger } from "../helpers/fixtures.js";

const strategy = new SimpleTokenStrategy(new RuleBasedSegmenter());
const page = { pageId: "p1", title: "T" };
// Five tokens each under the simple counter.
const S1 = "A1 b1 c1 d1.";
const S2 = "A2 b2 c2 d2.";
const S3 = "A3 b3 c3 d3.";

describe("BlockNormalizer", () => {
  it("leaves blocks that fit an empty chunk untouched", () => {
    const { blocks, headings } = blocksFrom([{ type: "p", text: S1 }]);
    const result = new BlockNormalizer(strategy, { chunkSize: 20 }).normalize(blocks, headings, page);
    expect(result.splits).toBe(0);
    expect(result.blocks).toEqual(blocks);
  });

  it("splits an oversized block at sentence boundaries and renumbers", () => {
    // Budget: 20 - 7 tag tokens ("[PAGE] T\n[TEXT] ") = 13.
    const { blocks, headings } = blocksFrom([
      { type: "p", text: `${S1} ${S2} ${S3}` },
      { type: "p", text: "End." },
    ]);
    const logger = memoryLogger();
    const result = new BlockNormalizer(strategy, { chunkSize: 20 }, logger).normalize(
      blocks,
      headings,
      page,
    );

    expect(result.splits).toBe(1);
    expect(result.blocks.map((b) => [b.id, b.text, b.textOffset])).toEqual([
      ["WIKI:p1-0", `${S1} ${S2}`, 0],
      ["WIKI:p1-1", S3, 26],
      ["WIKI:p1-2", "End.", 39],
    ]);
    expect(result.blocks[1].xpath).toBe(blocks[0].xpath);
    expect(logger.records).toContainEqual({
      level: "info",
      msg: "Split oversized blocks",
      meta: { pageId: "p1", extraBlocks: 1 },
    });
  });

  it("budgets the section tag and keeps heading links on the new numbering", () => {
    // Budget: 20 - 11 tag tokens ("[PAGE] T\n[SECTION] Sec\n[TEXT] ") = 9.
    const { blocks, headings } = blocksFrom([
      { type: "h2", text: "Sec" },
      { type: "p", text: `${S1} ${S2}` },
    ]);
    const result = new BlockNormalizer(strategy, { chunkSize: 20 }).normalize(blocks, headings, page);

    expect(result.blocks.map((b) => b.text)).toEqual(["Sec", S1, S2]);
    expect(result.blocks.map((b) => b.parentHeadingId)).toEqual([null, "WIKI:p1-0", "WIKI:p1-0"]);
    expect(result.headings).toEqual([
      { level: 2, text: "Sec", blockId: "WIKI:p1-0", blockIndex: 0, htmlId: null },
    ]);
  });

  it("reserves room for overlap on both sides", () => {
    // Budget: 20 - 7 - 2 x 2 = 9, so a ten-token block is split.
    const { blocks, headings } = blocksFrom([{ type: "p", text: `${S1} ${S2}` }]);
    const result = new BlockNormalizer(strategy, { chunkSize: 20, chunkOverlap: 2 }).normalize(
      blocks,
      headings,
      page,
    );
    expect(result.blocks.map((b) => b.text)).toEqual([S1, S2]);
  });

  it("never splits headings", () => {
    const long = "Heading with many words that goes on and on and on";
    const { blocks, headings } = blocksFrom([{ type: "h1", text: long }]);
    const result = new BlockNormalizer(strategy, { chunkSize: 12 }).normalize(blocks, headings, page);
    expect(result.blocks.map((b) => b.text)).toEqual([long]);
  });

  it("drops blank blocks", () => {
    const { blocks, headings } = blocksFrom([
      { type: "p", text: "  " },
      { type: "p", text: "Kept." },
    ]);
    const result = new BlockNormalizer(strategy).normalize(blocks, headings, page);
    expect(result.blocks.map((b) => [b.index, b.text])).toEqual([[0, "Kept."]]);
  });
});
