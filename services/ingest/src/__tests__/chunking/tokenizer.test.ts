import { describe, it, expect } from "vitest";
import {
  createTokenStrategy,
  SimpleTokenStrategy,
  StrategyCache,
  TiktokenStrategy,
} from "../../chunking/tokenizer.js";
import { IntlSegmenter, RuleBasedSegmenter } from "../../chunking/sentences.js";
import { memoryLogger } from "../helpers/fixtures.js";

const simple = new SimpleTokenStrategy(new RuleBasedSegmenter());

describe("SimpleTokenStrategy.count", () => {
  it("counts words and punctuation characters", () => {
    expect(simple.count("Hello, world!")).toBe(4);
  });

  it("returns 0 for empty or blank text", () => {
    expect(simple.count("")).toBe(0);
    expect(simple.count("   ")).toBe(0);
  });

  it("is additive across space joins", () => {
    const a = "Install the agent.";
    const b = "Then restart (twice).";
    expect(simple.count(`${a} ${b}`)).toBe(simple.count(a) + simple.count(b));
  });
});

describe("split", () => {
  it("packs whole sentences and breaks an oversized sentence by words", () => {
    expect(simple.split("One two. Three four five. Six.", 3)).toEqual([
      "One two.",
      "Three four",
      "five.",
      "Six.",
    ]);
  });

  it("keeps everything in one part when it fits", () => {
    expect(simple.split("One two. Three.", 10)).toEqual(["One two. Three."]);
  });
});

describe("takePrefix", () => {
  it("takes the longest whole-sentence prefix", () => {
    expect(simple.takePrefix("Alpha beta. Gamma delta.", 3, false)).toEqual({
      prefix: "Alpha beta.",
      remainder: "Gamma delta.",
    });
  });

  it("returns an empty prefix when no sentence fits and nothing is forced", () => {
    expect(simple.takePrefix("Alpha beta gamma delta.", 2, false)).toEqual({
      prefix: "",
      remainder: "Alpha beta gamma delta.",
    });
  });

  it("falls back to words when forced", () => {
    expect(simple.takePrefix("Alpha beta gamma delta.", 2, true)).toEqual({
      prefix: "Alpha beta",
      remainder: "gamma delta.",
    });
  });

  it("takes at least one word even when it exceeds the limit", () => {
    expect(simple.takePrefix("Supercalifragilistic!", 1, true)).toEqual({
      prefix: "Supercalifragilistic!",
      remainder: "",
    });
  });
});

describe("takeSuffix", () => {
  it("takes trailing whole sentences", () => {
    expect(simple.takeSuffix("Alpha beta. Gamma delta.", 3)).toBe("Gamma delta.");
  });

  it("falls back to trailing words", () => {
    expect(simple.takeSuffix("Alpha beta gamma.", 2)).toBe("gamma.");
  });

  it("returns an empty string when not even a word fits", () => {
    expect(simple.takeSuffix("Alpha beta gamma.", 1)).toBe("");
  });
});

describe("text written without spaces between sentences", () => {
  const intl = new SimpleTokenStrategy(new IntlSegmenter());
  const sentences = Array.from({ length: 30 }, (_, i) => `文${i}です。`);
  const text = sentences.join("");

  it("splits into exact slices of the input", () => {
    const parts = intl.split(text, 5);
    expect(parts).toHaveLength(15);
    expect(parts[0]).toBe("文0です。文1です。");
    expect(parts.join("")).toBe(text);
  });

  it("takes a prefix whose remainder continues the input", () => {
    const { prefix, remainder } = intl.takePrefix(text, 5, false);
    expect(prefix).toBe("文0です。文1です。");
    expect(prefix + remainder).toBe(text);
  });

  it("takes a suffix of the input", () => {
    expect(intl.takeSuffix(text, 4)).toBe("文28です。文29です。");
  });
});

describe("createTokenStrategy", () => {
  it("builds the simple strategy by default", () => {
    expect(createTokenStrategy()).toBeInstanceOf(SimpleTokenStrategy);
  });

  it("builds a BPE counter for tiktoken", () => {
    const strategy = createTokenStrategy({
      strategy: "tiktoken",
      segmenter: "simple",
      encoding: "cl100k_base",
    });
    expect(strategy).toBeInstanceOf(TiktokenStrategy);
    expect(strategy.count("hello world")).toBe(2);
    expect(strategy.count("")).toBe(0);
  });
});

describe("StrategyCache", () => {
  it("reuses its instance while the settings are unchanged", () => {
    const cache = new StrategyCache(memoryLogger());
    const settings = { strategy: "simple", segmenter: "simple", encoding: "cl100k_base" } as const;
    const first = cache.get(settings);
    expect(cache.get({ ...settings })).toBe(first);
  });

  it("rebuilds when the settings change", () => {
    const cache = new StrategyCache();
    const first = cache.get({ strategy: "simple", segmenter: "simple", encoding: "cl100k_base" });
    const second = cache.get({ strategy: "simple", segmenter: "intl", encoding: "cl100k_base" });
    expect(second).not.toBe(first);
  });
});
