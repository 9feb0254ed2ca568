import { getEncoding, type Tiktoken } from "js-tiktoken";
import type { Logger } from "../logger.js";
import {
  createSentenceSegmenter,
  wordSpans,
  type SentenceSegmenter,
  type SentenceSegmenterName,
  type TextSpan,
} from "./sentences.js";

export type TokenStrategyName = "simple" | "tiktoken";
export type TiktokenEncodingName = "cl100k_base" | "o200k_base";

export interface PrefixSplit {
  prefix: string;
  remainder: string;
}

/**
 * Token counting plus sentence/word aware splitting.
 * Instances may hold tokenizer caches: keep one per worker, never share across workers.
 */
export interface TokenStrategy {
  readonly name: TokenStrategyName;
  count(text: string): number;
  /** Sentence-packed parts, each within `maxTokens` unless a single word alone exceeds it. */
  split(text: string, maxTokens: number): string[];
  /**
   * Longest whole-sentence prefix within `maxTokens`. When no sentence fits, returns an
   * empty prefix, or with `mustTake` a word-level prefix of the first sentence (at least one word).
   */
  takePrefix(text: string, maxTokens: number, mustTake: boolean): PrefixSplit;
  /** Longest whole-sentence suffix within `maxTokens`, falling back to a word-level suffix. */
  takeSuffix(text: string, maxTokens: number): string;
}

/**
 * Splitting shared by every counter. Every returned piece is a slice of the input, so
 * pieces of text written without spaces between sentences stay exact.
 */
export abstract class BaseTokenStrategy implements TokenStrategy {
  abstract readonly name: TokenStrategyName;

  constructor(protected readonly segmenter: SentenceSegmenter) {}

  abstract count(text: string): number;

  split(text: string, maxTokens: number): string[] {
    const parts: string[] = [];
    let group: { start: number; end: number; tokens: number } | null = null;

    for (const sentence of this.segmenter.spans(text)) {
      const tokens = this.count(sentence.text);

      if (tokens > maxTokens) {
        if (group) parts.push(text.slice(group.start, group.end));
        group = null;
        parts.push(...this.splitByWords(text, sentence, maxTokens));
        continue;
      }

      if (group && group.tokens + tokens <= maxTokens) {
        group.end = sentence.end;
        group.tokens += tokens;
      } else {
        if (group) parts.push(text.slice(group.start, group.end));
        group = { start: sentence.start, end: sentence.end, tokens };
      }
    }

    if (group) parts.push(text.slice(group.start, group.end));
    return parts;
  }

  takePrefix(text: string, maxTokens: number, mustTake: boolean): PrefixSplit {
    const sentences = this.segmenter.spans(text);
    if (sentences.length === 0) return { prefix: "", remainder: text };
    const end = sentences[sentences.length - 1].end;

    let used = 0;
    let i = 0;
    for (; i < sentences.length; i++) {
      const tokens = this.count(sentences[i].text);
      if (used + tokens > maxTokens) break;
      used += tokens;
    }

    if (i > 0) {
      return {
        prefix: text.slice(sentences[0].start, sentences[i - 1].end),
        remainder: i < sentences.length ? text.slice(sentences[i].start, end) : "",
      };
    }
    if (!mustTake) return { prefix: "", remainder: text };

    const first = wordSpans(text, sentences[0]);
    let k = 0;
    for (; k < first.length; k++) {
      const tokens = this.count(first[k].text);
      if (used + tokens > maxTokens && k > 0) break;
      used += tokens;
    }

    let remainder = "";
    if (k < first.length) remainder = text.slice(first[k].start, end);
    else if (sentences.length > 1) remainder = text.slice(sentences[1].start, end);
    return { prefix: text.slice(first[0].start, first[k - 1].end), remainder };
  }

  takeSuffix(text: string, maxTokens: number): string {
    const sentences = this.segmenter.spans(text);
    if (sentences.length === 0) return "";
    const end = sentences[sentences.length - 1].end;

    let used = 0;
    let i = sentences.length;
    while (i > 0) {
      const tokens = this.count(sentences[i - 1].text);
      if (used + tokens > maxTokens) break;
      used += tokens;
      i--;
    }
    if (i < sentences.length) return text.slice(sentences[i].start, end);

    const last = wordSpans(text, sentences[sentences.length - 1]);
    let k = last.length;
    while (k > 0) {
      const tokens = this.count(last[k - 1].text);
      if (used + tokens > maxTokens) break;
      used += tokens;
      k--;
    }
    return k < last.length ? text.slice(last[k].start, end) : "";
  }

  private splitByWords(text: string, sentence: TextSpan, maxTokens: number): string[] {
    const parts: string[] = [];
    let group: { start: number; end: number; tokens: number } | null = null;

    for (const word of wordSpans(text, sentence)) {
      const tokens = this.count(word.text);
      if (group && group.tokens + tokens > maxTokens) {
        parts.push(text.slice(group.start, group.end));
        group = null;
      }
      if (group) {
        group.end = word.end;
        group.tokens += tokens;
      } else {
        group = { start: word.start, end: word.end, tokens };
      }
    }

    if (group) parts.push(text.slice(group.start, group.end));
    return parts;
  }
}

const WORD_OR_PUNCT = /[\p{L}\p{N}_]+|[^\p{L}\p{N}_\s]/gu;

/** Approximate counter: every word and every punctuation character is one token. */
export class SimpleTokenStrategy extends BaseTokenStrategy {
  readonly name = "simple" as const;

  count(text: string): number {
    if (!text) return 0;
    return text.match(WORD_OR_PUNCT)?.length ?? 0;
  }
}

/** Exact BPE counting. cl100k_base matches text-embedding-3-* and GPT-4 models. */
export class TiktokenStrategy extends BaseTokenStrategy {
  readonly name = "tiktoken" as const;
  private readonly encoding: Tiktoken;

  constructor(segmenter: SentenceSegmenter, encodingName: TiktokenEncodingName = "cl100k_base") {
    super(segmenter);
    this.encoding = getEncoding(encodingName);
  }

  count(text: string): number {
    if (!text) return 0;
    return this.encoding.encode(text).length;
  }
}

export interface StrategySettings {
  strategy: TokenStrategyName;
  segmenter: SentenceSegmenterName;
  encoding: TiktokenEncodingName;
}

export const DEFAULT_STRATEGY_SETTINGS: StrategySettings = {
  strategy: "simple",
  segmenter: "simple",
  encoding: "cl100k_base",
};

/** Builds a strategy. An encoding that cannot be loaded degrades to the simple counter with a warning. */
export function createTokenStrategy(
  settings: StrategySettings = DEFAULT_STRATEGY_SETTINGS,
  logger?: Logger,
): TokenStrategy {
  const segmenter = createSentenceSegmenter(settings.segmenter, { logger });

  switch (settings.strategy) {
    case "simple":
      return new SimpleTokenStrategy(segmenter);
    case "tiktoken":
      try {
        return new TiktokenStrategy(segmenter, settings.encoding);
      } catch (error) {
        logger?.warn("Tokenizer unavailable, falling back to simple token counting", {
          encoding: settings.encoding,
          error: error instanceof Error ? error.message : String(error),
        });
        return new SimpleTokenStrategy(segmenter);
      }
    default: {
      const unknown: never = settings.strategy;
      throw new Error(`Unknown token strategy: ${String(unknown)}`);
    }
  }
}

function settingsKey(settings: StrategySettings): string {
  return `${settings.strategy}/${settings.segmenter}/${settings.encoding}`;
}

/**
 * Per-worker strategy holder. Rebuilds its instance whenever the requested settings
 * differ from the ones it was built with.
 */
export class StrategyCache {
  private current: { key: string; strategy: TokenStrategy } | null = null;

  constructor(private readonly logger?: Logger) {}

  get(settings: StrategySettings): TokenStrategy {
    const key = settingsKey(settings);
    if (this.current && this.current.key === key) return this.current.strategy;

    const strategy = createTokenStrategy(settings, this.logger);
    this.current = { key, strategy };
    return strategy;
  }
}
