import type { Logger } from "../logger.js";

export type SentenceSegmenterName = "simple" | "intl";

/** One sentence and where it sits in the segmented text (`end` exclusive, whitespace trimmed). */
export interface TextSpan {
  text: string;
  start: number;
  end: number;
}

export interface SentenceSegmenter {
  readonly name: SentenceSegmenterName;
  /** Trimmed, non-empty sentences in reading order. Terminal punctuation stays with its sentence. */
  split(text: string): string[];
  spans(text: string): TextSpan[];
}

const SENTENCE_BOUNDARY = /(?<=[.!?…])\s+/gu;
const WHITESPACE = /\s/u;

/** `text[start, end)` without its surrounding whitespace, or null when nothing is left. */
export function trimmedSpan(text: string, start: number, end: number): TextSpan | null {
  let s = start;
  let e = end;
  while (s < e && WHITESPACE.test(text[s])) s++;
  while (e > s && WHITESPACE.test(text[e - 1])) e--;
  return s < e ? { text: text.slice(s, e), start: s, end: e } : null;
}

/** Whitespace-separated words of `text[within]`, positioned in `text`. */
export function wordSpans(text: string, within: TextSpan): TextSpan[] {
  const out: TextSpan[] = [];
  const re = /\S+/gu;
  for (let m = re.exec(within.text); m !== null; m = re.exec(within.text)) {
    const start = within.start + m.index;
    out.push({ text: m[0], start, end: start + m[0].length });
  }
  return out;
}

export class RuleBasedSegmenter implements SentenceSegmenter {
  readonly name = "simple" as const;

  split(text: string): string[] {
    return this.spans(text).map((s) => s.text);
  }

  spans(text: string): TextSpan[] {
    const out: TextSpan[] = [];
    const re = new RegExp(SENTENCE_BOUNDARY.source, SENTENCE_BOUNDARY.flags);
    let start = 0;
    for (let m = re.exec(text); m !== null; m = re.exec(text)) {
      const span = trimmedSpan(text, start, m.index);
      if (span) out.push(span);
      start = m.index + m[0].length;
    }
    const last = trimmedSpan(text, start, text.length);
    if (last) out.push(last);
    return out;
  }
}

/** Unicode sentence segmentation via `Intl.Segmenter`; also splits scripts written without spaces. */
export class IntlSegmenter implements SentenceSegmenter {
  readonly name = "intl" as const;
  private readonly segmenter: Intl.Segmenter;

  constructor(locale?: string) {
    this.segmenter = new Intl.Segmenter(locale, { granularity: "sentence" });
  }

  split(text: string): string[] {
    return this.spans(text).map((s) => s.text);
  }

  spans(text: string): TextSpan[] {
    const out: TextSpan[] = [];
    for (const { segment, index } of this.segmenter.segment(text)) {
      const span = trimmedSpan(text, index, index + segment.length);
      if (span) out.push(span);
    }
    return out;
  }
}

export function createSentenceSegmenter(
  name: SentenceSegmenterName,
  options: { locale?: string; logger?: Logger } = {},
): SentenceSegmenter {
  if (name === "intl") {
    if (typeof Intl.Segmenter === "function") {
      return new IntlSegmenter(options.locale);
    }
    options.logger?.warn("Intl.Segmenter unavailable, falling back to rule-based sentence splitting");
  }
  return new RuleBasedSegmenter();
}
