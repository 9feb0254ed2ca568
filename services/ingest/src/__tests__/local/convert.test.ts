import { describe, it, expect } from "vitest";
import { localFileToHtml } from "../../local/convert.js";

describe("localFileToHtml", () => {
  it("passes HTML through", () => {
    expect(localFileToHtml("<p>x</p>", ".HTML")).toBe("<p>x</p>");
    expect(localFileToHtml("<p>x</p>", ".htm")).toBe("<p>x</p>");
  });

  it("converts markdown headings, paragraphs and lists", () => {
    const md = ["## Setup", "", "Install it.", "- one", "* two", "1. three", "", "Done & dusted"].join("\n");
    expect(localFileToHtml(md, ".md")).toBe(
      [
        "<h2>Setup</h2>",
        "<p>Install it.</p>",
        "<ul><li>one</li><li>two</li><li>three</li></ul>",
        "<p>Done &amp; dusted</p>",
      ].join("\n"),
    );
  });

  it("escapes fenced code", () => {
    const md = ["```ts", "a < b", "```"].join("\n");
    expect(localFileToHtml(md, ".md")).toBe("<pre><code>a &lt; b</code></pre>");
  });

  it("closes an unterminated fence", () => {
    expect(localFileToHtml("```\nlet x = 1;", ".md")).toBe("<pre><code>let x = 1;</code></pre>");
  });

  it("wraps plain text paragraphs", () => {
    expect(localFileToHtml("First line\nsame para\n\n\nSecond <b>", ".txt")).toBe(
      "<p>First line\nsame para</p>\n<p>Second &lt;b&gt;</p>",
    );
  });
});
