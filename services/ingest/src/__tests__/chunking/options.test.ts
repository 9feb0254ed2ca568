import { describe, it, expect } from "vitest";
import { resolveChunkingOptions } from "../../chunking/options.js";
import { ConfigError } from "../../errors.js";

describe("resolveChunkingOptions", () => {
  it("fills defaults", () => {
    expect(resolveChunkingOptions()).toEqual({
      chunkSize: 512,
      chunkOverlap: 0,
      maxHeadingLevels: 2,
      includePageTag: true,
      includeSectionTag: true,
      idPrefix: "WIKI",
    });
  });

  it("fills only the fields left undefined", () => {
    expect(resolveChunkingOptions({ chunkSize: 100, chunkOverlap: undefined })).toMatchObject({
      chunkSize: 100,
      chunkOverlap: 0,
    });
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => resolveChunkingOptions({ chunkSize: 100, chunkOverlap: 100 })).toThrow(
      "Invalid chunking options: chunkOverlap: must be smaller than chunkSize",
    );
  });

  it("reports each invalid field by name", () => {
    try {
      resolveChunkingOptions({ chunkSize: 10.5, chunkOverlap: -1, maxHeadingLevels: 0, idPrefix: "" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        const fields = error.issues.map((issue) => issue.slice(0, issue.indexOf(":")));
        expect(fields).toEqual(
          expect.arrayContaining(["chunkSize", "chunkOverlap", "maxHeadingLevels", "idPrefix"]),
        );
      }
    }
  });
});
