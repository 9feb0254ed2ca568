import { describe, it, expect, vi, beforeEach } from "vitest";

const mockSdk = vi.hoisted(() => ({
  getCollections: vi.fn(),
  createCollection: vi.fn(),
  createPayloadIndex: vi.fn(),
  upsert: vi.fn(),
  delete: vi.fn(),
}));

vi.mock("@qdrant/js-client-rest", () => ({
  // Must use a regular function (not arrow) so it can be invoked with `new`
  QdrantClient: vi.fn(function () { return mockSdk; }),
}));

import { QdrantClient, pointId } from "../../qdrant/client.js";
import { twoChunkPage } from "../helpers/fixtures.js";

const defaultConfig = {
  url: "http://localhost:6333",
  collectionName: "test-collection",
  vectorSize: 4,
};

describe("pointId", () => {
  it("derives a stable UUID-shaped id from the chunk id", () => {
    expect(pointId("WIKI:p1:0-0")).toBe("aa91928d-62a1-847f-11ce-52323462427c");
    expect(pointId("WIKI:p1:0-0")).toBe(pointId("WIKI:p1:0-0"));
    expect(pointId("WIKI:p1:1-1")).not.toBe(pointId("WIKI:p1:0-0"));
  });
});

describe("QdrantClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("initCollection", () => {
    it("creates the collection and keyword indexes when it does not exist", async () => {
      mockSdk.getCollections.mockResolvedValue({ collections: [{ name: "other" }] });

      await new QdrantClient(defaultConfig).initCollection();

      expect(mockSdk.createCollection).toHaveBeenCalledWith("test-collection", {
        vectors: { size: 4, distance: "Cosine" },
      });
      expect(mockSdk.createPayloadIndex.mock.calls).toEqual([
        ["test-collection", { field_name: "pageId", field_schema: "keyword" }],
        ["test-collection", { field_name: "spaceKey", field_schema: "keyword" }],
      ]);
    });

    it("leaves an existing collection alone", async () => {
      mockSdk.getCollections.mockResolvedValue({ collections: [{ name: "test-collection" }] });

      await new QdrantClient(defaultConfig).initCollection();

      expect(mockSdk.createCollection).not.toHaveBeenCalled();
    });
  });

  describe("upsertChunks", () => {
    it("stores each chunk as payload under its point id", async () => {
      const { chunks } = twoChunkPage();

      await new QdrantClient(defaultConfig).upsertChunks(chunks, [[1, 0, 0, 0], [0, 1, 0, 0]]);

      expect(mockSdk.upsert).toHaveBeenCalledTimes(1);
      const [collection, body] = mockSdk.upsert.mock.calls[0];
      expect(collection).toBe("test-collection");
      expect(body.wait).toBe(true);
      expect(body.points).toEqual([
        { id: "aa91928d-62a1-847f-11ce-52323462427c", vector: [1, 0, 0, 0], payload: chunks[0] },
        { id: "b2fc30b9-4fed-9923-c73e-8a2811f3aef8", vector: [0, 1, 0, 0], payload: chunks[1] },
      ]);
    });

    it("upserts in batches of 100", async () => {
      const { chunks } = twoChunkPage();
      const many = Array.from({ length: 150 }, (_, i) => ({ ...chunks[0], chunkId: `WIKI:p1:${i}-${i}` }));

      await new QdrantClient(defaultConfig).upsertChunks(many, many.map(() => [0, 0, 0, 1]));

      expect(mockSdk.upsert).toHaveBeenCalledTimes(2);
      expect(mockSdk.upsert.mock.calls[1][1].points).toHaveLength(50);
    });

    it("rejects mismatched vectors", async () => {
      const { chunks } = twoChunkPage();
      await expect(new QdrantClient(defaultConfig).upsertChunks(chunks, [[1]])).rejects.toThrow(
        "Chunks and embeddings count mismatch",
      );
    });
  });

  describe("deletePageChunks", () => {
    it("deletes by pageId filter", async () => {
      await new QdrantClient(defaultConfig).deletePageChunks("p1");

      expect(mockSdk.delete).toHaveBeenCalledWith("test-collection", {
        wait: true,
        filter: { must: [{ key: "pageId", match: { value: "p1" } }] },
      });
    });
  });
});
