import { describe, expect, it } from "vitest";
import { HashingEmbedder, cosineSimilarity } from "./embeddings";
import { EmbeddingError } from "./errors";

describe("cosineSimilarity", () => {
  it("scores identical, orthogonal and opposite vectors", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1);
  });

  it("returns 0 for a zero vector and throws on a dimension mismatch", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(() => cosineSimilarity([1], [1, 2])).toThrow("cannot compare vectors of dimension 1 and 2");
    expect(() => cosineSimilarity([], [])).toThrow(EmbeddingError);
  });
});

describe("HashingEmbedder", () => {
  it("is deterministic and case-insensitive", async () => {
    const embedder = new HashingEmbedder(64);
    const a = await embedder.embed("Mitochondria produce ATP");
    const b = await embedder.embed("mitochondria PRODUCE atp");
    expect(a).toHaveLength(64);
    expect(a).toEqual(b);
    expect(embedder.model).toBe("hashing-64");
  });

  it("refuses text without words", async () => {
    await expect(new HashingEmbedder().embed(" ... ")).rejects.toBeInstanceOf(EmbeddingError);
  });
});
