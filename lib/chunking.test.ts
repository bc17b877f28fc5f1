import { describe, expect, it } from "vitest";
import { chunkText } from "./chunking";

const base = { chunkWords: 3, overlapWords: 1, maxChunkChars: 100, maxChunks: 10 };

describe("chunkText", () => {
  it("builds overlapping word windows", () => {
    expect(chunkText("a b c d e f g", base)).toEqual({
      chunks: ["a b c", "c d e", "e f g"],
      truncated: false,
    });
  });

  it("cuts a window at the last whole word under the character cap", () => {
    const result = chunkText("alpha beta gamma", { ...base, chunkWords: 10, overlapWords: 0, maxChunkChars: 10 });
    expect(result.chunks).toEqual(["alpha beta", "gamma"]);
  });

  it("hard-splits a single word longer than the cap", () => {
    const result = chunkText("abcdefghij", { ...base, chunkWords: 5, overlapWords: 0, maxChunkChars: 4 });
    expect(result.chunks).toEqual(["abcd", "efgh", "ij"]);
  });

  it("stops at the chunk limit and flags truncation", () => {
    expect(chunkText("a b c d e", { ...base, chunkWords: 1, overlapWords: 0, maxChunks: 2 })).toEqual({
      chunks: ["a", "b"],
      truncated: true,
    });
  });

  it("returns nothing for blank text", () => {
    expect(chunkText("  \n\t ", base)).toEqual({ chunks: [], truncated: false });
  });

  it("never exceeds the character cap", () => {
    const text = Array.from({ length: 300 }, (_, i) => `word${i}`).join(" ");
    const { chunks } = chunkText(text, { chunkWords: 50, overlapWords: 5, maxChunkChars: 120, maxChunks: 1000 });
    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) expect(chunk.length).toBeLessThanOrEqual(120);
  });
});
