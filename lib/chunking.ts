export type ChunkingOptions = {
  /** Words per chunk before the character cap applies. */
  chunkWords: number;
  /** Words shared between neighbouring chunks. */
  overlapWords: number;
  maxChunkChars: number;
  maxChunks: number;
};

export type ChunkingResult = {
  chunks: string[];
  /** True when content was dropped to respect `maxChunks`. */
  truncated: boolean;
};

/**
 * Split text into overlapping word windows. A window that would exceed
 * `maxChunkChars` is cut at the last whole word that fits; a single word longer
 * than the cap is hard-split.
 */
export function chunkText(text: string, opts: ChunkingOptions): ChunkingResult {
  const words = text.split(/\s+/).filter(Boolean);
  const chunkWords = Math.max(1, opts.chunkWords);
  const overlap = Math.min(Math.max(0, opts.overlapWords), chunkWords - 1);

  const chunks: string[] = [];
  let start = 0;
  while (start < words.length) {
    if (chunks.length >= opts.maxChunks) {
      return { chunks, truncated: true };
    }

    const window = words.slice(start, start + chunkWords);
    let taken = 0;
    let length = 0;
    for (const word of window) {
      const next = length === 0 ? word.length : length + 1 + word.length;
      if (next > opts.maxChunkChars) break;
      length = next;
      taken += 1;
    }

    if (taken === 0) {
      // oversized token: emit a hard slice and keep the remainder for the next round
      const word = window[0];
      chunks.push(word.slice(0, opts.maxChunkChars));
      words[start] = word.slice(opts.maxChunkChars);
      continue;
    }

    chunks.push(window.slice(0, taken).join(" "));
    if (start + taken >= words.length) break;
    // only overlap when the window made real progress past the overlap region
    start += taken > overlap ? taken - overlap : taken;
  }

  return { chunks, truncated: false };
}
