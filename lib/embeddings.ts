import { createHash } from "crypto";
import OpenAI from "openai";
import { EmbeddingError } from "./errors";

export interface Embedder {
  /** Stable identifier; an index never mixes vectors from two models. */
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

const MAX_EMBED_CHARS = 8000;

/**
 * OpenAI-compatible embedder (text-embedding-3-small by default), optimized
 * for cost and speed while keeping retrieval quality.
 */
export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly dimensions: number | undefined;

  constructor(opts: { client?: OpenAI; apiKey?: string; baseURL?: string; model?: string; dimensions?: number } = {}) {
    this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
    this.model = opts.model ?? "text-embedding-3-small";
    this.dimensions = opts.dimensions;
  }

  async embed(text: string): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new EmbeddingError("Cannot generate embedding for empty text");
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: text.trim().slice(0, MAX_EMBED_CHARS),
        encoding_format: "float",
        ...(this.dimensions ? { dimensions: this.dimensions } : {}),
      });
      const vector = response.data[0]?.embedding;
      if (!vector || vector.length === 0) {
        throw new EmbeddingError("Embedding response contained no vector");
      }
      return vector;
    } catch (error) {
      if (error instanceof EmbeddingError) throw error;
      console.error("[embeddings] Failed to generate embedding:", error);
      throw new EmbeddingError("Embedding request failed", { cause: error });
    }
  }
}

/**
 * Offline embedder: hashes lowercase word unigrams into a fixed number of
 * signed buckets. Good enough for lexical overlap retrieval without a network.
 */
export class HashingEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;

  constructor(dimensions = 256) {
    this.dimensions = dimensions;
    this.model = `hashing-${dimensions}`;
  }

  async embed(text: string): Promise<number[]> {
    const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
    if (!tokens.length) {
      throw new EmbeddingError("Cannot generate embedding for empty text");
    }
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokens) {
      const digest = createHash("sha256").update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      const sign = (digest[4] & 1) === 0 ? 1 : -1;
      vector[bucket] += sign;
    }
    return vector;
  }
}

/** Cosine of the angle between two vectors of equal dimension; 0 when either has no length. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    throw new EmbeddingError(`cannot compare vectors of dimension ${a.length} and ${b.length}`);
  }

  let dot = 0;
  let squaresA = 0;
  let squaresB = 0;
  a.forEach((x, i) => {
    const y = b[i];
    dot += x * y;
    squaresA += x * x;
    squaresB += y * y;
  });

  const lengths = Math.sqrt(squaresA * squaresB);
  return lengths === 0 ? 0 : dot / lengths;
}
