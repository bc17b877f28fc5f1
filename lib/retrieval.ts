import type { RetrievedChunk } from "@/types/study";
import type { DocumentIndex } from "./document-index";
import { EmbeddingError } from "./errors";

export type GroundingContext = {
  /** Chunks kept, highest similarity first. */
  chunks: RetrievedChunk[];
  text: string;
};

const SEPARATOR = "\n---\n";

export function renderGrounding(chunks: readonly RetrievedChunk[]): string {
  return chunks.map((c, i) => `[${i + 1}] ${c.text.trim()}`).join(SEPARATOR);
}

/**
 * Drop the lowest-similarity chunks until the rendered block fits `maxChars`.
 * The best chunk is shortened rather than dropped when it alone is too long.
 * Chunks must already be in similarity order.
 */
export function fitChunksToBudget(chunks: readonly RetrievedChunk[], maxChars: number): RetrievedChunk[] {
  const kept = [...chunks];
  while (kept.length > 1 && renderGrounding(kept).length > maxChars) {
    kept.pop();
  }
  if (kept.length === 1 && renderGrounding(kept).length > maxChars) {
    const room = maxChars - renderGrounding([{ ...kept[0], text: "" }]).length;
    if (room < 1) return [];
    kept[0] = { ...kept[0], text: kept[0].text.trim().slice(0, room) };
  }
  return kept;
}

export type RetrievalAssemblerOptions = {
  topK: number;
  maxContextChars: number;
};

export class RetrievalAssembler {
  constructor(
    private readonly index: DocumentIndex,
    private readonly opts: RetrievalAssemblerOptions
  ) {}

  /**
   * Build a grounding block for `topic` from the learner's material in
   * `subject`. Returns null when there is nothing to ground on, in which case
   * generation proceeds ungrounded.
   */
  async assemble(
    userId: string,
    subject: string,
    topic: string,
    documentScope?: readonly string[] | null
  ): Promise<GroundingContext | null> {
    let retrieved: RetrievedChunk[];
    try {
      retrieved = await this.index.query(userId, `${subject}: ${topic}`, subject, this.opts.topK, documentScope);
    } catch (err) {
      if (!(err instanceof EmbeddingError)) throw err;
      console.warn("[retrieval] query embedding failed, continuing without grounding", {
        subject,
        topic,
        message: err.message,
      });
      return null;
    }

    const chunks = fitChunksToBudget(retrieved, this.opts.maxContextChars);
    if (chunks.length < retrieved.length) {
      console.log("[retrieval] trimmed grounding to budget", {
        retrieved: retrieved.length,
        kept: chunks.length,
        budget: this.opts.maxContextChars,
      });
    }
    if (!chunks.length) return null;
    return { chunks, text: renderGrounding(chunks) };
  }
}
