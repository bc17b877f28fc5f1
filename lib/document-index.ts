import { createHash, randomUUID } from "crypto";
import type { Chunk, IngestionOutcome, RetrievedChunk, StudyDocument } from "@/types/study";
import { Mutex, TimeoutError, withTimeout } from "./async";
import { chunkText, type ChunkingOptions } from "./chunking";
import { cosineSimilarity, type Embedder } from "./embeddings";
import { EmbeddingError } from "./errors";
import type { TextExtractor } from "./extraction";

type StoredChunk = Chunk & { vector: number[] };

export type DocumentIndexOptions = {
  embedder: Embedder;
  extractor?: TextExtractor;
  chunking: ChunkingOptions;
  maxTextChars: number;
  embeddingTimeoutMs: number;
  /** Parallel embedding requests during ingestion. */
  embedConcurrency?: number;
  now?: () => number;
};

export type IngestTextInput = { subject: string; name: string; text: string };
export type IngestFileInput = { subject: string; name: string; bytes: Uint8Array; declaredType: string };

export function hashText(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

/**
 * In-process vector index over ingested study material.
 *
 * Writers (ingest/delete) run one at a time behind a mutex and publish a new
 * chunk array when done; readers work on whichever array was current when the
 * query started, so similarity queries never wait on ingestion.
 */
export class DocumentIndex {
  private readonly embedder: Embedder;
  private readonly extractor: TextExtractor | null;
  private readonly opts: DocumentIndexOptions;
  private readonly writeLock = new Mutex();
  private readonly now: () => number;
  private documents = new Map<string, StudyDocument>();
  private chunks: readonly StoredChunk[] = [];
  private dimension: number | null = null;
  private seq = 0;

  constructor(opts: DocumentIndexOptions) {
    this.opts = opts;
    this.embedder = opts.embedder;
    this.extractor = opts.extractor ?? null;
    this.now = opts.now ?? Date.now;
  }

  get dimensions(): number | null {
    return this.dimension;
  }

  get embeddingModel(): string {
    return this.embedder.model;
  }

  async ingestDocument(userId: string, input: IngestFileInput): Promise<IngestionOutcome> {
    if (!this.extractor) {
      throw new Error("DocumentIndex was created without a text extractor");
    }
    // extraction failures abort the whole document before any chunk exists
    const text = await this.extractor.extract(input.bytes, input.declaredType);
    return this.ingestText(userId, { subject: input.subject, name: input.name, text });
  }

  async ingestText(userId: string, input: IngestTextInput): Promise<IngestionOutcome> {
    let text = input.text;
    let truncated = false;
    if (text.length > this.opts.maxTextChars) {
      console.warn("[document-index] text too large, truncating", {
        name: input.name,
        length: text.length,
        limit: this.opts.maxTextChars,
      });
      text = text.slice(0, this.opts.maxTextChars);
      truncated = true;
    }

    const contentHash = hashText(text);
    const existing = this.findComplete(userId, input.subject, contentHash);
    if (existing) {
      console.log("[document-index] duplicate upload, reusing document", {
        documentId: existing.id,
        hash: contentHash.substring(0, 12) + "...",
      });
      return { documentId: existing.id, chunksCreated: 0, chunksSkipped: 0, truncated, duplicate: true };
    }

    const chunked = chunkText(text, this.opts.chunking);
    if (chunked.truncated) {
      console.warn("[document-index] chunk limit reached, dropping remaining content", {
        name: input.name,
        maxChunks: this.opts.chunking.maxChunks,
      });
      truncated = true;
    }

    const vectors = await this.embedAll(chunked.chunks);

    return this.writeLock.runExclusive(() => {
      const raced = this.findComplete(userId, input.subject, contentHash);
      if (raced) {
        return { documentId: raced.id, chunksCreated: 0, chunksSkipped: 0, truncated, duplicate: true };
      }

      // an earlier upload of this text lost chunks; replace it under the same id
      const retried = this.findByHash(userId, input.subject, contentHash);
      const documentId = retried?.id ?? randomUUID();
      if (retried) {
        this.chunks = this.chunks.filter((c) => c.documentId !== retried.id);
        console.log("[document-index] re-embedding incomplete document", {
          documentId,
          previouslySkipped: retried.chunksSkipped,
        });
      }
      const stored: StoredChunk[] = [];
      let skipped = 0;
      chunked.chunks.forEach((body, ordinal) => {
        const vector = vectors[ordinal];
        if (!vector) {
          skipped += 1;
          return;
        }
        if (this.dimension === null) this.dimension = vector.length;
        if (vector.length !== this.dimension) {
          console.warn("[document-index] embedding dimension mismatch, skipping chunk", {
            expected: this.dimension,
            got: vector.length,
            ordinal,
          });
          skipped += 1;
          return;
        }
        this.seq += 1;
        stored.push({
          id: `${documentId}:${ordinal}`,
          documentId,
          userId,
          subject: input.subject,
          ordinal,
          text: body,
          seq: this.seq,
          vector,
        });
      });

      const document: StudyDocument = {
        id: documentId,
        userId,
        subject: input.subject,
        name: input.name,
        contentHash,
        ingestedAt: new Date(this.now()).toISOString(),
        chunkIds: stored.map((c) => c.id),
        chunksSkipped: skipped,
      };
      this.documents.set(documentId, document);
      this.chunks = [...this.chunks, ...stored];

      console.log("[document-index] ingested", {
        documentId,
        name: input.name,
        created: stored.length,
        skipped,
        truncated,
      });

      return { documentId, chunksCreated: stored.length, chunksSkipped: skipped, truncated, duplicate: false };
    });
  }

  /**
   * Top-k chunks by cosine similarity within one subject (optionally a subset of
   * documents). Ties go to the most recently ingested chunk.
   */
  async query(
    userId: string,
    topicText: string,
    subject: string,
    k: number,
    documentIds?: readonly string[] | null
  ): Promise<RetrievedChunk[]> {
    if (k <= 0) return [];
    const scope = documentIds && documentIds.length ? new Set(documentIds) : null;
    const candidates = this.chunks.filter(
      (c) => c.userId === userId && c.subject === subject && (!scope || scope.has(c.documentId))
    );
    if (!candidates.length) return [];

    const queryVector = await this.embedOne(topicText);
    if (queryVector.length !== this.dimension) {
      throw new EmbeddingError(`query embedding has ${queryVector.length} dimensions, index has ${this.dimension}`);
    }

    return candidates
      .map((c) => ({ chunk: c, similarity: cosineSimilarity(queryVector, c.vector) }))
      .sort((a, b) => b.similarity - a.similarity || b.chunk.seq - a.chunk.seq)
      .slice(0, k)
      .map(({ chunk, similarity }) => ({
        chunkId: chunk.id,
        documentId: chunk.documentId,
        text: chunk.text,
        similarity,
      }));
  }

  async deleteDocument(userId: string, documentId: string): Promise<boolean> {
    return this.writeLock.runExclusive(() => {
      const doc = this.documents.get(documentId);
      if (!doc || doc.userId !== userId) return false;
      this.documents.delete(documentId);
      this.chunks = this.chunks.filter((c) => c.documentId !== documentId);
      console.log("[document-index] deleted", { documentId, chunks: doc.chunkIds.length });
      return true;
    });
  }

  listDocuments(userId: string, subject?: string): StudyDocument[] {
    return [...this.documents.values()].filter(
      (d) => d.userId === userId && (subject === undefined || d.subject === subject)
    );
  }

  chunkCount(userId: string, subject?: string): number {
    return this.chunks.filter((c) => c.userId === userId && (subject === undefined || c.subject === subject)).length;
  }

  private findByHash(userId: string, subject: string, contentHash: string): StudyDocument | null {
    for (const doc of this.documents.values()) {
      if (doc.userId === userId && doc.subject === subject && doc.contentHash === contentHash) return doc;
    }
    return null;
  }

  // Only a fully embedded document counts as a duplicate.
  private findComplete(userId: string, subject: string, contentHash: string): StudyDocument | null {
    const doc = this.findByHash(userId, subject, contentHash);
    return doc && doc.chunksSkipped === 0 ? doc : null;
  }

  private async embedOne(text: string): Promise<number[]> {
    try {
      return await withTimeout(this.embedder.embed(text), this.opts.embeddingTimeoutMs, "embedding");
    } catch (err) {
      if (err instanceof EmbeddingError) throw err;
      if (err instanceof TimeoutError) throw new EmbeddingError(err.message, { cause: err });
      throw new EmbeddingError("embedding failed", { cause: err });
    }
  }

  // Failed chunks come back as null and are left out of the corpus.
  private async embedAll(texts: string[]): Promise<(number[] | null)[]> {
    const results: (number[] | null)[] = new Array<number[] | null>(texts.length).fill(null);
    const batch = Math.max(1, this.opts.embedConcurrency ?? 8);
    for (let i = 0; i < texts.length; i += batch) {
      const settled = await Promise.allSettled(texts.slice(i, i + batch).map((t) => this.embedOne(t)));
      settled.forEach((outcome, offset) => {
        if (outcome.status === "fulfilled") {
          results[i + offset] = outcome.value;
        } else {
          console.warn("[document-index] chunk embedding failed, skipping", {
            ordinal: i + offset,
            message: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
          });
        }
      });
    }
    return results;
  }
}
