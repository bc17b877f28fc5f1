/**
 * Study engine configuration
 *
 * Every knob is read from the environment and clamped into a sane range, so a
 * typo in a deployment falls back to the documented default instead of
 * producing a zero-sized window or an unbounded prompt.
 */

export type Env = Record<string, string | undefined>;

export type EmbeddingProvider = "openai" | "hashing";

export interface StudyConfig {
  rate: {
    windowMs: number;
    maxCalls: number;
    maxPromptChars: number;
  };
  ingestion: {
    maxChunksPerDocument: number;
    maxTextChars: number;
    maxChunkChars: number;
    chunkWords: number;
    overlapWords: number;
    embeddingTimeoutMs: number;
  };
  retrieval: {
    topK: number;
    maxContextChars: number;
  };
  mastery: {
    windowSize: number;
    decay: number;
    thresholdUp: number;
    thresholdDown: number;
  };
  generation: {
    maxRetries: number;
    timeoutMs: number;
    recentQuestions: number;
    shuffleChoices: boolean;
  };
  session: {
    durationMs: number;
    maxQuestions: number;
    maxSubjectChars: number;
    maxTopicChars: number;
  };
  llm: {
    baseURL: string;
    apiKey: string;
    model: string;
  };
  embeddings: {
    provider: EmbeddingProvider;
    model: string;
    dimensions: number;
  };
  supabase: {
    url: string | null;
    serviceKey: string | null;
  };
}

function readNumber(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key];
  const parsed = Number(raw ?? String(fallback));
  const value = Number.isFinite(parsed) && raw !== "" ? parsed : fallback;
  return Math.min(max, Math.max(min, value));
}

function readInt(env: Env, key: string, fallback: number, min: number, max: number): number {
  return Math.floor(readNumber(env, key, fallback, min, max));
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw && raw.length > 0 ? raw : fallback;
}

export function loadStudyConfig(env: Env = process.env): StudyConfig {
  const provider = readString(env, "STUDY_EMBEDDING_PROVIDER", "openai");
  return {
    rate: {
      windowMs: readInt(env, "STUDY_RATE_WINDOW_MS", 60_000, 1_000, 3_600_000),
      maxCalls: readInt(env, "STUDY_RATE_MAX_CALLS", 30, 1, 10_000),
      maxPromptChars: readInt(env, "STUDY_MAX_PROMPT_CHARS", 5000, 500, 200_000),
    },
    ingestion: {
      maxChunksPerDocument: readInt(env, "STUDY_MAX_CHUNKS_PER_DOCUMENT", 1000, 1, 100_000),
      maxTextChars: readInt(env, "STUDY_MAX_TEXT_CHARS", 10 * 1024 * 1024, 1_000, 100 * 1024 * 1024),
      maxChunkChars: readInt(env, "STUDY_MAX_CHUNK_CHARS", 1500, 100, 50_000),
      chunkWords: readInt(env, "STUDY_CHUNK_WORDS", 200, 10, 5_000),
      overlapWords: readInt(env, "STUDY_CHUNK_OVERLAP_WORDS", 30, 0, 1_000),
      embeddingTimeoutMs: readInt(env, "STUDY_EMBEDDING_TIMEOUT_MS", 15_000, 100, 300_000),
    },
    retrieval: {
      topK: readInt(env, "STUDY_RETRIEVAL_TOP_K", 3, 1, 50),
      maxContextChars: readInt(env, "STUDY_MAX_CONTEXT_CHARS", 2500, 100, 100_000),
    },
    mastery: {
      windowSize: readInt(env, "STUDY_MASTERY_WINDOW", 5, 1, 100),
      decay: readNumber(env, "STUDY_MASTERY_DECAY", 0.7, 0.01, 1),
      thresholdUp: readInt(env, "STUDY_THRESHOLD_UP", 3, 1, 50),
      thresholdDown: readInt(env, "STUDY_THRESHOLD_DOWN", 2, 1, 50),
    },
    generation: {
      maxRetries: readInt(env, "STUDY_GENERATION_RETRIES", 2, 0, 10),
      timeoutMs: readInt(env, "STUDY_LLM_TIMEOUT_MS", 30_000, 100, 600_000),
      recentQuestions: readInt(env, "STUDY_RECENT_QUESTIONS", 5, 0, 50),
      shuffleChoices: env.STUDY_SHUFFLE_CHOICES !== "false",
    },
    session: {
      durationMs: readInt(env, "STUDY_SESSION_MINUTES", 30, 1, 24 * 60) * 60_000,
      maxQuestions: readInt(env, "STUDY_QUESTIONS_PER_SESSION", 15, 1, 1_000),
      maxSubjectChars: readInt(env, "STUDY_MAX_SUBJECT_CHARS", 100, 1, 1_000),
      maxTopicChars: readInt(env, "STUDY_MAX_TOPIC_CHARS", 100, 1, 1_000),
    },
    llm: {
      baseURL: readString(env, "STUDY_LLM_BASE_URL", "https://api.openai.com/v1"),
      apiKey: env.STUDY_LLM_API_KEY ?? env.OPENAI_API_KEY ?? "",
      model: readString(env, "STUDY_LLM_MODEL", "gpt-4o-mini"),
    },
    embeddings: {
      provider: provider === "hashing" ? "hashing" : "openai",
      model: readString(env, "STUDY_EMBEDDING_MODEL", "text-embedding-3-small"),
      dimensions: readInt(env, "STUDY_EMBEDDING_DIMENSIONS", 256, 8, 4096),
    },
    supabase: {
      url: env.SUPABASE_URL?.trim() || null,
      serviceKey: env.SUPABASE_SERVICE_ROLE_KEY?.trim() || null,
    },
  };
}
