import type { Difficulty } from "@/types/study";
import { loadStudyConfig, type StudyConfig } from "./config";
import { DocumentIndex } from "./document-index";
import { HashingEmbedder, OpenAIEmbedder, type Embedder } from "./embeddings";
import { DocumentExtractor, type TextExtractor } from "./extraction";
import { AnswerGrader } from "./grading";
import { OpenAICompletionClient, type CompletionClient } from "./llm";
import { MasteryTracker } from "./mastery";
import { exportProgress, importProgress, type ImportStrategy } from "./progress-io";
import { InMemoryProgressStore, type ProgressStore } from "./progress-store";
import { QuestionGenerator } from "./question-generator";
import { RateLimiter } from "./rate";
import { RetrievalAssembler } from "./retrieval";
import { validateSubjectTopic } from "./sanitize";
import { SessionOrchestrator } from "./session";
import { SupabaseProgressStore } from "./supabase-progress-store";

export type StudyEngineOverrides = {
  llm?: CompletionClient;
  embedder?: Embedder;
  extractor?: TextExtractor;
  store?: ProgressStore;
  now?: () => number;
  random?: () => number;
};

function pickEmbedder(config: StudyConfig): Embedder {
  if (config.embeddings.provider === "hashing") {
    return new HashingEmbedder(config.embeddings.dimensions);
  }
  return new OpenAIEmbedder({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL,
    model: config.embeddings.model,
    dimensions: config.embeddings.dimensions,
  });
}

function pickStore(config: StudyConfig): ProgressStore {
  const { url, serviceKey } = config.supabase;
  if (url && serviceKey) return SupabaseProgressStore.fromEnv(url, serviceKey);
  console.info("[engine] no Supabase credentials, keeping progress in memory");
  return new InMemoryProgressStore();
}

/** Wire every collaborator from config; overrides replace the external services. */
export function createStudyEngine(config: StudyConfig = loadStudyConfig(), overrides: StudyEngineOverrides = {}) {
  const now = overrides.now ?? Date.now;
  const store = overrides.store ?? pickStore(config);
  const llm = overrides.llm ?? new OpenAICompletionClient({ apiKey: config.llm.apiKey, baseURL: config.llm.baseURL });
  const labelLimits = {
    maxSubjectChars: config.session.maxSubjectChars,
    maxTopicChars: config.session.maxTopicChars,
  };

  const index = new DocumentIndex({
    embedder: overrides.embedder ?? pickEmbedder(config),
    extractor: overrides.extractor ?? new DocumentExtractor(),
    chunking: {
      chunkWords: config.ingestion.chunkWords,
      overlapWords: config.ingestion.overlapWords,
      maxChunkChars: config.ingestion.maxChunkChars,
      maxChunks: config.ingestion.maxChunksPerDocument,
    },
    maxTextChars: config.ingestion.maxTextChars,
    embeddingTimeoutMs: config.ingestion.embeddingTimeoutMs,
    now,
  });
  const assembler = new RetrievalAssembler(index, config.retrieval);
  const limiter = new RateLimiter({ ...config.rate, now });
  const generator = new QuestionGenerator({
    llm,
    model: config.llm.model,
    limiter,
    maxPromptChars: config.rate.maxPromptChars,
    maxRetries: config.generation.maxRetries,
    timeoutMs: config.generation.timeoutMs,
    shuffleChoices: config.generation.shuffleChoices,
    random: overrides.random,
    now,
  });
  const grader = new AnswerGrader(generator);
  const tracker = new MasteryTracker(store, config.mastery, now);
  const sessions = new SessionOrchestrator({
    generator,
    grader,
    tracker,
    store,
    assembler,
    limits: { maxQuestions: config.session.maxQuestions, durationMs: config.session.durationMs },
    labelLimits,
    recentQuestions: config.generation.recentQuestions,
    now,
  });

  return {
    config,
    store,
    index,
    assembler,
    limiter,
    generator,
    grader,
    tracker,
    sessions,
    async explainConcept(userId: string, subject: string, topic: string, difficulty?: Difficulty) {
      const labels = validateSubjectTopic(subject, topic, labelLimits);
      const level =
        difficulty ?? (await tracker.getRecord(userId, labels.subject, labels.topic))?.difficulty ?? "beginner";
      return generator.explainConcept(userId, labels.subject, labels.topic, level);
    },
    exportProgress: (userId: string) => exportProgress(store, userId, now),
    importProgress: (userId: string, input: unknown, strategy?: ImportStrategy) =>
      importProgress(store, userId, input, strategy),
  };
}

export type StudyEngine = ReturnType<typeof createStudyEngine>;
