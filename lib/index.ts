export * from "@/types/study";
export { loadStudyConfig } from "./config";
export type { Env, EmbeddingProvider, StudyConfig } from "./config";
export {
  EmbeddingError,
  ExtractionError,
  GenerationError,
  ImportValidationError,
  InvalidInputError,
  PromptTooLargeError,
  RateLimitExceededError,
  StateError,
  StudyError,
  UnavailableError,
  UnsupportedFormatError,
  toUserFacingError,
} from "./errors";
export type { GenerationFailureReason, ImportIssue, StudyErrorCode, UserFacingError } from "./errors";
export { createStudyEngine } from "./engine";
export type { StudyEngine, StudyEngineOverrides } from "./engine";
export { SessionOrchestrator, summarizeSession } from "./session";
export type { AnswerResult, StartSessionInput, StudyEventListener, TurnResult } from "./session";
export { MasteryTracker, evaluateMastery, DEFAULT_MASTERY_POLICY, MASTERED_SCORE } from "./mastery";
export type { MasteryOutcome, MasteryPolicy, SubjectProgress, TopicProgress } from "./mastery";
export { QuestionGenerator } from "./question-generator";
export type { GenerateQuestionInput } from "./question-generator";
export { AnswerGrader } from "./grading";
export type { GradeResult } from "./grading";
export { DocumentIndex } from "./document-index";
export { RetrievalAssembler } from "./retrieval";
export type { GroundingContext } from "./retrieval";
export { RateLimiter } from "./rate";
export type { RateDecision } from "./rate";
export { HashingEmbedder, OpenAIEmbedder, cosineSimilarity } from "./embeddings";
export type { Embedder } from "./embeddings";
export {
  DocumentExtractor,
  DocxTextExtractor,
  PdfTextExtractor,
  PlainTextExtractor,
  detectFormat,
} from "./extraction";
export type { TextExtractor } from "./extraction";
export { OpenAICompletionClient } from "./llm";
export type { CompletionClient, CompletionOptions } from "./llm";
export { InMemoryProgressStore } from "./progress-store";
export type { ImportPlan, ProgressStore } from "./progress-store";
export { SupabaseProgressStore } from "./supabase-progress-store";
export { exportProgress, importProgress } from "./progress-io";
export type { ImportResult, ImportStrategy } from "./progress-io";
