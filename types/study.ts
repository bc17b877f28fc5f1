// @/types/study.ts
export type Difficulty = "beginner" | "intermediate" | "advanced";

export const DIFFICULTIES: readonly Difficulty[] = ["beginner", "intermediate", "advanced"] as const;

export type QuestionType = "multiple_choice" | "short_answer" | "open_ended";

export type Question = {
  id: string;
  type: QuestionType;
  prompt: string;
  /** Multiple choice only. */
  choices?: string[];
  correctIndex?: number;
  /** Short answer only: any of these counts as correct after normalization. */
  acceptedAnswers?: string[];
  /** Open ended only: what the grader should look for. */
  rubric?: string;
  explanation: string;
  difficulty: Difficulty;
  /** Chunk ids the prompt was grounded on, empty when ungrounded. */
  groundingChunkIds: string[];
  createdAt: string;
};

export type QuestionAttempt = {
  question: Question;
  answer: string;
  correct: boolean;
  score: number;
  feedback: string | null;
  timeTakenMs: number | null;
  difficulty: Difficulty;
  answeredAt: string;
};

export type SessionStatus = "created" | "active" | "completed" | "expired";

export type DifficultyChange = {
  from: Difficulty;
  to: Difficulty;
  atQuestion: number;
  at: string;
  reason: "adaptive" | "restart";
};

export type SessionLimits = {
  maxQuestions: number;
  durationMs: number;
};

export type Session = {
  id: string;
  userId: string;
  subject: string;
  topic: string;
  difficulty: Difficulty;
  status: SessionStatus;
  /** True when the session was archived by a restart. */
  aborted: boolean;
  attempts: QuestionAttempt[];
  /** Question waiting for an answer, if any. */
  outstanding: Question | null;
  documentScope: string[] | null;
  limits: SessionLimits;
  startedAt: string;
  endedAt: string | null;
  restartCount: number;
  restartedFrom: string | null;
  difficultyChanges: DifficultyChange[];
};

export type SessionSummary = {
  id: string;
  subject: string;
  topic: string;
  difficulty: Difficulty;
  status: SessionStatus;
  aborted: boolean;
  questionsAnswered: number;
  questionsCorrect: number;
  accuracy: number;
  restartCount: number;
  startedAt: string;
  endedAt: string | null;
};

export type MasteryRecord = {
  userId: string;
  subject: string;
  topic: string;
  score: number;
  /** Recent verdicts, oldest first. */
  window: boolean[];
  difficulty: Difficulty;
  consecutiveCorrect: number;
  consecutiveIncorrect: number;
  attempts: number;
  correct: number;
  updatedAt: string;
};

export type StudyDocument = {
  id: string;
  userId: string;
  subject: string;
  name: string;
  contentHash: string;
  ingestedAt: string;
  chunkIds: string[];
  /** Chunks whose embedding failed; a re-upload of the same text retries the document. */
  chunksSkipped: number;
};

export type Chunk = {
  id: string;
  documentId: string;
  userId: string;
  subject: string;
  ordinal: number;
  text: string;
  /** Global ingestion order; higher is newer. */
  seq: number;
};

export type RetrievedChunk = {
  chunkId: string;
  documentId: string;
  text: string;
  similarity: number;
};

export type IngestionOutcome = {
  documentId: string;
  chunksCreated: number;
  chunksSkipped: number;
  truncated: boolean;
  duplicate: boolean;
};

export type MasteryUpdate = {
  record: MasteryRecord;
  previous: Difficulty;
  next: Difficulty;
};

export type StudyEvent =
  | { type: "session_started"; at: string; session: SessionSummary; userId: string }
  | { type: "question_asked"; at: string; sessionId: string; userId: string; question: Question }
  | {
      type: "attempt_recorded";
      at: string;
      sessionId: string;
      userId: string;
      attempt: QuestionAttempt;
      /** The attempt's effect on the topic, stored in the same write. */
      mastery: MasteryUpdate;
    }
  | { type: "session_restarted"; at: string; userId: string; sessionId: string; replacedBy: string; difficulty: Difficulty }
  | { type: "session_completed"; at: string; userId: string; session: SessionSummary }
  | { type: "session_expired"; at: string; userId: string; session: SessionSummary; reason: "duration" | "question_count" };
