import type { Difficulty, MasteryRecord } from "@/types/study";
import { DIFFICULTIES } from "@/types/study";
import type { ProgressStore } from "./progress-store";

export type MasteryPolicy = {
  /** Verdicts kept in the rolling window. */
  windowSize: number;
  /** Weight multiplier per step of age; 1 means an unweighted fraction. */
  decay: number;
  thresholdUp: number;
  thresholdDown: number;
};

export const DEFAULT_MASTERY_POLICY: MasteryPolicy = {
  windowSize: 5,
  decay: 0.7,
  thresholdUp: 3,
  thresholdDown: 2,
};

export const MASTERED_SCORE = 0.8;

export type MasteryOutcome = {
  record: MasteryRecord;
  previous: Difficulty;
  next: Difficulty;
  changed: boolean;
  score: number;
};

export function emptyMasteryRecord(
  userId: string,
  subject: string,
  topic: string,
  difficulty: Difficulty,
  at: string
): MasteryRecord {
  return {
    userId,
    subject,
    topic,
    score: 0,
    window: [],
    difficulty,
    consecutiveCorrect: 0,
    consecutiveIncorrect: 0,
    attempts: 0,
    correct: 0,
    updatedAt: at,
  };
}

/** Recency-weighted fraction correct; the newest verdict (last) has weight 1. */
export function windowScore(window: readonly boolean[], decay: number): number {
  if (!window.length) return 0;
  let weighted = 0;
  let total = 0;
  window.forEach((correct, i) => {
    const weight = Math.pow(decay, window.length - 1 - i);
    total += weight;
    if (correct) weighted += weight;
  });
  return Math.min(1, Math.max(0, weighted / total));
}

export function stepDifficulty(difficulty: Difficulty, direction: 1 | -1): Difficulty {
  const idx = DIFFICULTIES.indexOf(difficulty);
  const next = Math.min(DIFFICULTIES.length - 1, Math.max(0, idx + direction));
  return DIFFICULTIES[next];
}

/**
 * Fold one verdict into a record and decide the next difficulty. Moves at most
 * one level, only in the direction of the streak that crossed its threshold;
 * when both thresholds are crossed the level holds. Streaks restart after a
 * level change so every level has to be earned at that level.
 */
export function evaluateMastery(
  record: MasteryRecord,
  correct: boolean,
  difficultyInForce: Difficulty,
  policy: MasteryPolicy,
  at: string
): MasteryOutcome {
  const window = [...record.window, correct].slice(-Math.max(1, policy.windowSize));
  let consecutiveCorrect = correct ? record.consecutiveCorrect + 1 : 0;
  let consecutiveIncorrect = correct ? 0 : record.consecutiveIncorrect + 1;

  const up = consecutiveCorrect >= policy.thresholdUp;
  const down = consecutiveIncorrect >= policy.thresholdDown;
  let next = difficultyInForce;
  if (up && !down) next = stepDifficulty(difficultyInForce, 1);
  else if (down && !up) next = stepDifficulty(difficultyInForce, -1);

  const changed = next !== difficultyInForce;
  if (changed) {
    consecutiveCorrect = 0;
    consecutiveIncorrect = 0;
  }

  const score = windowScore(window, policy.decay);
  return {
    record: {
      ...record,
      score,
      window,
      difficulty: next,
      consecutiveCorrect,
      consecutiveIncorrect,
      attempts: record.attempts + 1,
      correct: record.correct + (correct ? 1 : 0),
      updatedAt: at,
    },
    previous: difficultyInForce,
    next,
    changed,
    score,
  };
}

export type TopicProgress = {
  topic: string;
  mastery: number;
  difficulty: Difficulty;
  timesPracticed: number;
  lastPracticed: string;
};

export type SubjectProgress = {
  subject: string;
  overallMastery: number;
  topicsStarted: number;
  topicsMastered: number;
  topics: TopicProgress[];
};

export class MasteryTracker {
  constructor(
    private readonly store: ProgressStore,
    readonly policy: MasteryPolicy = DEFAULT_MASTERY_POLICY,
    private readonly now: () => number = Date.now
  ) {}

  getRecord(userId: string, subject: string, topic: string): Promise<MasteryRecord | null> {
    return this.store.getMasteryRecord(userId, subject, topic);
  }

  /** Evaluate against the stored record without persisting the outcome. */
  async recordVerdict(
    userId: string,
    subject: string,
    topic: string,
    correct: boolean,
    difficultyInForce: Difficulty
  ): Promise<MasteryOutcome> {
    const at = new Date(this.now()).toISOString();
    const current =
      (await this.store.getMasteryRecord(userId, subject, topic)) ??
      emptyMasteryRecord(userId, subject, topic, difficultyInForce, at);
    return evaluateMastery(current, correct, difficultyInForce, this.policy, at);
  }

  async summarizeSubject(userId: string, subject: string): Promise<SubjectProgress> {
    const records = await this.store.listMasteryRecords(userId, subject);
    if (!records.length) {
      return { subject, overallMastery: 0, topicsStarted: 0, topicsMastered: 0, topics: [] };
    }
    const overall = records.reduce((sum, r) => sum + r.score, 0) / records.length;
    return {
      subject,
      overallMastery: overall,
      topicsStarted: records.length,
      topicsMastered: records.filter((r) => r.score >= MASTERED_SCORE).length,
      topics: records.map((r) => ({
        topic: r.topic,
        mastery: r.score,
        difficulty: r.difficulty,
        timesPracticed: r.attempts,
        lastPracticed: r.updatedAt,
      })),
    };
  }

  /** Weakest unmastered topic, or null when everything practiced is mastered. */
  async suggestNextTopic(userId: string, subject: string): Promise<string | null> {
    const records = await this.store.listMasteryRecords(userId, subject);
    const weakest = records
      .filter((r) => r.score < MASTERED_SCORE)
      .sort((a, b) => a.score - b.score || a.updatedAt.localeCompare(b.updatedAt))[0];
    return weakest?.topic ?? null;
  }
}
