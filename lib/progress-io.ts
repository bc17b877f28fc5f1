import type { MasteryRecord, SessionSummary } from "@/types/study";
import { ImportValidationError, type ImportIssue } from "./errors";
import { masteryKey, type ProgressStore } from "./progress-store";
import {
  EXPORT_VERSION,
  ProgressExportSchema,
  type ExportedMastery,
  type ProgressExport,
} from "./schema";

export type ImportStrategy = "keep-existing" | "overwrite" | "merge-by-recency";

export type ImportResult = {
  recordsImported: number;
  recordsSkipped: number;
  sessionsImported: number;
  sessionsSkipped: number;
};

function exportRecord(r: MasteryRecord): ExportedMastery {
  return {
    subject: r.subject,
    topic: r.topic,
    difficulty: r.difficulty,
    score: r.score,
    window: [...r.window],
    attempts: r.attempts,
    correct: r.correct,
    consecutiveCorrect: r.consecutiveCorrect,
    consecutiveIncorrect: r.consecutiveIncorrect,
    updatedAt: r.updatedAt,
  };
}

function exportSession(s: SessionSummary): SessionSummary {
  return {
    id: s.id,
    subject: s.subject,
    topic: s.topic,
    difficulty: s.difficulty,
    status: s.status,
    aborted: s.aborted,
    questionsAnswered: s.questionsAnswered,
    questionsCorrect: s.questionsCorrect,
    accuracy: s.accuracy,
    restartCount: s.restartCount,
    startedAt: s.startedAt,
    endedAt: s.endedAt,
  };
}

export async function exportProgress(
  store: ProgressStore,
  userId: string,
  now: () => number = Date.now
): Promise<ProgressExport> {
  const [records, sessions] = await Promise.all([
    store.listMasteryRecords(userId),
    store.listSessionSummaries(userId),
  ]);
  return {
    exportVersion: EXPORT_VERSION,
    exportedAt: new Date(now()).toISOString(),
    userId,
    masteryRecords: records
      .sort((a, b) => a.subject.localeCompare(b.subject) || a.topic.localeCompare(b.topic))
      .map(exportRecord),
    sessions: sessions
      .sort((a, b) => a.startedAt.localeCompare(b.startedAt) || a.id.localeCompare(b.id))
      .map(exportSession),
  };
}

function parseInput(input: unknown): unknown {
  if (typeof input !== "string") return input;
  try {
    return JSON.parse(input);
  } catch (err) {
    throw new ImportValidationError([
      { path: "", message: `not valid JSON (${err instanceof Error ? err.message : String(err)})` },
    ]);
  }
}

function shouldReplace(existing: MasteryRecord | undefined, incoming: ExportedMastery, strategy: ImportStrategy): boolean {
  if (!existing) return true;
  switch (strategy) {
    case "keep-existing":
      return false;
    case "overwrite":
      return true;
    case "merge-by-recency":
      // ties keep what is already there
      return Date.parse(incoming.updatedAt) > Date.parse(existing.updatedAt);
  }
}

/**
 * Validate a whole export file and apply it in one step. Any invalid entry
 * rejects the file; nothing is written in that case.
 */
export async function importProgress(
  store: ProgressStore,
  userId: string,
  input: unknown,
  strategy: ImportStrategy = "merge-by-recency"
): Promise<ImportResult> {
  const parsed = ProgressExportSchema.safeParse(parseInput(input));
  if (!parsed.success) {
    const issues: ImportIssue[] = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    console.warn("[progress-io] import rejected", { userId, issues: issues.length });
    throw new ImportValidationError(issues);
  }
  const file = parsed.data;
  if (file.userId !== userId) {
    console.info("[progress-io] importing progress exported for another user id", { userId, from: file.userId });
  }

  const existingRecords = new Map(
    (await store.listMasteryRecords(userId)).map((r) => [masteryKey(userId, r.subject, r.topic), r])
  );
  const existingSessions = new Set((await store.listSessionSummaries(userId)).map((s) => s.id));

  const records: MasteryRecord[] = [];
  for (const incoming of file.masteryRecords) {
    const existing = existingRecords.get(masteryKey(userId, incoming.subject, incoming.topic));
    if (shouldReplace(existing, incoming, strategy)) {
      records.push({ userId, ...incoming });
    }
  }
  const sessions = file.sessions.filter((s) => !existingSessions.has(s.id));

  await store.applyImport(userId, { records, sessions });

  const result: ImportResult = {
    recordsImported: records.length,
    recordsSkipped: file.masteryRecords.length - records.length,
    sessionsImported: sessions.length,
    sessionsSkipped: file.sessions.length - sessions.length,
  };
  console.log("[progress-io] import applied", { userId, strategy, ...result });
  return result;
}
