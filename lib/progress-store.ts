import type { MasteryRecord, SessionSummary, StudyEvent } from "@/types/study";

export type ImportPlan = {
  /** Final records to write; each replaces whatever is stored under its key. */
  records: MasteryRecord[];
  /** Session summaries to add; ids already present are left alone. */
  sessions: SessionSummary[];
};

/**
 * Storage boundary for the engine. Writes are append-only events; reads return
 * the current projection.
 */
export interface ProgressStore {
  append(event: StudyEvent): Promise<void>;
  getMasteryRecord(userId: string, subject: string, topic: string): Promise<MasteryRecord | null>;
  listMasteryRecords(userId: string, subject?: string): Promise<MasteryRecord[]>;
  listSessionSummaries(userId: string): Promise<SessionSummary[]>;
  /** All or nothing. */
  applyImport(userId: string, plan: ImportPlan): Promise<void>;
}

export function masteryKey(userId: string, subject: string, topic: string): string {
  return `${userId}\u0000${subject}\u0000${topic}`;
}

export function withAttempt(summary: SessionSummary, correct: boolean): SessionSummary {
  const questionsAnswered = summary.questionsAnswered + 1;
  const questionsCorrect = summary.questionsCorrect + (correct ? 1 : 0);
  return {
    ...summary,
    questionsAnswered,
    questionsCorrect,
    accuracy: (questionsCorrect / questionsAnswered) * 100,
  };
}

type StoredSummary = { userId: string; summary: SessionSummary };

export class InMemoryProgressStore implements ProgressStore {
  private readonly events: StudyEvent[] = [];
  private readonly records = new Map<string, MasteryRecord>();
  private readonly sessions = new Map<string, StoredSummary>();

  async append(event: StudyEvent): Promise<void> {
    this.events.push(structuredClone(event));
    switch (event.type) {
      case "session_started":
      case "session_completed":
      case "session_expired":
        this.sessions.set(event.session.id, { userId: event.userId, summary: structuredClone(event.session) });
        break;
      case "attempt_recorded": {
        const r = event.mastery.record;
        this.records.set(masteryKey(r.userId, r.subject, r.topic), structuredClone(r));
        const stored = this.sessions.get(event.sessionId);
        if (stored) {
          this.sessions.set(event.sessionId, {
            userId: stored.userId,
            summary: withAttempt(stored.summary, event.attempt.correct),
          });
        }
        break;
      }
      default:
        break;
    }
  }

  async getMasteryRecord(userId: string, subject: string, topic: string): Promise<MasteryRecord | null> {
    const record = this.records.get(masteryKey(userId, subject, topic));
    return record ? structuredClone(record) : null;
  }

  async listMasteryRecords(userId: string, subject?: string): Promise<MasteryRecord[]> {
    return [...this.records.values()]
      .filter((r) => r.userId === userId && (subject === undefined || r.subject === subject))
      .map((r) => structuredClone(r));
  }

  async listSessionSummaries(userId: string): Promise<SessionSummary[]> {
    return [...this.sessions.values()]
      .filter((s) => s.userId === userId)
      .map((s) => structuredClone(s.summary));
  }

  async applyImport(userId: string, plan: ImportPlan): Promise<void> {
    // nothing here can fail halfway, so applying in place is atomic
    for (const record of plan.records) {
      this.records.set(masteryKey(userId, record.subject, record.topic), structuredClone({ ...record, userId }));
    }
    for (const summary of plan.sessions) {
      if (!this.sessions.has(summary.id)) {
        this.sessions.set(summary.id, { userId, summary: structuredClone(summary) });
      }
    }
  }

  /** Full event log, oldest first. */
  history(): StudyEvent[] {
    return this.events.map((e) => structuredClone(e));
  }
}
