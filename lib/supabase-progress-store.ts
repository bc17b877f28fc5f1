import { createClient, type PostgrestError, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { MasteryRecord, SessionSummary, StudyEvent } from "@/types/study";
import { UnavailableError } from "./errors";
import type { ImportPlan, ProgressStore } from "./progress-store";
import { DifficultySchema } from "./schema";

const MasteryRowSchema = z.object({
  user_id: z.string(),
  subject: z.string(),
  topic: z.string(),
  score: z.coerce.number(),
  recent_window: z.array(z.boolean()),
  difficulty: DifficultySchema,
  consecutive_correct: z.number().int(),
  consecutive_incorrect: z.number().int(),
  attempts: z.number().int(),
  correct: z.number().int(),
  updated_at: z.string(),
});
type MasteryRow = z.infer<typeof MasteryRowSchema>;

const SessionRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  subject: z.string(),
  topic: z.string(),
  difficulty: DifficultySchema,
  status: z.enum(["created", "active", "completed", "expired"]),
  aborted: z.boolean(),
  questions_answered: z.number().int(),
  questions_correct: z.number().int(),
  accuracy: z.coerce.number(),
  restart_count: z.number().int(),
  started_at: z.string(),
  ended_at: z.string().nullable(),
});
type SessionRow = z.infer<typeof SessionRowSchema>;

const MASTERY_COLUMNS =
  "user_id, subject, topic, score, recent_window, difficulty, consecutive_correct, consecutive_incorrect, attempts, correct, updated_at";
const SESSION_COLUMNS =
  "id, user_id, subject, topic, difficulty, status, aborted, questions_answered, questions_correct, accuracy, restart_count, started_at, ended_at";

export function toMasteryRow(record: MasteryRecord): MasteryRow {
  return {
    user_id: record.userId,
    subject: record.subject,
    topic: record.topic,
    score: record.score,
    recent_window: record.window,
    difficulty: record.difficulty,
    consecutive_correct: record.consecutiveCorrect,
    consecutive_incorrect: record.consecutiveIncorrect,
    attempts: record.attempts,
    correct: record.correct,
    updated_at: record.updatedAt,
  };
}

export function fromMasteryRow(row: MasteryRow): MasteryRecord {
  return {
    userId: row.user_id,
    subject: row.subject,
    topic: row.topic,
    score: row.score,
    window: row.recent_window,
    difficulty: row.difficulty,
    consecutiveCorrect: row.consecutive_correct,
    consecutiveIncorrect: row.consecutive_incorrect,
    attempts: row.attempts,
    correct: row.correct,
    updatedAt: row.updated_at,
  };
}

export function toSessionRow(userId: string, summary: SessionSummary): SessionRow {
  return {
    id: summary.id,
    user_id: userId,
    subject: summary.subject,
    topic: summary.topic,
    difficulty: summary.difficulty,
    status: summary.status,
    aborted: summary.aborted,
    questions_answered: summary.questionsAnswered,
    questions_correct: summary.questionsCorrect,
    accuracy: summary.accuracy,
    restart_count: summary.restartCount,
    started_at: summary.startedAt,
    ended_at: summary.endedAt,
  };
}

export function fromSessionRow(row: SessionRow): SessionSummary {
  return {
    id: row.id,
    subject: row.subject,
    topic: row.topic,
    difficulty: row.difficulty,
    status: row.status,
    aborted: row.aborted,
    questionsAnswered: row.questions_answered,
    questionsCorrect: row.questions_correct,
    accuracy: row.accuracy,
    restartCount: row.restart_count,
    startedAt: row.started_at,
    endedAt: row.ended_at,
  };
}

type EventArgs = {
  p_user_id: string;
  p_type: StudyEvent["type"];
  p_payload: StudyEvent;
  p_created_at: string;
  p_mastery: MasteryRow | null;
  p_session: SessionRow | null;
  p_attempt_session_id: string | null;
  p_attempt_correct: boolean | null;
};

/** Arguments for `append_study_event`: the event plus the projection rows it touches. */
export function toEventArgs(event: StudyEvent): EventArgs {
  const args: EventArgs = {
    p_user_id: event.userId,
    p_type: event.type,
    p_payload: event,
    p_created_at: event.at,
    p_mastery: null,
    p_session: null,
    p_attempt_session_id: null,
    p_attempt_correct: null,
  };
  switch (event.type) {
    case "attempt_recorded":
      return {
        ...args,
        p_mastery: toMasteryRow(event.mastery.record),
        p_attempt_session_id: event.sessionId,
        p_attempt_correct: event.attempt.correct,
      };
    case "session_started":
    case "session_completed":
    case "session_expired":
      return { ...args, p_session: toSessionRow(event.userId, event.session) };
    default:
      return args;
  }
}

function fail(op: string, error: PostgrestError): never {
  console.error(`[progress-store] ${op} failed`, { code: error.code, message: error.message });
  throw new UnavailableError(`progress store ${op} failed: ${error.message}`);
}

/**
 * Postgres-backed store. Events go to `study_events`; the current projection
 * lives in `mastery_records` and `session_summaries`.
 */
export class SupabaseProgressStore implements ProgressStore {
  constructor(private readonly sb: SupabaseClient) {}

  static fromEnv(url: string, serviceKey: string): SupabaseProgressStore {
    return new SupabaseProgressStore(createClient(url, serviceKey, { auth: { persistSession: false } }));
  }

  /** One RPC per event, so the log and its projections commit together. */
  async append(event: StudyEvent): Promise<void> {
    const { error } = await this.sb.rpc("append_study_event", toEventArgs(event));
    if (error) fail("append", error);
  }

  async getMasteryRecord(userId: string, subject: string, topic: string): Promise<MasteryRecord | null> {
    const { data, error } = await this.sb
      .from("mastery_records")
      .select(MASTERY_COLUMNS)
      .eq("user_id", userId)
      .eq("subject", subject)
      .eq("topic", topic)
      .maybeSingle();
    if (error) fail("mastery read", error);
    if (!data) return null;
    return fromMasteryRow(MasteryRowSchema.parse(data));
  }

  async listMasteryRecords(userId: string, subject?: string): Promise<MasteryRecord[]> {
    let query = this.sb.from("mastery_records").select(MASTERY_COLUMNS).eq("user_id", userId);
    if (subject !== undefined) query = query.eq("subject", subject);
    const { data, error } = await query.order("updated_at", { ascending: true });
    if (error) fail("mastery list", error);
    return z.array(MasteryRowSchema).parse(data ?? []).map(fromMasteryRow);
  }

  async listSessionSummaries(userId: string): Promise<SessionSummary[]> {
    const { data, error } = await this.sb
      .from("session_summaries")
      .select(SESSION_COLUMNS)
      .eq("user_id", userId)
      .order("started_at", { ascending: true });
    if (error) fail("session list", error);
    return z.array(SessionRowSchema).parse(data ?? []).map(fromSessionRow);
  }

  async applyImport(userId: string, plan: ImportPlan): Promise<void> {
    // single statement on the database side so a failure leaves nothing behind
    const { error } = await this.sb.rpc("apply_progress_import", {
      p_user_id: userId,
      p_records: plan.records.map((r) => toMasteryRow({ ...r, userId })),
      p_sessions: plan.sessions.map((s) => toSessionRow(userId, s)),
    });
    if (error) fail("import", error);
  }
}

// SQL (run once). Timestamps are kept as the ISO strings the engine writes so
// exports reproduce them exactly.
// create table if not exists study_events (
//   id bigint generated always as identity primary key,
//   user_id text not null,
//   type text not null,
//   payload jsonb not null,
//   created_at text not null
// );
// create table if not exists mastery_records (
//   user_id text not null,
//   subject text not null,
//   topic text not null,
//   score double precision not null,
//   recent_window jsonb not null default '[]',
//   difficulty text not null,
//   consecutive_correct int not null default 0,
//   consecutive_incorrect int not null default 0,
//   attempts int not null default 0,
//   correct int not null default 0,
//   updated_at text not null,
//   primary key (user_id, subject, topic)
// );
// create table if not exists session_summaries (
//   id text primary key,
//   user_id text not null,
//   subject text not null,
//   topic text not null,
//   difficulty text not null,
//   status text not null,
//   aborted boolean not null default false,
//   questions_answered int not null default 0,
//   questions_correct int not null default 0,
//   accuracy double precision not null default 0,
//   restart_count int not null default 0,
//   started_at text not null,
//   ended_at text
// );
// create or replace function append_study_event(
//   p_user_id text, p_type text, p_payload jsonb, p_created_at text,
//   p_mastery jsonb, p_session jsonb, p_attempt_session_id text, p_attempt_correct boolean
// ) returns void language plpgsql as $$
// begin
//   insert into study_events (user_id, type, payload, created_at) values (p_user_id, p_type, p_payload, p_created_at);
//   if p_mastery is not null then
//     insert into mastery_records select * from jsonb_populate_record(null::mastery_records, p_mastery)
//       on conflict (user_id, subject, topic) do update set
//         score = excluded.score, recent_window = excluded.recent_window, difficulty = excluded.difficulty,
//         consecutive_correct = excluded.consecutive_correct, consecutive_incorrect = excluded.consecutive_incorrect,
//         attempts = excluded.attempts, correct = excluded.correct, updated_at = excluded.updated_at;
//   end if;
//   if p_session is not null then
//     insert into session_summaries select * from jsonb_populate_record(null::session_summaries, p_session)
//       on conflict (id) do update set
//         difficulty = excluded.difficulty, status = excluded.status, aborted = excluded.aborted,
//         questions_answered = excluded.questions_answered, questions_correct = excluded.questions_correct,
//         accuracy = excluded.accuracy, restart_count = excluded.restart_count, ended_at = excluded.ended_at;
//   end if;
//   if p_attempt_session_id is not null then
//     update session_summaries set
//       questions_answered = questions_answered + 1,
//       questions_correct = questions_correct + (case when p_attempt_correct then 1 else 0 end),
//       accuracy = (questions_correct + (case when p_attempt_correct then 1 else 0 end)) * 100.0 / (questions_answered + 1)
//     where id = p_attempt_session_id;
//   end if;
// end $$;
// create or replace function apply_progress_import(p_user_id text, p_records jsonb, p_sessions jsonb)
// returns void language plpgsql as $$
// begin
//   insert into mastery_records select * from jsonb_populate_recordset(null::mastery_records, p_records)
//     on conflict (user_id, subject, topic) do update set
//       score = excluded.score, recent_window = excluded.recent_window, difficulty = excluded.difficulty,
//       consecutive_correct = excluded.consecutive_correct, consecutive_incorrect = excluded.consecutive_incorrect,
//       attempts = excluded.attempts, correct = excluded.correct, updated_at = excluded.updated_at;
//   insert into session_summaries select * from jsonb_populate_recordset(null::session_summaries, p_sessions)
//     on conflict (id) do nothing;
// end $$;
