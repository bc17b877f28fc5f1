import { randomUUID } from "crypto";
import type {
  Difficulty,
  Question,
  QuestionAttempt,
  Session,
  SessionLimits,
  SessionSummary,
  StudyEvent,
} from "@/types/study";
import { DIFFICULTIES } from "@/types/study";
import { Mutex } from "./async";
import { InvalidInputError, StateError, StudyError } from "./errors";
import type { AnswerGrader } from "./grading";
import type { MasteryOutcome, MasteryTracker } from "./mastery";
import type { ProgressStore } from "./progress-store";
import type { QuestionGenerator } from "./question-generator";
import type { RetrievalAssembler } from "./retrieval";
import { validateSubjectTopic, type LabelLimits } from "./sanitize";

export type SessionOrchestratorOptions = {
  generator: QuestionGenerator;
  grader: AnswerGrader;
  tracker: MasteryTracker;
  store: ProgressStore;
  /** Omit to generate every question ungrounded. */
  assembler?: RetrievalAssembler | null;
  limits: SessionLimits;
  labelLimits: LabelLimits;
  /** How many earlier question texts the generator is told to avoid. */
  recentQuestions?: number;
  maxAnswerChars?: number;
  /** Ended sessions kept for getSession and restart lookups, oldest dropped first. */
  maxEndedSessions?: number;
  now?: () => number;
};

export type StartSessionInput = {
  subject: string;
  topic: string;
  /** Defaults to the stored mastery level for the topic, else beginner. */
  difficulty?: Difficulty;
  documentScope?: string[] | null;
};

export type TurnResult = {
  session: Session;
  question: Question | null;
  /** Why no question is outstanding; retry with nextQuestion. */
  questionError: StudyError | null;
};

export type AnswerResult = TurnResult & {
  attempt: QuestionAttempt;
  mastery: MasteryOutcome;
};

export type StudyEventListener = (event: StudyEvent) => void;

type EndReason = "duration" | "question_count";

type StartOptions = {
  userId: string;
  subject: string;
  topic: string;
  difficulty: Difficulty;
  documentScope: string[] | null;
  restartCount: number;
  restartedFrom: string | null;
  difficultyChanges: Session["difficultyChanges"];
};

function activeKey(userId: string, subject: string, topic: string): string {
  return `${userId}\u0000${subject}\u0000${topic}`;
}

export function summarizeSession(session: Session): SessionSummary {
  const questionsAnswered = session.attempts.length;
  const questionsCorrect = session.attempts.filter((a) => a.correct).length;
  return {
    id: session.id,
    subject: session.subject,
    topic: session.topic,
    difficulty: session.difficulty,
    status: session.status,
    aborted: session.aborted,
    questionsAnswered,
    questionsCorrect,
    accuracy: questionsAnswered ? (questionsCorrect / questionsAnswered) * 100 : 0,
    restartCount: session.restartCount,
    startedAt: session.startedAt,
    endedAt: session.endedAt,
  };
}

/**
 * Drives study sessions: created -> active -> completed, with restarts archiving
 * the running session and expiry once the duration or question cap is hit.
 *
 * Each session runs at most one operation at a time. Starting, restarting and
 * archiving for one (user, subject, topic) are serialized by a per-key lock, so
 * a key never has two live sessions. Ended sessions move to a bounded cache;
 * the store holds their summaries.
 */
export class SessionOrchestrator {
  private readonly sessions = new Map<string, Session>();
  private readonly ended = new Map<string, Session>();
  private readonly successors = new Map<string, string>();
  private readonly active = new Map<string, string>();
  private readonly keyLocks = new Map<string, { mutex: Mutex; holders: number }>();
  private readonly busy = new Set<string>();
  private readonly listeners = new Set<StudyEventListener>();
  private readonly now: () => number;
  private readonly recentQuestions: number;
  private readonly maxAnswerChars: number;
  private readonly maxEndedSessions: number;

  constructor(private readonly opts: SessionOrchestratorOptions) {
    this.now = opts.now ?? Date.now;
    this.recentQuestions = opts.recentQuestions ?? 5;
    this.maxAnswerChars = opts.maxAnswerChars ?? 2000;
    this.maxEndedSessions = Math.max(0, opts.maxEndedSessions ?? 100);
  }

  onEvent(listener: StudyEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSession(sessionId: string): Session | null {
    const session = this.sessions.get(sessionId) ?? this.ended.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  getActiveSession(userId: string, subject: string, topic: string): Session | null {
    const labels = validateSubjectTopic(subject, topic, this.opts.labelLimits);
    const id = this.active.get(activeKey(userId, labels.subject, labels.topic));
    return id ? this.getSession(id) : null;
  }

  async start(userId: string, input: StartSessionInput): Promise<TurnResult> {
    const { subject, topic } = validateSubjectTopic(input.subject, input.topic, this.opts.labelLimits);
    if (input.difficulty !== undefined && !DIFFICULTIES.includes(input.difficulty)) {
      throw new InvalidInputError("difficulty", `difficulty must be one of ${DIFFICULTIES.join(", ")}.`);
    }
    const documentScope = input.documentScope?.length ? [...input.documentScope] : null;
    const key = activeKey(userId, subject, topic);

    return this.withKey(key, async () => {
      const runningId = this.active.get(key);
      if (runningId) {
        return this.replace(runningId, input.difficulty, documentScope);
      }
      const stored = input.difficulty ? null : await this.opts.tracker.getRecord(userId, subject, topic);
      return this.activate(
        this.create({
          userId,
          subject,
          topic,
          difficulty: input.difficulty ?? stored?.difficulty ?? "beginner",
          documentScope,
          restartCount: 0,
          restartedFrom: null,
          difficultyChanges: [],
        })
      );
    });
  }

  async submitAnswer(
    sessionId: string,
    answer: string,
    meta: { timeTakenMs?: number | null } = {}
  ): Promise<AnswerResult> {
    return this.exclusive(sessionId, async (session) => {
      if (session.status !== "active") {
        throw new StateError(`session ${session.id} is ${session.status}`);
      }
      const question = session.outstanding;
      if (!question) {
        throw new StateError(`session ${session.id} has no question waiting for an answer`);
      }
      if (typeof answer !== "string") {
        throw new InvalidInputError("answer", "answer must be text.");
      }
      if (answer.length > this.maxAnswerChars) {
        throw new InvalidInputError("answer", `answer must be at most ${this.maxAnswerChars} characters.`);
      }

      const ctx = { userId: session.userId, subject: session.subject, topic: session.topic };
      const grade = await this.opts.grader.grade(ctx, question, answer.trim());
      const mastery = await this.opts.tracker.recordVerdict(
        session.userId,
        session.subject,
        session.topic,
        grade.correct,
        session.difficulty
      );

      const last = session.attempts[session.attempts.length - 1];
      const answeredAtMs = Math.max(this.now(), last ? Date.parse(last.answeredAt) + 1 : 0);
      const attempt: QuestionAttempt = {
        question,
        answer: answer.trim(),
        correct: grade.correct,
        score: grade.score,
        feedback: grade.feedback,
        timeTakenMs: meta.timeTakenMs ?? null,
        difficulty: session.difficulty,
        answeredAt: new Date(answeredAtMs).toISOString(),
      };

      // one write for attempt and mastery; the session only moves on once it is stored
      await this.emit({
        type: "attempt_recorded",
        at: attempt.answeredAt,
        sessionId: session.id,
        userId: session.userId,
        attempt,
        mastery: { record: mastery.record, previous: mastery.previous, next: mastery.next },
      });

      session.attempts.push(attempt);
      session.outstanding = null;
      if (mastery.changed) {
        session.difficultyChanges.push({
          from: mastery.previous,
          to: mastery.next,
          atQuestion: session.attempts.length,
          at: attempt.answeredAt,
          reason: "adaptive",
        });
        session.difficulty = mastery.next;
        console.log("[session] difficulty changed", {
          sessionId: session.id,
          from: mastery.previous,
          to: mastery.next,
          score: Number(mastery.score.toFixed(3)),
        });
      }

      const reason = this.limitReached(session);
      if (reason) {
        await this.expire(session, reason);
        return { session: structuredClone(session), question: null, questionError: null, attempt, mastery };
      }

      const turn = await this.ask(session);
      return { ...turn, attempt, mastery };
    });
  }

  /** Ask for a question again after a turn that ended without one. */
  async nextQuestion(sessionId: string): Promise<Question> {
    return this.exclusive(sessionId, async (session) => {
      if (session.status !== "active") {
        throw new StateError(`session ${session.id} is ${session.status}`);
      }
      if (session.outstanding) {
        throw new StateError(`session ${session.id} already has a question waiting`);
      }
      const reason = this.limitReached(session);
      if (reason) {
        await this.expire(session, reason);
        throw new StateError(`session ${session.id} reached its ${reason === "duration" ? "time" : "question"} limit`);
      }
      const turn = await this.ask(session);
      if (turn.questionError) throw turn.questionError;
      if (!turn.question) throw new StateError(`session ${session.id} produced no question`);
      return turn.question;
    });
  }

  async restart(sessionId: string, difficulty?: Difficulty): Promise<TurnResult> {
    if (difficulty !== undefined && !DIFFICULTIES.includes(difficulty)) {
      throw new InvalidInputError("difficulty", `difficulty must be one of ${DIFFICULTIES.join(", ")}.`);
    }
    const known = this.sessions.get(sessionId) ?? this.ended.get(sessionId);
    if (!known) throw new StateError(`unknown session ${sessionId}`);

    return this.withKey(activeKey(known.userId, known.subject, known.topic), async () => {
      const current = this.currentSuccessor(sessionId);
      if (!current) {
        throw new StateError(`session ${sessionId} has ended and cannot be restarted`);
      }
      return this.replace(current, difficulty, undefined);
    });
  }

  async end(sessionId: string): Promise<Session> {
    return this.exclusive(sessionId, async (session) => {
      if (session.status !== "active" && session.status !== "created") {
        throw new StateError(`session ${session.id} is already ${session.status}`);
      }
      await this.close(session, false);
      return structuredClone(session);
    });
  }

  /** Caller holds the key lock. */
  private async replace(
    sessionId: string,
    difficulty: Difficulty | undefined,
    documentScope: string[] | null | undefined
  ): Promise<TurnResult> {
    const opened = await this.exclusive(sessionId, async (old) => {
      if (old.status !== "active" && old.status !== "created") {
        throw new StateError(`session ${old.id} is ${old.status} and cannot be restarted`);
      }
      const next = difficulty ?? old.difficulty;
      await this.close(old, true);

      const at = new Date(this.now()).toISOString();
      const fresh = this.create({
        userId: old.userId,
        subject: old.subject,
        topic: old.topic,
        difficulty: next,
        documentScope: documentScope === undefined ? old.documentScope : documentScope,
        restartCount: old.restartCount + 1,
        restartedFrom: old.id,
        difficultyChanges:
          next === old.difficulty ? [] : [{ from: old.difficulty, to: next, atQuestion: 0, at, reason: "restart" }],
      });
      if (this.ended.has(old.id)) this.successors.set(old.id, fresh.id);
      await this.emit({
        type: "session_restarted",
        at,
        userId: old.userId,
        sessionId: old.id,
        replacedBy: fresh.id,
        difficulty: next,
      });
      console.info("[session] restarted", {
        from: old.id,
        to: fresh.id,
        restartCount: fresh.restartCount,
        difficulty: next,
      });
      return fresh;
    });
    return this.activate(opened);
  }

  /** Caller holds the key lock. */
  private create(opts: StartOptions): Session {
    const session: Session = {
      id: randomUUID(),
      userId: opts.userId,
      subject: opts.subject,
      topic: opts.topic,
      difficulty: opts.difficulty,
      status: "created",
      aborted: false,
      attempts: [],
      outstanding: null,
      documentScope: opts.documentScope,
      limits: { ...this.opts.limits },
      startedAt: new Date(this.now()).toISOString(),
      endedAt: null,
      restartCount: opts.restartCount,
      restartedFrom: opts.restartedFrom,
      difficultyChanges: opts.difficultyChanges,
    };
    this.sessions.set(session.id, session);
    this.active.set(activeKey(session.userId, session.subject, session.topic), session.id);
    return session;
  }

  private async activate(session: Session): Promise<TurnResult> {
    return this.exclusive(session.id, async (s) => {
      if (s.status !== "created") {
        throw new StateError(`session ${s.id} is ${s.status} and cannot be activated`);
      }
      s.status = "active";
      await this.emit({
        type: "session_started",
        at: s.startedAt,
        userId: s.userId,
        session: summarizeSession(s),
      });
      return this.ask(s);
    });
  }

  private async ask(session: Session): Promise<TurnResult> {
    try {
      const grounding = this.opts.assembler
        ? await this.opts.assembler.assemble(session.userId, session.subject, session.topic, session.documentScope)
        : null;
      const question = await this.opts.generator.generate({
        userId: session.userId,
        subject: session.subject,
        topic: session.topic,
        difficulty: session.difficulty,
        recentQuestions: session.attempts.slice(-this.recentQuestions).map((a) => a.question.prompt),
        grounding,
      });
      await this.emit({
        type: "question_asked",
        at: new Date(this.now()).toISOString(),
        sessionId: session.id,
        userId: session.userId,
        question,
      });
      session.outstanding = question;
      return { session: structuredClone(session), question, questionError: null };
    } catch (err) {
      if (!(err instanceof StudyError)) throw err;
      console.warn("[session] no question this turn", {
        sessionId: session.id,
        code: err.code,
        message: err.message,
      });
      return { session: structuredClone(session), question: null, questionError: err };
    }
  }

  private async close(session: Session, aborted: boolean): Promise<void> {
    const endedAt = new Date(this.now()).toISOString();
    await this.emit({
      type: "session_completed",
      at: endedAt,
      userId: session.userId,
      session: { ...summarizeSession(session), status: "completed", aborted, endedAt },
    });
    session.status = "completed";
    session.aborted = aborted;
    session.endedAt = endedAt;
    this.retire(session);
  }

  private async expire(session: Session, reason: EndReason): Promise<void> {
    const endedAt = new Date(this.now()).toISOString();
    await this.emit({
      type: "session_expired",
      at: endedAt,
      userId: session.userId,
      session: { ...summarizeSession(session), status: "expired", endedAt },
      reason,
    });
    console.log("[session] expired", { sessionId: session.id, reason, answered: session.attempts.length });
    session.status = "expired";
    session.endedAt = endedAt;
    this.retire(session);
  }

  /** Moves an ended session out of the live set into the bounded cache. */
  private retire(session: Session): void {
    session.outstanding = null;
    const key = activeKey(session.userId, session.subject, session.topic);
    if (this.active.get(key) === session.id) this.active.delete(key);
    this.sessions.delete(session.id);
    this.ended.set(session.id, session);
    for (const id of this.ended.keys()) {
      if (this.ended.size <= this.maxEndedSessions) break;
      this.ended.delete(id);
      this.successors.delete(id);
    }
  }

  // Follows restarts forward to the live session that replaced `sessionId`.
  private currentSuccessor(sessionId: string): string | null {
    let id = sessionId;
    while (!this.sessions.has(id)) {
      const next = this.successors.get(id);
      if (!next) return null;
      id = next;
    }
    return id;
  }

  private limitReached(session: Session): EndReason | null {
    if (session.attempts.length >= session.limits.maxQuestions) return "question_count";
    if (this.now() - Date.parse(session.startedAt) >= session.limits.durationMs) return "duration";
    return null;
  }

  private async withKey<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const lock = this.keyLocks.get(key) ?? { mutex: new Mutex(), holders: 0 };
    this.keyLocks.set(key, lock);
    lock.holders += 1;
    try {
      return await lock.mutex.runExclusive(fn);
    } finally {
      lock.holders -= 1;
      if (lock.holders === 0) this.keyLocks.delete(key);
    }
  }

  private async exclusive<T>(sessionId: string, fn: (session: Session) => Promise<T>): Promise<T> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      const ended = this.ended.get(sessionId);
      throw new StateError(ended ? `session ${sessionId} is ${ended.status}` : `unknown session ${sessionId}`);
    }
    if (this.busy.has(sessionId)) {
      throw new StateError(`session ${sessionId} is busy with another operation`);
    }
    this.busy.add(sessionId);
    try {
      return await fn(session);
    } finally {
      this.busy.delete(sessionId);
    }
  }

  private async emit(event: StudyEvent): Promise<void> {
    await this.opts.store.append(event);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error("[session] event listener threw", {
          type: event.type,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
