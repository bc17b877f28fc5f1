import { randomUUID } from "crypto";
import type { ZodType, ZodTypeDef } from "zod";
import type { Difficulty, Question, QuestionType } from "@/types/study";
import { TimeoutError, withTimeout } from "./async";
import {
  GenerationError,
  PromptTooLargeError,
  RateLimitExceededError,
  UnavailableError,
  type GenerationFailureReason,
} from "./errors";
import type { CompletionClient } from "./llm";
import { buildCorrectivePrompt, buildExplanationPrompt, buildQuestionPrompt } from "./question-prompts";
import { shuffleChoices } from "./quiz-shuffle";
import type { RateLimiter } from "./rate";
import { fitChunksToBudget, renderGrounding, type GroundingContext } from "./retrieval";
import { GeneratedQuestionSchema, type GeneratedQuestion } from "./schema";

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; problem: string };

/**
 * Pull the first balanced JSON object out of a model reply, tolerating code
 * fences and chatter around it.
 */
export function extractJsonObject(raw: string): string | null {
  const s = raw.replace(/```(?:json)?/gi, "");
  let depth = 0;
  let start = -1;
  let inStr = false;
  let escaped = false;
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (inStr) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inStr = false;
      }
      continue;
    }
    if (ch === '"') {
      if (depth > 0) inStr = true;
      continue;
    }
    if (ch === "{") {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === "}" && depth > 0) {
      depth--;
      if (depth === 0 && start >= 0) return s.slice(start, i + 1);
    }
  }
  return null;
}

export function parseWithSchema<T>(
  raw: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  check?: (value: T) => string | null
): ParseOutcome<T> {
  const json = extractJsonObject(raw);
  if (!json) return { ok: false, problem: "reply did not contain a JSON object" };

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    return { ok: false, problem: `invalid JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join(".") : "root";
    return { ok: false, problem: `schema violation at ${where}: ${issue?.message ?? "invalid"}` };
  }

  const extra = check?.(parsed.data) ?? null;
  if (extra) return { ok: false, problem: extra };
  return { ok: true, value: parsed.data };
}

export type GenerateQuestionInput = {
  userId: string;
  subject: string;
  topic: string;
  difficulty: Difficulty;
  recentQuestions?: readonly string[];
  grounding?: GroundingContext | null;
};

export type QuestionGeneratorOptions = {
  llm: CompletionClient;
  model: string;
  limiter: RateLimiter;
  maxPromptChars: number;
  maxRetries: number;
  timeoutMs: number;
  questionTypes?: readonly QuestionType[];
  shuffleChoices?: boolean;
  random?: () => number;
  now?: () => number;
};

type CallOptions<T> = {
  label: string;
  json: boolean;
  temperature: number;
  parse: (raw: string) => ParseOutcome<T>;
};

export class QuestionGenerator {
  private readonly opts: QuestionGeneratorOptions;
  private readonly questionTypes: readonly QuestionType[];
  private readonly now: () => number;

  constructor(opts: QuestionGeneratorOptions) {
    this.opts = opts;
    this.questionTypes = opts.questionTypes?.length ? opts.questionTypes : ["multiple_choice"];
    this.now = opts.now ?? Date.now;
  }

  get maxPromptChars(): number {
    return this.opts.maxPromptChars;
  }

  async generate(input: GenerateQuestionInput): Promise<Question> {
    const promptParams = {
      subject: input.subject,
      topic: input.topic,
      difficulty: input.difficulty,
      questionTypes: this.questionTypes,
      recentQuestions: input.recentQuestions,
    };
    const basePrompt = buildQuestionPrompt(promptParams);
    if (basePrompt.length > this.opts.maxPromptChars) {
      throw new PromptTooLargeError(basePrompt.length, this.opts.maxPromptChars);
    }

    let prompt = basePrompt;
    let groundingChunkIds: string[] = [];
    const offered = input.grounding?.chunks ?? [];
    if (offered.length) {
      // room left for the excerpt block once the fixed grounding header is in place
      const overhead = buildQuestionPrompt({ ...promptParams, grounding: "x" }).length - 1;
      const kept = fitChunksToBudget(offered, this.opts.maxPromptChars - overhead);
      if (kept.length < offered.length) {
        console.log("[question-generator] grounding trimmed to fit prompt", {
          offered: offered.length,
          kept: kept.length,
          maxPromptChars: this.opts.maxPromptChars,
        });
      }
      if (kept.length) {
        prompt = buildQuestionPrompt({ ...promptParams, grounding: renderGrounding(kept) });
        groundingChunkIds = kept.map((c) => c.chunkId);
      }
    }

    const generated = await this.callModel<GeneratedQuestion>(input.userId, prompt, {
      label: "question",
      json: true,
      temperature: 0.6,
      parse: (raw) =>
        parseWithSchema(raw, GeneratedQuestionSchema, (q) => {
          if (q.difficulty !== input.difficulty) {
            return `difficulty must be "${input.difficulty}", got "${q.difficulty}"`;
          }
          if (!this.questionTypes.includes(q.type)) {
            return `type must be one of ${this.questionTypes.join(", ")}`;
          }
          return null;
        }),
    });

    return this.toQuestion(generated, groundingChunkIds);
  }

  async explainConcept(userId: string, subject: string, topic: string, difficulty: Difficulty): Promise<string> {
    const prompt = buildExplanationPrompt(subject, topic, difficulty);
    return this.callModel<string>(userId, prompt, {
      label: "explanation",
      json: false,
      temperature: 0.7,
      parse: (raw) => {
        const text = raw.trim();
        return text.length >= 20 ? { ok: true, value: text } : { ok: false, problem: "explanation was empty" };
      },
    });
  }

  /**
   * Rate-limited JSON request with the same bounded corrective retry loop as
   * question generation. Used for rubric grading.
   */
  async requestStructured<T>(
    userId: string,
    prompt: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    label: string
  ): Promise<T> {
    if (prompt.length > this.opts.maxPromptChars) {
      throw new PromptTooLargeError(prompt.length, this.opts.maxPromptChars);
    }
    return this.callModel(userId, prompt, {
      label,
      json: true,
      temperature: 0.2,
      parse: (raw) => parseWithSchema(raw, schema),
    });
  }

  private async callModel<T>(userId: string, basePrompt: string, call: CallOptions<T>): Promise<T> {
    const maxAttempts = this.opts.maxRetries + 1;
    let prompt = basePrompt;
    let reason: GenerationFailureReason = "malformed";
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const decision = this.opts.limiter.acquire(userId, prompt.length);
      if (!decision.allowed) {
        if (decision.reason === "prompt_too_large") {
          throw new PromptTooLargeError(prompt.length, decision.limit);
        }
        console.info(`[question-generator] ${call.label} rate limited`, {
          userId,
          retryAfterMs: decision.retryAfterMs,
        });
        throw new RateLimitExceededError(decision.retryAfterMs);
      }

      let raw: string;
      try {
        raw = await withTimeout(
          this.opts.llm.complete(prompt, this.opts.model, { json: call.json, temperature: call.temperature }),
          this.opts.timeoutMs,
          `${call.label} completion`
        );
      } catch (err) {
        lastError = err;
        reason = err instanceof TimeoutError ? "timeout" : "unavailable";
        console.warn(`[question-generator] ${call.label} call failed`, {
          attempt,
          maxAttempts,
          reason,
          unavailable: err instanceof UnavailableError,
          message: err instanceof Error ? err.message : String(err),
        });
        prompt = basePrompt;
        continue;
      }

      const parsed = call.parse(raw);
      if (parsed.ok) {
        if (attempt > 1) {
          console.log(`[question-generator] ${call.label} recovered after retry`, { attempt });
        }
        return parsed.value;
      }

      reason = "malformed";
      lastError = null;
      console.warn(`[question-generator] ${call.label} reply rejected`, {
        attempt,
        maxAttempts,
        problem: parsed.problem,
        preview: raw.slice(0, 160),
      });
      prompt = buildCorrectivePrompt(basePrompt, parsed.problem, raw, this.opts.maxPromptChars);
    }

    throw new GenerationError(
      reason,
      maxAttempts,
      `${call.label} generation failed after ${maxAttempts} attempt${maxAttempts === 1 ? "" : "s"} (${reason})`,
      lastError ? { cause: lastError } : undefined
    );
  }

  private toQuestion(generated: GeneratedQuestion, groundingChunkIds: string[]): Question {
    const base = {
      id: randomUUID(),
      type: generated.type,
      prompt: generated.prompt,
      explanation: generated.explanation,
      difficulty: generated.difficulty,
      groundingChunkIds,
      createdAt: new Date(this.now()).toISOString(),
    };

    let question: Question;
    if (generated.type === "multiple_choice" && generated.choices && generated.correctIndex !== undefined) {
      const mc = { choices: generated.choices, correctIndex: generated.correctIndex };
      const arranged = this.opts.shuffleChoices === false ? mc : shuffleChoices(mc, this.opts.random);
      question = { ...base, choices: arranged.choices, correctIndex: arranged.correctIndex };
    } else if (generated.type === "short_answer") {
      question = { ...base, acceptedAnswers: generated.acceptedAnswers };
    } else {
      question = { ...base, rubric: generated.rubric };
    }

    Object.freeze(question.groundingChunkIds);
    if (question.choices) Object.freeze(question.choices);
    if (question.acceptedAnswers) Object.freeze(question.acceptedAnswers);
    return Object.freeze(question);
  }
}
