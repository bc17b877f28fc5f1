import { describe, expect, it } from "vitest";
import type { RetrievedChunk } from "@/types/study";
import { GenerationError, PromptTooLargeError, RateLimitExceededError, UnavailableError } from "./errors";
import { QuestionGenerator, extractJsonObject, type QuestionGeneratorOptions } from "./question-generator";
import { buildQuestionPrompt } from "./question-prompts";
import { RateLimiter } from "./rate";
import { renderGrounding } from "./retrieval";
import { GradingVerdictSchema } from "./schema";
import { HangingCompletionClient, ScriptedCompletionClient, mcReply } from "./testing/fakes";

type Reply = ConstructorParameters<typeof ScriptedCompletionClient>[0][number];

function setup(replies: Reply[], opts: Partial<QuestionGeneratorOptions> = {}) {
  const llm = new ScriptedCompletionClient(replies);
  const limiter = new RateLimiter({ maxCalls: 30, maxPromptChars: 5000, now: () => 0 });
  const generator = new QuestionGenerator({
    llm,
    model: "test-model",
    limiter,
    maxPromptChars: 5000,
    maxRetries: 2,
    timeoutMs: 1000,
    shuffleChoices: false,
    ...opts,
  });
  return { llm, limiter, generator };
}

async function generationFailure(work: Promise<unknown>): Promise<GenerationError> {
  const err = await work.catch((e: unknown) => e);
  if (!(err instanceof GenerationError)) throw new Error(`expected a GenerationError, got ${String(err)}`);
  return err;
}

const request = { userId: "u1", subject: "Biology", topic: "Cells", difficulty: "beginner" } as const;

describe("extractJsonObject", () => {
  it("finds the first balanced object inside fences and chatter", () => {
    expect(extractJsonObject('Sure!\n```json\n{"a": {"b": "}"}}\n```\nanything else?')).toBe('{"a": {"b": "}"}}');
  });

  it("returns null when no object closes", () => {
    expect(extractJsonObject('{"a": 1')).toBeNull();
  });
});

describe("QuestionGenerator.generate", () => {
  it("returns a frozen question from a valid reply", async () => {
    const { generator, llm } = setup([mcReply()]);
    const question = await generator.generate(request);

    expect(question.type).toBe("multiple_choice");
    expect(question.choices).toEqual(["Mitochondrion", "Ribosome", "Golgi apparatus", "Lysosome"]);
    expect(question.correctIndex).toBe(0);
    expect(question.difficulty).toBe("beginner");
    expect(question.groundingChunkIds).toEqual([]);
    expect(Object.isFrozen(question)).toBe(true);
    expect(llm.calls).toBe(1);
    expect(llm.options[0]).toEqual({ json: true, temperature: 0.6 });
  });

  it("retries once with a corrective prompt after a malformed reply", async () => {
    const { generator, llm } = setup(["not json at all", mcReply()]);
    const question = await generator.generate(request);

    expect(question.prompt).toBe("Which organelle produces most of a cell's ATP?");
    expect(llm.calls).toBe(2);
    expect(llm.prompts[1]).toContain("Your previous reply could not be used: reply did not contain a JSON object.");
    expect(llm.prompts[1]).toContain("Previous reply: not json at all");
  });

  it("treats a wrong difficulty echo as malformed", async () => {
    const { generator, llm } = setup([mcReply({ difficulty: "advanced" }), mcReply()]);
    await generator.generate(request);
    expect(llm.calls).toBe(2);
    expect(llm.prompts[1]).toContain('difficulty must be "beginner", got "advanced"');
  });

  it("rejects question types that were not asked for", async () => {
    const shortAnswer = JSON.stringify({
      type: "short_answer",
      prompt: "Name the powerhouse of the cell.",
      acceptedAnswers: ["mitochondrion", "mitochondria"],
      explanation: "It produces ATP.",
      difficulty: "beginner",
    });
    const { generator, llm } = setup([mcReply(), shortAnswer], { questionTypes: ["short_answer"] });
    const question = await generator.generate(request);
    expect(question.acceptedAnswers).toEqual(["mitochondrion", "mitochondria"]);
    expect(llm.calls).toBe(2);
  });

  it("gives up after maxRetries + 1 malformed replies", async () => {
    const { generator, llm } = setup(["{}"]);
    const err = await generationFailure(generator.generate(request));
    expect([err.reason, err.attempts]).toEqual(["malformed", 3]);
    expect(llm.calls).toBe(3);
  });

  it("reports an unreachable model as unavailable", async () => {
    const { generator, llm } = setup([new UnavailableError("connection refused")], { maxRetries: 1 });
    const err = await generationFailure(generator.generate(request));
    expect([err.reason, err.attempts]).toEqual(["unavailable", 2]);
    expect(err.cause).toBeInstanceOf(UnavailableError);
    expect(llm.calls).toBe(2);
  });

  it("reports a hung model call as a timeout", async () => {
    const llm = new HangingCompletionClient();
    const generator = new QuestionGenerator({
      llm,
      model: "test-model",
      limiter: new RateLimiter({ now: () => 0 }),
      maxPromptChars: 5000,
      maxRetries: 0,
      timeoutMs: 5,
    });
    const err = await generationFailure(generator.generate(request));
    expect([err.reason, err.attempts]).toEqual(["timeout", 1]);
    expect(llm.calls).toBe(1);
  });

  it("refuses without calling the model once the user is rate limited", async () => {
    const llm = new ScriptedCompletionClient([mcReply()]);
    const generator = new QuestionGenerator({
      llm,
      model: "test-model",
      limiter: new RateLimiter({ maxCalls: 1, windowMs: 60_000, now: () => 0 }),
      maxPromptChars: 5000,
      maxRetries: 2,
      timeoutMs: 1000,
    });
    await generator.generate(request);
    const err = await generator.generate(request).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitExceededError);
    expect(err instanceof RateLimitExceededError ? err.retryAfterMs : null).toBe(60_000);
    expect(llm.calls).toBe(1);
  });

  it("counts every retry against the rate limit", async () => {
    const llm = new ScriptedCompletionClient(["garbage"]);
    const generator = new QuestionGenerator({
      llm,
      model: "test-model",
      limiter: new RateLimiter({ maxCalls: 2, now: () => 0 }),
      maxPromptChars: 5000,
      maxRetries: 2,
      timeoutMs: 1000,
    });
    await expect(generator.generate(request)).rejects.toBeInstanceOf(RateLimitExceededError);
    expect(llm.calls).toBe(2);
  });

  it("fails fast when the prompt alone is over the limit", async () => {
    const { generator, llm } = setup([mcReply()], { maxPromptChars: 100 });
    await expect(generator.generate(request)).rejects.toBeInstanceOf(PromptTooLargeError);
    expect(llm.calls).toBe(0);
  });

  it("drops the least similar grounding chunks to stay within the prompt limit", async () => {
    const params = { subject: "Biology", topic: "Cells", difficulty: "beginner", questionTypes: ["multiple_choice"] } as const;
    const overhead = buildQuestionPrompt({ ...params, grounding: "x" }).length - 1;
    const maxPromptChars = overhead + 250;
    const chunks: RetrievedChunk[] = [
      { chunkId: "d1:0", documentId: "d1", text: "a".repeat(200), similarity: 0.9 },
      { chunkId: "d1:1", documentId: "d1", text: "b".repeat(200), similarity: 0.8 },
      { chunkId: "d1:2", documentId: "d1", text: "c".repeat(200), similarity: 0.1 },
    ];
    const { generator, llm } = setup([mcReply()], { maxPromptChars });

    const question = await generator.generate({ ...request, grounding: { chunks, text: renderGrounding(chunks) } });

    expect(question.groundingChunkIds).toEqual(["d1:0"]);
    expect(llm.prompts[0].length).toBeLessThanOrEqual(maxPromptChars);
    expect(llm.prompts[0]).toContain(`[1] ${"a".repeat(200)}`);
    expect(llm.prompts[0]).not.toContain("b".repeat(200));
  });

  it("shuffles choices and keeps the answer key on the same option", async () => {
    const { generator } = setup([mcReply()], { shuffleChoices: true, random: () => 0 });
    const question = await generator.generate(request);
    expect(question.choices).toEqual(["Ribosome", "Golgi apparatus", "Lysosome", "Mitochondrion"]);
    expect(question.correctIndex).toBe(3);
  });
});

describe("QuestionGenerator.explainConcept", () => {
  it("returns the plain-text explanation", async () => {
    const { generator, llm } = setup(["  Cells are the basic unit of life; every organism is made of them.  "]);
    const text = await generator.explainConcept("u1", "Biology", "Cells", "beginner");
    expect(text).toBe("Cells are the basic unit of life; every organism is made of them.");
    expect(llm.options[0]).toEqual({ json: false, temperature: 0.7 });
  });
});

describe("QuestionGenerator.requestStructured", () => {
  it("validates the reply against the given schema", async () => {
    const { generator } = setup([
      '{"isCorrect": true, "score": 1.5}',
      '{"isCorrect": true, "score": 0.9, "feedback": "Good"}',
    ]);
    const verdict = await generator.requestStructured("u1", "grade this", GradingVerdictSchema, "grading");
    expect(verdict).toEqual({ isCorrect: true, score: 0.9, feedback: "Good" });
  });
});
