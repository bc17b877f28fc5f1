import type { Question } from "@/types/study";
import { buildGradingPrompt } from "./question-prompts";
import type { QuestionGenerator } from "./question-generator";
import { GradingVerdictSchema } from "./schema";

export type GradeResult = {
  correct: boolean;
  /** 0..1; partial credit only comes from fuzzy or rubric grading. */
  score: number;
  feedback: string | null;
};

const LEADING_ARTICLE = /^(the|a|an)\s+/;

export function normalizeAnswer(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}.\-\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/\.$/, "")
    .replace(LEADING_ARTICLE, "");
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;
  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row.push(Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost));
    }
    prev = row;
  }
  return prev[b.length];
}

export function stringSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(a, b) / longest;
}

function asNumber(value: string): number | null {
  if (!/^-?(\d+(\.\d+)?|\.\d+)$/.test(value)) return null;
  return Number(value);
}

/** Accepts the choice text itself or its letter (A, B, ...). */
export function gradeMultipleChoice(question: Pick<Question, "choices" | "correctIndex">, answer: string): GradeResult {
  const choices = question.choices ?? [];
  const target = question.correctIndex ?? -1;
  const normalized = normalizeAnswer(answer);

  let picked = choices.findIndex((c) => normalizeAnswer(c) === normalized);
  if (picked < 0) {
    const letter = answer.trim().toUpperCase().match(/^\(?([A-Z])[).:]?$/);
    if (letter) picked = letter[1].charCodeAt(0) - "A".charCodeAt(0);
  }

  const correct = picked === target && target >= 0;
  return {
    correct,
    score: correct ? 1 : 0,
    feedback: correct ? null : choices[target] !== undefined ? `Correct answer: ${choices[target]}` : null,
  };
}

export function gradeShortAnswer(
  question: Pick<Question, "acceptedAnswers">,
  answer: string,
  fuzzyThreshold: number
): GradeResult {
  const accepted = (question.acceptedAnswers ?? []).map(normalizeAnswer).filter(Boolean);
  const given = normalizeAnswer(answer);
  if (!given || !accepted.length) {
    return { correct: false, score: 0, feedback: accepted.length ? `Expected: ${question.acceptedAnswers?.[0]}` : null };
  }

  const givenNumber = asNumber(given);
  let best = 0;
  for (const candidate of accepted) {
    const candidateNumber = asNumber(candidate);
    const same = givenNumber !== null && candidateNumber !== null ? givenNumber === candidateNumber : candidate === given;
    if (same) return { correct: true, score: 1, feedback: null };
    // numbers are exact; "12" is not a typo of "13"
    if (givenNumber !== null || candidateNumber !== null) continue;
    best = Math.max(best, stringSimilarity(candidate, given));
  }

  if (best >= fuzzyThreshold) {
    return { correct: true, score: best, feedback: "Close enough; check your spelling." };
  }
  return { correct: false, score: best, feedback: `Expected: ${question.acceptedAnswers?.[0]}` };
}

export type GradingContext = {
  userId: string;
  subject: string;
  topic: string;
};

export class AnswerGrader {
  constructor(
    private readonly generator: QuestionGenerator,
    private readonly fuzzyThreshold = 0.85
  ) {}

  async grade(ctx: GradingContext, question: Question, answer: string): Promise<GradeResult> {
    switch (question.type) {
      case "multiple_choice":
        return gradeMultipleChoice(question, answer);
      case "short_answer":
        return gradeShortAnswer(question, answer, this.fuzzyThreshold);
      case "open_ended":
        return this.gradeWithRubric(ctx, question, answer);
    }
  }

  private async gradeWithRubric(ctx: GradingContext, question: Question, answer: string): Promise<GradeResult> {
    if (!answer.trim()) {
      return { correct: false, score: 0, feedback: "No answer given." };
    }
    const prompt = buildGradingPrompt({
      subject: ctx.subject,
      topic: ctx.topic,
      difficulty: question.difficulty,
      question: question.prompt,
      rubric: question.rubric ?? question.explanation,
      answer,
    });
    const verdict = await this.generator.requestStructured(ctx.userId, prompt, GradingVerdictSchema, "grading");
    return { correct: verdict.isCorrect, score: verdict.score, feedback: verdict.feedback || null };
  }
}
