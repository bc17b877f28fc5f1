import type { Difficulty, QuestionType } from "@/types/study";

type QuestionPromptParams = {
  subject: string;
  topic: string;
  difficulty: Difficulty;
  questionTypes: readonly QuestionType[];
  /** Recently asked prompts, newest last. */
  recentQuestions?: readonly string[];
  /** Rendered grounding block, omitted when ungrounded. */
  grounding?: string | null;
};

const MAX_AVOID = 5;
const MAX_AVOID_CHARS = 100;

const DIFFICULTY_GUIDE: Record<Difficulty, string> = {
  beginner: "recall of core definitions and simple direct applications",
  intermediate: "applying concepts to unfamiliar examples, two-step reasoning",
  advanced: "analysis, edge cases, combining several concepts",
};

const TYPE_SHAPES: Record<QuestionType, string> = {
  multiple_choice: `"multiple_choice": include "choices" (4 distinct strings, <=12 words each) and "correctIndex" (0-based)`,
  short_answer: `"short_answer": include "acceptedAnswers" (1-5 short strings, any of which is correct)`,
  open_ended: `"open_ended": include "rubric" (what a correct answer must contain)`,
};

export function buildQuestionPrompt(params: QuestionPromptParams): string {
  const { subject, topic, difficulty, questionTypes } = params;

  const lines = [
    `You are an expert tutor writing ONE practice question. Return ONLY valid JSON (no markdown, no prose).`,
    `JSON Schema: { type: ${questionTypes.map((t) => `"${t}"`).join("|")}, prompt: string, choices?: string[], correctIndex?: number, acceptedAnswers?: string[], rubric?: string, explanation: string, difficulty: "${difficulty}" }`,
    `Type rules:`,
    ...questionTypes.map((t) => `- ${TYPE_SHAPES[t]}`),
    `Explanation: <=40 words on why the answer is correct. Echo difficulty exactly.`,
    ``,
    `Subject: ${subject}`,
    `Topic: ${topic}`,
    `Difficulty: ${difficulty} (${DIFFICULTY_GUIDE[difficulty]})`,
  ];

  const avoid = (params.recentQuestions ?? [])
    .slice(-MAX_AVOID)
    .map((q) => q.trim())
    .filter(Boolean)
    .map((q) => (q.length > MAX_AVOID_CHARS ? q.slice(0, MAX_AVOID_CHARS) : q));
  if (avoid.length) {
    lines.push(`Do not repeat or closely mirror these recent questions: ${avoid.map((a) => `"${a}"`).join("; ")}`);
  }

  if (params.grounding && params.grounding.trim()) {
    lines.push(``, `Study material excerpts (base the question on this material):`, params.grounding.trim());
  }

  lines.push(``, `Respond with a single JSON object matching the schema.`);
  return lines.join("\n");
}

const CORRECTION_HEADER = "\n\nYour previous reply could not be used";

/**
 * Re-prompt after a malformed reply. The echoed reply is cut so the whole
 * prompt stays within `maxChars`; when even the problem text doesn't fit the
 * original prompt is returned unchanged.
 */
export function buildCorrectivePrompt(basePrompt: string, problem: string, previousReply: string, maxChars: number): string {
  const head = `${basePrompt}${CORRECTION_HEADER}: ${problem.slice(0, 300)}.`;
  const tail = `\nReturn ONLY the corrected JSON object.`;
  if (head.length + tail.length > maxChars) return basePrompt;

  const room = maxChars - head.length - tail.length - `\nPrevious reply: `.length;
  const reply = previousReply.trim();
  const echo = room > 20 && reply ? `\nPrevious reply: ${reply.slice(0, room)}` : "";
  return `${head}${echo}${tail}`;
}

type GradingPromptParams = {
  subject: string;
  topic: string;
  difficulty: Difficulty;
  question: string;
  rubric: string;
  answer: string;
};

export function buildGradingPrompt(params: GradingPromptParams): string {
  return [
    `You are a fair, encouraging tutor grading a ${params.difficulty} level answer in ${params.subject} (${params.topic}).`,
    `Question: ${params.question}`,
    `Rubric: ${params.rubric}`,
    `Learner answer: ${params.answer.slice(0, 1500)}`,
    `Give partial credit in "score" but mark isCorrect true only when the rubric's essentials are present.`,
    `Return ONLY JSON: { "isCorrect": boolean, "score": number (0.0-1.0), "feedback": string (<=30 words) }`,
  ].join("\n");
}

export function buildExplanationPrompt(subject: string, topic: string, difficulty: Difficulty): string {
  return [
    `You are a patient tutor who explains concepts clearly.`,
    `Explain ${topic} in ${subject} at a ${difficulty} level (${DIFFICULTY_GUIDE[difficulty]}).`,
    `Use plain language, one worked example, and keep it under 200 words.`,
  ].join("\n");
}
