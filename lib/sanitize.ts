import { InvalidInputError } from "./errors";

// Rejected in learner-supplied labels; these end up inside prompts and storage keys.
const DISALLOWED_CHARS = /[<>"';\\`{}]/;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

export type LabelLimits = {
  maxSubjectChars: number;
  maxTopicChars: number;
};

export function validateLabel(field: string, value: unknown, maxChars: number): string {
  if (typeof value !== "string") {
    throw new InvalidInputError(field, `${field} must be text.`);
  }
  const trimmed = value.trim().replace(/\s+/g, " ");
  if (!trimmed.length) {
    throw new InvalidInputError(field, `${field} can't be empty.`);
  }
  if (trimmed.length > maxChars) {
    throw new InvalidInputError(field, `${field} must be at most ${maxChars} characters.`);
  }
  if (DISALLOWED_CHARS.test(trimmed) || CONTROL_CHARS.test(trimmed)) {
    throw new InvalidInputError(field, `${field} contains characters that aren't allowed.`);
  }
  return trimmed;
}

export function validateSubjectTopic(subject: unknown, topic: unknown, limits: LabelLimits) {
  return {
    subject: validateLabel("subject", subject, limits.maxSubjectChars),
    topic: validateLabel("topic", topic, limits.maxTopicChars),
  };
}
