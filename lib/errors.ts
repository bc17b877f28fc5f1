export type StudyErrorCode =
  | "invalid_input"
  | "state"
  | "rate_limited"
  | "generation_failed"
  | "prompt_too_large"
  | "extraction_failed"
  | "unsupported_format"
  | "embedding_failed"
  | "unavailable"
  | "import_invalid";

const GENERIC_MESSAGE = "Something went wrong. Please try again.";

export class StudyError extends Error {
  readonly code: StudyErrorCode;
  /** Safe to show to the learner. */
  readonly userMessage: string;

  constructor(code: StudyErrorCode, message: string, userMessage = GENERIC_MESSAGE, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.userMessage = userMessage;
  }
}

export class InvalidInputError extends StudyError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("invalid_input", `${field}: ${message}`, message);
    this.field = field;
  }
}

export class StateError extends StudyError {
  constructor(message: string) {
    super("state", message, "That action is not available right now.");
  }
}

export class RateLimitExceededError extends StudyError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    const seconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
    super(
      "rate_limited",
      `rate limit exceeded, retry in ${retryAfterMs}ms`,
      `You're going a little fast. Try again in ${seconds} second${seconds === 1 ? "" : "s"}.`
    );
    this.retryAfterMs = retryAfterMs;
  }
}

export type GenerationFailureReason = "malformed" | "unavailable" | "timeout";

export class GenerationError extends StudyError {
  readonly reason: GenerationFailureReason;
  readonly attempts: number;

  constructor(reason: GenerationFailureReason, attempts: number, message: string, options?: { cause?: unknown }) {
    super("generation_failed", message, GENERIC_MESSAGE, options);
    this.reason = reason;
    this.attempts = attempts;
  }
}

export class PromptTooLargeError extends StudyError {
  readonly length: number;
  readonly limit: number;

  constructor(length: number, limit: number) {
    super("prompt_too_large", `prompt is ${length} chars, limit is ${limit}`);
    this.length = length;
    this.limit = limit;
  }
}

export class ExtractionError extends StudyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extraction_failed", message, "We couldn't read that document.", options);
  }
}

export class UnsupportedFormatError extends StudyError {
  readonly declaredType: string;

  constructor(declaredType: string) {
    super("unsupported_format", `unsupported document type: ${declaredType}`, "That file type isn't supported.");
    this.declaredType = declaredType;
  }
}

export class EmbeddingError extends StudyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding_failed", message, GENERIC_MESSAGE, options);
  }
}

/** The completion backend could not be reached. */
export class UnavailableError extends StudyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("unavailable", message, GENERIC_MESSAGE, options);
  }
}

export type ImportIssue = { path: string; message: string };

export class ImportValidationError extends StudyError {
  readonly issues: ImportIssue[];

  constructor(issues: ImportIssue[]) {
    super(
      "import_invalid",
      `import rejected: ${issues.map((i) => `${i.path || "<root>"} ${i.message}`).join("; ")}`,
      "That progress file is invalid and was not imported."
    );
    this.issues = issues;
  }
}

export type UserFacingError = {
  code: StudyErrorCode | "internal";
  message: string;
  retryAfterMs?: number;
};

export function toUserFacingError(err: unknown): UserFacingError {
  if (err instanceof RateLimitExceededError) {
    return { code: err.code, message: err.userMessage, retryAfterMs: err.retryAfterMs };
  }
  if (err instanceof StudyError) {
    return { code: err.code, message: err.userMessage };
  }
  return { code: "internal", message: GENERIC_MESSAGE };
}
