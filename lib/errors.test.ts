import { describe, expect, it } from "vitest";
import {
  GenerationError,
  ImportValidationError,
  InvalidInputError,
  RateLimitExceededError,
  StudyError,
  toUserFacingError,
} from "./errors";

describe("toUserFacingError", () => {
  it("tells the learner when to retry after a rate limit", () => {
    expect(toUserFacingError(new RateLimitExceededError(1500))).toEqual({
      code: "rate_limited",
      message: "You're going a little fast. Try again in 2 seconds.",
      retryAfterMs: 1500,
    });
  });

  it("passes invalid input messages through", () => {
    expect(toUserFacingError(new InvalidInputError("subject", "subject can't be empty."))).toEqual({
      code: "invalid_input",
      message: "subject can't be empty.",
    });
  });

  it("hides internal detail", () => {
    const err = new GenerationError("malformed", 3, "question generation failed after 3 attempts (malformed)");
    expect(toUserFacingError(err)).toEqual({
      code: "generation_failed",
      message: "Something went wrong. Please try again.",
    });
    expect(toUserFacingError(new TypeError("x is undefined"))).toEqual({
      code: "internal",
      message: "Something went wrong. Please try again.",
    });
  });
});

describe("StudyError", () => {
  it("names subclasses after themselves", () => {
    const err = new ImportValidationError([{ path: "masteryRecords.0.score", message: "too big" }]);
    expect(err).toBeInstanceOf(StudyError);
    expect(err.name).toBe("ImportValidationError");
    expect(err.message).toBe("import rejected: masteryRecords.0.score too big");
  });
});
