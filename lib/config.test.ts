import { describe, expect, it } from "vitest";
import { loadStudyConfig } from "./config";

describe("loadStudyConfig", () => {
  it("uses the documented defaults", () => {
    const config = loadStudyConfig({});
    expect(config.rate).toEqual({ windowMs: 60_000, maxCalls: 30, maxPromptChars: 5000 });
    expect(config.retrieval).toEqual({ topK: 3, maxContextChars: 2500 });
    expect(config.mastery).toEqual({ windowSize: 5, decay: 0.7, thresholdUp: 3, thresholdDown: 2 });
    expect(config.session).toEqual({ durationMs: 1_800_000, maxQuestions: 15, maxSubjectChars: 100, maxTopicChars: 100 });
    expect(config.ingestion.maxTextChars).toBe(10_485_760);
    expect(config.embeddings.provider).toBe("openai");
    expect(config.supabase).toEqual({ url: null, serviceKey: null });
    expect(config.generation.shuffleChoices).toBe(true);
  });

  it("clamps out-of-range values and ignores garbage", () => {
    const config = loadStudyConfig({
      STUDY_RATE_MAX_CALLS: "0",
      STUDY_MAX_PROMPT_CHARS: "abc",
      STUDY_MASTERY_DECAY: "2",
      STUDY_RETRIEVAL_TOP_K: "",
    });
    expect(config.rate.maxCalls).toBe(1);
    expect(config.rate.maxPromptChars).toBe(5000);
    expect(config.mastery.decay).toBe(1);
    expect(config.retrieval.topK).toBe(3);
  });

  it("reads session minutes, providers and credentials", () => {
    const config = loadStudyConfig({
      STUDY_SESSION_MINUTES: "45",
      STUDY_EMBEDDING_PROVIDER: "hashing",
      OPENAI_API_KEY: "test-secret",
      SUPABASE_URL: " http://localhost:54321 ",
      SUPABASE_SERVICE_ROLE_KEY: "test-service-key",
      STUDY_SHUFFLE_CHOICES: "false",
    });
    expect(config.session.durationMs).toBe(2_700_000);
    expect(config.embeddings.provider).toBe("hashing");
    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.supabase).toEqual({ url: "http://localhost:54321", serviceKey: "test-service-key" });
    expect(config.generation.shuffleChoices).toBe(false);
  });
});
