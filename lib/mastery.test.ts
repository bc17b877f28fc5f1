import { describe, expect, it } from "vitest";
import type { Difficulty, MasteryRecord } from "@/types/study";
import { DIFFICULTIES } from "@/types/study";
import {
  DEFAULT_MASTERY_POLICY,
  MasteryTracker,
  emptyMasteryRecord,
  evaluateMastery,
  windowScore,
} from "./mastery";
import { InMemoryProgressStore } from "./progress-store";

const AT = "2026-01-05T09:00:00.000Z";

function run(verdicts: boolean[], start: Difficulty = "beginner") {
  let record = emptyMasteryRecord("u1", "Biology", "Cells", start, AT);
  const levels: Difficulty[] = [];
  for (const correct of verdicts) {
    const outcome = evaluateMastery(record, correct, record.difficulty, DEFAULT_MASTERY_POLICY, AT);
    record = outcome.record;
    levels.push(outcome.next);
  }
  return { record, levels };
}

describe("windowScore", () => {
  it("weights recent verdicts more", () => {
    expect(windowScore([true, false, true], 0.7)).toBeCloseTo(1.49 / 2.19);
    expect(windowScore([false, true], 1)).toBe(0.5);
    expect(windowScore([], 0.7)).toBe(0);
  });
});

describe("evaluateMastery", () => {
  it("moves up after three correct and back down after two wrong", () => {
    const { record, levels } = run([true, true, true, false, false]);
    expect(levels).toEqual(["beginner", "beginner", "intermediate", "intermediate", "beginner"]);
    expect(record.consecutiveCorrect).toBe(0);
    expect(record.consecutiveIncorrect).toBe(0);
    expect(record.attempts).toBe(5);
    expect(record.correct).toBe(3);
  });

  it("resets streaks after a level change so the next level is earned", () => {
    const { levels } = run([true, true, true, true, true, true]);
    expect(levels).toEqual(["beginner", "beginner", "intermediate", "intermediate", "intermediate", "advanced"]);
  });

  it("stays at the ends of the ladder", () => {
    expect(run([true, true, true, true], "advanced").levels).toEqual(["advanced", "advanced", "advanced", "advanced"]);
    expect(run([false, false, false], "beginner").levels).toEqual(["beginner", "beginner", "beginner"]);
  });

  it("keeps only the last N verdicts in the window", () => {
    const { record } = run([false, true, true, false, true, true, false]);
    expect(record.window).toEqual([true, false, true, true, false]);
  });

  it("holds the level when both thresholds fire", () => {
    const record = emptyMasteryRecord("u1", "Biology", "Cells", "intermediate", AT);
    const outcome = evaluateMastery(
      record,
      true,
      "intermediate",
      { ...DEFAULT_MASTERY_POLICY, thresholdUp: 0, thresholdDown: 0 },
      AT
    );
    expect(outcome.changed).toBe(false);
    expect(outcome.next).toBe("intermediate");
  });

  it("starts from the difficulty in force, not the stored one", () => {
    const stored: MasteryRecord = {
      ...emptyMasteryRecord("u1", "Biology", "Cells", "advanced", AT),
      consecutiveIncorrect: 1,
      attempts: 1,
      window: [false],
    };
    const outcome = evaluateMastery(stored, false, "intermediate", DEFAULT_MASTERY_POLICY, AT);
    expect([outcome.previous, outcome.next]).toEqual(["intermediate", "beginner"]);
  });

  it("never moves more than one level per verdict", () => {
    let seed = 7;
    const verdicts = Array.from({ length: 300 }, () => {
      seed = (seed * 48271) % 2147483647;
      return seed % 3 !== 0;
    });
    let record = emptyMasteryRecord("u1", "Biology", "Cells", "beginner", AT);
    for (const correct of verdicts) {
      const outcome = evaluateMastery(record, correct, record.difficulty, DEFAULT_MASTERY_POLICY, AT);
      const step = Math.abs(DIFFICULTIES.indexOf(outcome.next) - DIFFICULTIES.indexOf(outcome.previous));
      expect(step).toBeLessThanOrEqual(1);
      expect(outcome.score).toBeGreaterThanOrEqual(0);
      expect(outcome.score).toBeLessThanOrEqual(1);
      record = outcome.record;
    }
  });
});

function seededRecord(subject: string, topic: string, score: number, updatedAt = AT): MasteryRecord {
  return { ...emptyMasteryRecord("u1", subject, topic, "beginner", updatedAt), score, attempts: 4, correct: 2 };
}

async function trackerWith(records: MasteryRecord[]) {
  const store = new InMemoryProgressStore();
  await store.applyImport("u1", { records, sessions: [] });
  return new MasteryTracker(store, DEFAULT_MASTERY_POLICY, () => Date.parse(AT));
}

describe("MasteryTracker", () => {
  it("summarizes a subject", async () => {
    const tracker = await trackerWith([
      seededRecord("Biology", "Cells", 0.9),
      seededRecord("Biology", "Genetics", 0.3),
      seededRecord("Biology", "Ecology", 0.5),
      seededRecord("Chemistry", "Acids", 0.1),
    ]);
    const summary = await tracker.summarizeSubject("u1", "Biology");
    expect(summary.overallMastery).toBeCloseTo(1.7 / 3);
    expect(summary.topicsStarted).toBe(3);
    expect(summary.topicsMastered).toBe(1);
    expect(summary.topics.map((t) => t.topic)).toEqual(["Cells", "Genetics", "Ecology"]);
  });

  it("suggests the weakest unmastered topic", async () => {
    const tracker = await trackerWith([
      seededRecord("Biology", "Cells", 0.9),
      seededRecord("Biology", "Genetics", 0.3),
      seededRecord("Biology", "Ecology", 0.5),
    ]);
    expect(await tracker.suggestNextTopic("u1", "Biology")).toBe("Genetics");
    expect(await tracker.suggestNextTopic("u1", "Physics")).toBeNull();
  });

  it("returns an empty summary for an unknown subject", async () => {
    const tracker = await trackerWith([]);
    expect(await tracker.summarizeSubject("u1", "Physics")).toEqual({
      subject: "Physics",
      overallMastery: 0,
      topicsStarted: 0,
      topicsMastered: 0,
      topics: [],
    });
  });

  it("evaluates a first verdict from an empty record without persisting it", async () => {
    const tracker = await trackerWith([]);
    const outcome = await tracker.recordVerdict("u1", "Biology", "Cells", true, "intermediate");
    expect(outcome.record).toMatchObject({ attempts: 1, correct: 1, difficulty: "intermediate", window: [true] });
    expect(await tracker.getRecord("u1", "Biology", "Cells")).toBeNull();
  });
});
