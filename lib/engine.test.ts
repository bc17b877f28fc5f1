import { describe, expect, it } from "vitest";
import { loadStudyConfig } from "./config";
import { createStudyEngine } from "./engine";
import { InMemoryProgressStore } from "./progress-store";
import { ManualClock, ScriptedCompletionClient, mcReply } from "./testing/fakes";

const NOTES = "Cells are the basic unit of life. Mitochondria produce ATP for the cell.";
const EXPLANATION = "ATP is the energy currency of the cell; mitochondria make most of it.";

function engine() {
  const clock = new ManualClock();
  const llm = new ScriptedCompletionClient([
    (prompt) => (prompt.includes("Explain") ? EXPLANATION : mcReply()),
  ]);
  const store = new InMemoryProgressStore();
  const study = createStudyEngine(loadStudyConfig({ STUDY_EMBEDDING_PROVIDER: "hashing" }), {
    llm,
    store,
    now: clock.now,
    random: () => 0,
  });
  return { clock, llm, store, study };
}

describe("createStudyEngine", () => {
  it("grounds questions on ingested notes", async () => {
    const { llm, study } = engine();
    const outcome = await study.index.ingestText("learner-1", { subject: "Biology", name: "notes.md", text: NOTES });
    expect(outcome.chunksCreated).toBe(1);

    const turn = await study.sessions.start("learner-1", { subject: "Biology", topic: "Cell energy" });

    expect(turn.question?.groundingChunkIds).toEqual([`${outcome.documentId}:0`]);
    expect(llm.prompts[0]).toContain(
      `Study material excerpts (base the question on this material):\n[1] ${NOTES}`
    );
    // choices are shuffled before the learner sees them
    expect(turn.question?.choices).toEqual(["Ribosome", "Golgi apparatus", "Lysosome", "Mitochondrion"]);
    expect(turn.question?.correctIndex).toBe(3);
  });

  it("records answers and exports the learner's progress", async () => {
    const { clock, study } = engine();
    const turn = await study.sessions.start("learner-1", { subject: "Biology", topic: "Cell energy" });

    clock.advance(4000);
    const answered = await study.sessions.submitAnswer(turn.session.id, "D", { timeTakenMs: 4000 });
    expect(answered.attempt.correct).toBe(true);

    const exported = await study.exportProgress("learner-1");
    expect(exported.userId).toBe("learner-1");
    expect(exported.exportedAt).toBe("2026-01-05T09:00:04.000Z");
    expect(exported.masteryRecords).toHaveLength(1);
    expect(exported.masteryRecords[0]).toMatchObject({
      subject: "Biology",
      topic: "Cell energy",
      difficulty: "beginner",
      attempts: 1,
      correct: 1,
      window: [true],
      score: 1,
    });
    expect(exported.sessions).toHaveLength(1);
    expect(exported.sessions[0]).toMatchObject({
      id: turn.session.id,
      status: "active",
      questionsAnswered: 1,
      questionsCorrect: 1,
      accuracy: 100,
    });
  });

  it("explains at the learner's stored level", async () => {
    const { llm, study } = engine();
    const text = await study.explainConcept("learner-1", "Biology", "Cell energy");

    expect(text).toBe(EXPLANATION);
    expect(llm.prompts[0]).toContain("beginner");
    expect(llm.options[0]).toMatchObject({ json: false });
  });

  it("imports progress into another engine", async () => {
    const first = engine();
    const turn = await first.study.sessions.start("learner-1", { subject: "Biology", topic: "Cell energy" });
    await first.study.sessions.submitAnswer(turn.session.id, "D");
    const file = JSON.stringify(await first.study.exportProgress("learner-1"));

    const second = engine();
    const result = await second.study.importProgress("learner-1", file);

    expect(result).toEqual({ recordsImported: 1, recordsSkipped: 0, sessionsImported: 1, sessionsSkipped: 0 });
    expect((await second.study.tracker.getRecord("learner-1", "Biology", "Cell energy"))?.attempts).toBe(1);
  });
});
