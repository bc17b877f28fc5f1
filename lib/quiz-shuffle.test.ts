import { describe, expect, it } from "vitest";
import { shuffleChoices } from "./quiz-shuffle";

describe("shuffleChoices", () => {
  it("moves the answer key along with its choice", () => {
    const original = { choices: ["a", "b", "c"], correctIndex: 2 };
    const shuffled = shuffleChoices(original, () => 0);
    expect(shuffled).toEqual({ choices: ["b", "c", "a"], correctIndex: 1 });
    expect(original.choices).toEqual(["a", "b", "c"]);
  });

  it("leaves single-choice questions alone", () => {
    const question = { choices: ["only"], correctIndex: 0 };
    expect(shuffleChoices(question, () => 0.5)).toBe(question);
  });

  it("always points at the same text whatever the draw", () => {
    const question = { choices: ["w", "x", "y", "z"], correctIndex: 1 };
    for (const draw of [0, 0.2, 0.5, 0.7, 0.99]) {
      const shuffled = shuffleChoices(question, () => draw);
      expect(shuffled.choices[shuffled.correctIndex]).toBe("x");
      expect([...shuffled.choices].sort()).toEqual(["w", "x", "y", "z"]);
    }
  });
});
