/**
 * Shuffles multiple-choice options using Fisher-Yates
 * while keeping the answer key pointing at the same option
 */

export interface ChoiceQuestion {
  choices: string[];
  correctIndex: number;
}

/**
 * Returns a copy of the question with shuffled choices and a remapped
 * correctIndex.
 *
 * @param random - source in [0, 1)
 */
export function shuffleChoices<T extends ChoiceQuestion>(question: T, random: () => number = Math.random): T {
  if (!Array.isArray(question.choices) || question.choices.length < 2) {
    return question;
  }

  let idx = question.correctIndex;
  if (!Number.isFinite(idx) || idx < 0 || idx >= question.choices.length) {
    idx = 0;
  }
  idx = Math.floor(idx);

  const decoratedChoices = question.choices.map((choice, i) => ({
    choice,
    originalIndex: i,
  }));

  for (let i = decoratedChoices.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [decoratedChoices[i], decoratedChoices[j]] = [decoratedChoices[j], decoratedChoices[i]];
  }

  const newIndex = decoratedChoices.findIndex((entry) => entry.originalIndex === idx);
  return {
    ...question,
    choices: decoratedChoices.map((entry) => entry.choice),
    correctIndex: newIndex >= 0 ? newIndex : 0,
  };
}
