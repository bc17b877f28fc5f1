import { z } from "zod";

export const DifficultySchema = z.enum(["beginner", "intermediate", "advanced"]);
export const QuestionTypeSchema = z.enum(["multiple_choice", "short_answer", "open_ended"]);

export const MAX_QUESTION_CHARS = 600;

// One generated question as the model must return it
export const GeneratedQuestionSchema = z
  .object({
    type: QuestionTypeSchema,
    prompt: z.string().trim().min(5).max(MAX_QUESTION_CHARS),
    choices: z.array(z.string().trim().min(1).max(200)).min(2).max(6).optional(),
    correctIndex: z.number().int().min(0).optional(),
    acceptedAnswers: z.array(z.string().trim().min(1).max(200)).min(1).max(10).optional(),
    rubric: z.string().trim().min(5).max(800).optional(),
    explanation: z.string().trim().min(3).max(400),
    difficulty: DifficultySchema,
  })
  .superRefine((question, ctx) => {
    if (question.type === "multiple_choice") {
      if (!question.choices) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["choices"], message: "multiple_choice needs choices" });
      } else if (question.correctIndex === undefined || question.correctIndex >= question.choices.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["correctIndex"],
          message: "correctIndex must reference one of the choices",
        });
      } else if (new Set(question.choices.map((c) => c.toLowerCase())).size !== question.choices.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["choices"], message: "choices must be distinct" });
      }
    }
    if (question.type === "short_answer" && !question.acceptedAnswers) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["acceptedAnswers"],
        message: "short_answer needs acceptedAnswers",
      });
    }
    if (question.type === "open_ended" && !question.rubric) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["rubric"], message: "open_ended needs a rubric" });
    }
  });
export type GeneratedQuestion = z.infer<typeof GeneratedQuestionSchema>;

export const GradingVerdictSchema = z.object({
  isCorrect: z.boolean(),
  score: z.number().min(0).max(1),
  feedback: z.string().trim().max(400).default(""),
});
export type GradingVerdict = z.infer<typeof GradingVerdictSchema>;

const IsoDate = z.string().refine((v) => !Number.isNaN(Date.parse(v)), { message: "must be an ISO timestamp" });

export const ExportedMasterySchema = z
  .object({
    subject: z.string().min(1),
    topic: z.string().min(1),
    difficulty: DifficultySchema,
    score: z.number().min(0).max(1),
    window: z.array(z.boolean()),
    attempts: z.number().int().min(0),
    correct: z.number().int().min(0),
    consecutiveCorrect: z.number().int().min(0),
    consecutiveIncorrect: z.number().int().min(0),
    updatedAt: IsoDate,
  })
  .strict()
  .superRefine((record, ctx) => {
    if (record.correct > record.attempts) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["correct"], message: "correct exceeds attempts" });
    }
    if (record.window.length > record.attempts) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["window"], message: "window longer than attempts" });
    }
    if (record.consecutiveCorrect > 0 && record.consecutiveIncorrect > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["consecutiveCorrect"],
        message: "both streaks cannot be active at once",
      });
    }
  });
export type ExportedMastery = z.infer<typeof ExportedMasterySchema>;

export const ExportedSessionSchema = z
  .object({
    id: z.string().min(1),
    subject: z.string().min(1),
    topic: z.string().min(1),
    difficulty: DifficultySchema,
    status: z.enum(["created", "active", "completed", "expired"]),
    aborted: z.boolean(),
    questionsAnswered: z.number().int().min(0),
    questionsCorrect: z.number().int().min(0),
    accuracy: z.number().min(0).max(100),
    restartCount: z.number().int().min(0),
    startedAt: IsoDate,
    endedAt: IsoDate.nullable(),
  })
  .strict()
  .superRefine((session, ctx) => {
    if (session.questionsCorrect > session.questionsAnswered) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["questionsCorrect"],
        message: "questionsCorrect exceeds questionsAnswered",
      });
    }
  });

export const EXPORT_VERSION = "1.0";

export const ProgressExportSchema = z
  .object({
    exportVersion: z.literal(EXPORT_VERSION),
    exportedAt: IsoDate,
    userId: z.string().min(1),
    masteryRecords: z.array(ExportedMasterySchema),
    sessions: z.array(ExportedSessionSchema),
  })
  .strict()
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.masteryRecords.forEach((record, idx) => {
      const key = `${record.subject}\u0000${record.topic}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["masteryRecords", idx],
          message: `duplicate record for ${record.subject} / ${record.topic}`,
        });
      }
      seen.add(key);
    });
    const ids = new Set<string>();
    file.sessions.forEach((session, idx) => {
      if (ids.has(session.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["sessions", idx, "id"], message: "duplicate session id" });
      }
      ids.add(session.id);
    });
  });
export type ProgressExport = z.infer<typeof ProgressExportSchema>;
