import { z } from "zod";

export const DifficultySchema = z.enum(["easy", "medium", "hard"]);

export const QuestionSchema = z
  .object({
    id: z.string().min(1),
    prompt: z.string().min(1),
    options: z.array(z.string()).min(2),
    correct: z.string().min(1),
    category: z.string().optional(),
    difficulty: DifficultySchema.optional(),
  })
  .refine((q) => q.options.includes(q.correct), {
    message: "correct answer must be one of the options",
    path: ["correct"],
  });

export const RoundRecordSchema = z.object({
  question: z.string(),
  options: z.array(z.string()),
  yourAnswer: z.string(),
  correctAnswer: z.string(),
  correct: z.boolean(),
  explanation: z.string(),
  category: z.string().optional(),
  difficulty: DifficultySchema.optional(),
  timestamp: z.string(),
});

export const RoundRequestSchema = z
  .object({
    question: QuestionSchema,
    answer: z.string().min(1),
  })
  .refine((b) => b.question.options.includes(b.answer), {
    message: "answer must be one of the question options",
    path: ["answer"],
  });

export const QuestionQuerySchema = z.object({
  category: z.coerce.number().int().min(9).max(99).optional(),
  difficulty: DifficultySchema.optional(),
});

export const RoundResponseSchema = z.object({
  record: RoundRecordSchema,
  explanationError: z.string().optional(),
  logError: z.string().optional(),
});
