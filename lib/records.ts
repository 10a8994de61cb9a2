import { isCorrectAnswer } from "./evaluator";
import type { Question, RoundRecord } from "./types";

export const FALLBACK_EXPLANATION = "Explanation unavailable right now.";

export function buildRoundRecord(
  question: Question,
  answer: string,
  explanation: string,
  at: Date
): RoundRecord {
  return {
    question: question.prompt,
    options: [...question.options],
    yourAnswer: answer,
    correctAnswer: question.correct,
    correct: isCorrectAnswer(question, answer),
    explanation,
    category: question.category,
    difficulty: question.difficulty,
    timestamp: at.toISOString(),
  };
}
