import type { Question, ScoreCounters } from "./types";

export const EMPTY_COUNTERS: ScoreCounters = { correct: 0, incorrect: 0 };

export function isCorrectAnswer(question: Pick<Question, "correct">, answer: string): boolean {
  return answer === question.correct;
}

export function evaluateAnswer(
  counters: ScoreCounters,
  question: Question,
  answer: string
): { correct: boolean; counters: ScoreCounters } {
  const correct = isCorrectAnswer(question, answer);
  return {
    correct,
    counters: correct
      ? { ...counters, correct: counters.correct + 1 }
      : { ...counters, incorrect: counters.incorrect + 1 },
  };
}

export interface ScoreSummary {
  answered: number;
  correct: number;
  incorrect: number;
  /** 0..100, 0 when nothing has been answered yet */
  percentage: number;
}

export function scoreSummary(counters: ScoreCounters): ScoreSummary {
  const answered = counters.correct + counters.incorrect;
  return {
    answered,
    correct: counters.correct,
    incorrect: counters.incorrect,
    percentage: answered === 0 ? 0 : (100 * counters.correct) / answered,
  };
}
