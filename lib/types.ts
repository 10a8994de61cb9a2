export type Difficulty = "easy" | "medium" | "hard";

export interface Question {
  id: string;
  prompt: string;
  options: string[];
  correct: string;
  category?: string;
  difficulty?: Difficulty;
}

export interface RoundRecord {
  question: string;
  options: string[];
  yourAnswer: string;
  correctAnswer: string;
  correct: boolean;
  explanation: string;
  category?: string;
  difficulty?: Difficulty;
  timestamp: string;
}

export interface ScoreCounters {
  correct: number;
  incorrect: number;
}

export interface QuestionFilter {
  category?: number;
  difficulty?: Difficulty;
}

export interface RoundResponse {
  record: RoundRecord;
  explanationError?: string;
  logError?: string;
}
