import { EMPTY_COUNTERS, evaluateAnswer } from "./evaluator";
import type { Difficulty, Question, RoundResponse, ScoreCounters } from "./types";

export type Phase =
  | "loading"
  | "fetchFailed"
  | "awaitingAnswer"
  | "evaluating"
  | "showingExplanation"
  | "delaying"
  | "finished";

export interface SessionState {
  phase: Phase;
  /** questions in this quiz */
  total: number;
  delayMs: number;
  difficulty?: Difficulty;
  /**
   * Bumped on every transition into `loading` or `evaluating`. Async results
   * carry the value they were started with and are dropped when it no longer
   * matches.
   */
  seq: number;
  question: Question | null;
  selected: string | null;
  counters: ScoreCounters;
  answers: string[];
  lastCorrect: boolean | null;
  round: RoundResponse | null;
  advanceAt: number | null;
  error: string | null;
}

export type SessionAction =
  | { type: "retry" }
  | { type: "questionLoaded"; seq: number; question: Question }
  | { type: "questionFailed"; seq: number; message: string }
  | { type: "optionSelected"; option: string }
  | { type: "answerSubmitted" }
  | { type: "roundCompleted"; seq: number; round: RoundResponse }
  | { type: "delayStarted"; now: number }
  | { type: "advance" }
  | { type: "restart"; difficulty: Difficulty | undefined };

export interface SessionSettings {
  total: number;
  delayMs: number;
  difficulty?: Difficulty;
}

export function createInitialState({ total, delayMs, difficulty }: SessionSettings): SessionState {
  return {
    phase: "loading",
    total,
    delayMs,
    difficulty,
    seq: 1,
    question: null,
    selected: null,
    counters: EMPTY_COUNTERS,
    answers: [],
    lastCorrect: null,
    round: null,
    advanceAt: null,
    error: null,
  };
}

export function sessionReducer(state: SessionState, action: SessionAction): SessionState {
  switch (action.type) {
    case "retry":
      if (state.phase !== "fetchFailed") return state;
      return { ...state, phase: "loading", seq: state.seq + 1, error: null };

    case "questionLoaded":
      if (state.phase !== "loading" || action.seq !== state.seq) return state;
      return {
        ...state,
        phase: "awaitingAnswer",
        question: action.question,
        selected: null,
        lastCorrect: null,
        round: null,
        advanceAt: null,
        error: null,
      };

    case "questionFailed":
      if (state.phase !== "loading" || action.seq !== state.seq) return state;
      return { ...state, phase: "fetchFailed", error: action.message };

    case "optionSelected":
      if (state.phase !== "awaitingAnswer" || !state.question) return state;
      if (!state.question.options.includes(action.option)) return state;
      return { ...state, selected: action.option };

    case "answerSubmitted": {
      if (state.phase !== "awaitingAnswer" || !state.question || state.selected === null) {
        return state;
      }
      const { correct, counters } = evaluateAnswer(state.counters, state.question, state.selected);
      return {
        ...state,
        phase: "evaluating",
        seq: state.seq + 1,
        counters,
        answers: [...state.answers, state.selected],
        lastCorrect: correct,
      };
    }

    case "roundCompleted":
      if (state.phase !== "evaluating" || action.seq !== state.seq) return state;
      return { ...state, phase: "showingExplanation", round: action.round };

    case "delayStarted":
      if (state.phase !== "showingExplanation") return state;
      return { ...state, phase: "delaying", advanceAt: action.now + state.delayMs };

    case "advance":
      if (state.phase !== "delaying" && state.phase !== "showingExplanation") return state;
      if (state.answers.length >= state.total) {
        return { ...state, phase: "finished", advanceAt: null };
      }
      return {
        ...state,
        phase: "loading",
        seq: state.seq + 1,
        question: null,
        selected: null,
        advanceAt: null,
      };

    case "restart":
      return {
        ...createInitialState({
          total: state.total,
          delayMs: state.delayMs,
          difficulty: action.difficulty,
        }),
        seq: state.seq + 1,
      };
  }
}

export function secondsRemaining(advanceAt: number | null, now: number): number {
  if (advanceAt === null) return 0;
  return Math.max(0, Math.ceil((advanceAt - now) / 1000));
}

export function progressPercent(state: Pick<SessionState, "answers" | "total">): number {
  if (state.total <= 0) return 0;
  return Math.round((Math.min(state.answers.length, state.total) / state.total) * 100);
}
