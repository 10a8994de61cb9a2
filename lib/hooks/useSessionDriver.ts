import { Dispatch, useEffect, useRef } from "react";
import { fetchNextQuestion, submitRound } from "@/lib/api/quizApi";
import { FALLBACK_EXPLANATION, buildRoundRecord } from "@/lib/records";
import type { SessionAction, SessionState } from "@/lib/session";

/**
 * Runs the side effects of the session state machine: question fetches,
 * round submission and the auto-advance timer. Each async step runs at most
 * once per `state.seq`.
 */
export function useSessionDriver(state: SessionState, dispatch: Dispatch<SessionAction>) {
  const started = useRef(0);
  const { phase, seq, difficulty, question, selected, advanceAt } = state;

  useEffect(() => {
    if (phase !== "loading" || started.current === seq) return;
    started.current = seq;
    fetchNextQuestion({ difficulty })
      .then((q) => dispatch({ type: "questionLoaded", seq, question: q }))
      .catch((err: unknown) =>
        dispatch({
          type: "questionFailed",
          seq,
          message: err instanceof Error ? err.message : "Could not load a question",
        })
      );
  }, [phase, seq, difficulty, dispatch]);

  useEffect(() => {
    if (phase !== "evaluating" || started.current === seq) return;
    if (!question || selected === null) return;
    started.current = seq;
    submitRound(question, selected)
      .then((round) => dispatch({ type: "roundCompleted", seq, round }))
      .catch((err: unknown) =>
        dispatch({
          type: "roundCompleted",
          seq,
          round: {
            record: buildRoundRecord(question, selected, FALLBACK_EXPLANATION, new Date()),
            explanationError: err instanceof Error ? err.message : "Round could not be saved",
            logError: "Round was not saved",
          },
        })
      );
  }, [phase, seq, question, selected, dispatch]);

  useEffect(() => {
    if (phase === "showingExplanation") dispatch({ type: "delayStarted", now: Date.now() });
  }, [phase, dispatch]);

  useEffect(() => {
    if (phase !== "delaying" || advanceAt === null) return;
    const timer = setTimeout(() => dispatch({ type: "advance" }), Math.max(0, advanceAt - Date.now()));
    return () => clearTimeout(timer);
  }, [phase, advanceAt, dispatch]);
}
