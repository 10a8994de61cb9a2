"use client";
import { useNow } from "@/lib/hooks/useNow";
import { secondsRemaining } from "@/lib/session";
import type { RoundResponse } from "@/lib/types";

export function ExplanationPanel({
  correct,
  correctAnswer,
  round,
  advanceAt,
  isLast,
  onNext,
}: {
  correct: boolean;
  correctAnswer: string;
  /** null while the explanation is being generated */
  round: RoundResponse | null;
  advanceAt: number | null;
  isLast: boolean;
  onNext: () => void;
}) {
  const now = useNow(advanceAt !== null);
  const seconds = secondsRemaining(advanceAt, now);

  return (
    <div className="card p-5 grid gap-3">
      {correct ? (
        <div className="text-green-400 font-semibold">Correct! Great job!</div>
      ) : (
        <div className="text-red-400 font-semibold">
          Wrong! The correct answer was: <span className="text-white">{correctAnswer}</span>
        </div>
      )}

      {round === null ? (
        <div className="text-sm text-white/60">AI is thinking...</div>
      ) : (
        <div className="text-sm">
          <div className="font-semibold mb-1">AI Explanation</div>
          <p className="text-white/80 whitespace-pre-line">{round.record.explanation}</p>
          {round.explanationError && (
            <div className="mt-2 text-xs text-amber-300">{round.explanationError}</div>
          )}
          {round.logError && <div className="mt-1 text-xs text-amber-300">{round.logError}</div>}
        </div>
      )}

      {round !== null && (
        <div className="flex items-center justify-between gap-3 text-sm text-white/60">
          <span>
            {isLast ? "Results" : "Next question"} in {seconds} seconds...
          </span>
          <button className="btn btn-ghost" onClick={onNext}>
            {isLast ? "See results" : "Next question"}
          </button>
        </div>
      )}
    </div>
  );
}
