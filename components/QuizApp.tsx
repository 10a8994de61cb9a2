"use client";
import { useState } from "react";
import { ExplanationPanel } from "@/components/ExplanationPanel";
import { QuestionCard } from "@/components/QuestionCard";
import { QuizHistory } from "@/components/QuizHistory";
import { ScoreBoard } from "@/components/ScoreBoard";
import { Select } from "@/components/Select";
import type { PublicConfig } from "@/lib/config";
import { scoreSummary } from "@/lib/evaluator";
import { progressPercent } from "@/lib/session";
import { QuizSessionProvider, useQuizSession } from "@/lib/store";
import type { Difficulty } from "@/lib/types";

type DifficultyChoice = Difficulty | "any";

const DIFFICULTY_OPTIONS: { value: DifficultyChoice; label: string }[] = [
  { value: "any", label: "Any difficulty" },
  { value: "easy", label: "easy" },
  { value: "medium", label: "medium" },
  { value: "hard", label: "hard" },
];

function Finished() {
  const { state, restart } = useQuizSession();
  const [difficulty, setDifficulty] = useState<DifficultyChoice>(state.difficulty ?? "any");
  const s = scoreSummary(state.counters);

  return (
    <div className="card p-6 grid gap-4 text-center">
      <h2 className="text-2xl font-bold">Quiz Complete!</h2>
      <div className="text-4xl font-semibold">
        {s.correct} / {state.total}
      </div>
      <div className="h-2 bg-white/10 rounded-full overflow-hidden">
        <div className="h-full bg-green-500" style={{ width: `${s.percentage}%` }} />
      </div>
      <p className="text-white/70">
        <strong>{Math.round(s.percentage)}%</strong> Correct
      </p>
      <div className="grid sm:grid-cols-2 gap-3 items-end text-left">
        <Select
          id="difficulty"
          label="Difficulty"
          value={difficulty}
          onChange={setDifficulty}
          options={DIFFICULTY_OPTIONS}
        />
        <button
          className="btn btn-success"
          onClick={() => restart(difficulty === "any" ? undefined : difficulty)}
        >
          Start New Quiz
        </button>
      </div>
    </div>
  );
}

function QuizScreen() {
  const { state, select, submit, skipWait, retry } = useQuizSession();
  const { phase, question } = state;
  const progress = progressPercent(state);
  const completedRounds = phase === "evaluating" ? state.answers.length - 1 : state.answers.length;

  return (
    <div className="space-y-6">
      <div className="h-2 bg-white/10 rounded-full overflow-hidden">
        <div className="h-full bg-blue-500" style={{ width: `${progress}%` }} />
      </div>

      {phase === "loading" && <div className="card p-6 text-white/70">Loading question...</div>}

      {phase === "fetchFailed" && (
        <div className="card p-4 text-red-300 border-red-500/40 border flex items-center justify-between gap-3">
          <span>Error: {state.error}</span>
          <button className="btn btn-ghost" onClick={retry}>
            Retry
          </button>
        </div>
      )}

      {question && phase !== "loading" && phase !== "finished" && (
        <QuestionCard
          q={question}
          index={phase === "awaitingAnswer" ? state.answers.length : state.answers.length - 1}
          total={state.total}
          selected={state.selected}
          locked={phase !== "awaitingAnswer"}
          onSelect={select}
          onSubmit={submit}
        />
      )}

      {question && state.lastCorrect !== null && phase !== "awaitingAnswer" && phase !== "finished" && (
        <ExplanationPanel
          correct={state.lastCorrect}
          correctAnswer={question.correct}
          round={state.round}
          advanceAt={state.advanceAt}
          isLast={state.answers.length >= state.total}
          onNext={skipWait}
        />
      )}

      {phase === "finished" && <Finished />}

      <ScoreBoard total={state.total} counters={state.counters} />
      <QuizHistory refreshKey={completedRounds} />
    </div>
  );
}

export function QuizApp({ config }: { config: PublicConfig }) {
  return (
    <QuizSessionProvider
      settings={{ total: config.questionCount, delayMs: config.advanceDelayMs }}
    >
      <QuizScreen />
    </QuizSessionProvider>
  );
}
