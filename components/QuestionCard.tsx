"use client";
import { useMemo } from "react";
import type { Question } from "@/lib/types";

export function QuestionCard({
  q,
  index,
  total,
  selected,
  locked,
  onSelect,
  onSubmit,
}: {
  q: Question;
  index: number;
  total: number;
  selected: string | null;
  /** true once the answer is submitted: options are frozen and marked */
  locked: boolean;
  onSelect: (option: string) => void;
  onSubmit: () => void;
}) {
  const letters = useMemo(() => ["A", "B", "C", "D", "E", "F"], []);
  const caption = [q.category, q.difficulty].filter(Boolean).join(" | ");

  return (
    <div className="card p-6">
      <div className="text-sm text-white/70 mb-2">
        Question {index + 1} of {total}
        {caption && <span> ・ {caption}</span>}
      </div>
      <h2 className="text-xl font-semibold mb-4">{q.prompt}</h2>
      <div className="grid gap-3" role="radiogroup" aria-label="Choose your answer">
        {q.options.map((c, i) => {
          const active = selected === c;
          let tone = active ? "bg-blue-600" : "btn-ghost";
          if (locked && c === q.correct) tone = "bg-green-600";
          else if (locked && active) tone = "bg-red-600";
          return (
            <button
              key={c}
              role="radio"
              aria-checked={active}
              className={`btn text-left border border-white/10 ${tone}`}
              disabled={locked}
              onClick={() => onSelect(c)}
            >
              <span className="mr-2 opacity-70">{letters[i] ?? i + 1}.</span>
              {c}
            </button>
          );
        })}
      </div>
      {!locked && (
        <div className="mt-5 text-right">
          <button className="btn btn-primary" onClick={onSubmit} disabled={selected === null}>
            Submit Answer
          </button>
        </div>
      )}
    </div>
  );
}
