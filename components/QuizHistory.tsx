"use client";
import { useCallback, useState } from "react";
import { useRemoteCollection } from "@/lib/hooks/useRemoteCollection";
import { RoundRecordSchema } from "@/lib/schemas";
import type { RoundRecord } from "@/lib/types";

export function QuizHistory({ refreshKey }: { refreshKey: number }) {
  const [open, setOpen] = useState(false);

  const mapRound = useCallback((raw: unknown): RoundRecord | null => {
    const parsed = RoundRecordSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }, []);

  const { items, loading, error } = useRemoteCollection<RoundRecord>({
    url: "/api/rounds",
    mapItem: mapRound,
    dependencies: [refreshKey],
    enabled: open,
  });

  return (
    <div className="card p-4">
      <button className="w-full text-left font-semibold" onClick={() => setOpen((o) => !o)}>
        {open ? "▾" : "▸"} View Quiz History
      </button>
      {open && (
        <div className="mt-3 grid gap-3">
          {loading && <div className="text-sm text-white/60">Loading...</div>}
          {error && <div className="text-sm text-red-400">{error}</div>}
          {!loading && !error && items.length === 0 && (
            <div className="text-sm text-white/60">No quiz history yet!</div>
          )}
          {[...items].reverse().map((r) => (
            <div key={`${r.timestamp}-${r.question}`} className="text-sm border-t border-white/10 pt-2">
              <div className="font-semibold">{r.question}</div>
              <div>
                Your answer:{" "}
                <span className={r.correct ? "text-green-400" : "text-red-400"}>{r.yourAnswer}</span>
                <span className="mx-2">/</span>
                Correct: <span className="text-green-400">{r.correctAnswer}</span>
              </div>
              <div className="mt-1 text-white/70">{r.explanation}</div>
            </div>
          ))}
        </div>
      )}
    </div>
  );
}
