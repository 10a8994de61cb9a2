import { scoreSummary } from "@/lib/evaluator";
import type { ScoreCounters } from "@/lib/types";

function Metric({ label, value }: { label: string; value: number | string }) {
  return (
    <div className="card p-3 text-center">
      <div className="text-xs text-white/60">{label}</div>
      <div className="text-2xl font-semibold">{value}</div>
    </div>
  );
}

export function ScoreBoard({ total, counters }: { total: number; counters: ScoreCounters }) {
  const s = scoreSummary(counters);
  return (
    <div className="grid grid-cols-3 gap-3">
      <Metric label="Questions" value={total} />
      <Metric label="Correct" value={s.correct} />
      <Metric label="Wrong" value={s.incorrect} />
    </div>
  );
}
