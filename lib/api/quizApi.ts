import { z } from "zod";
import { QuestionSchema, RoundResponseSchema } from "@/lib/schemas";
import type { Question, QuestionFilter, RoundResponse } from "@/lib/types";

const ErrorPayload = z.object({ error: z.string() });

function buildQuery(filter: QuestionFilter) {
  const params = new URLSearchParams();
  if (typeof filter.category === "number") params.set("category", String(filter.category));
  if (filter.difficulty) params.set("difficulty", filter.difficulty);
  const qs = params.toString();
  return qs ? `?${qs}` : "";
}

async function readJson(response: Response): Promise<unknown> {
  const data: unknown = await response.json().catch(() => null);
  if (!response.ok) {
    const parsed = ErrorPayload.safeParse(data);
    throw new Error(parsed.success ? parsed.data.error : `Request failed (HTTP ${response.status})`);
  }
  return data;
}

export async function fetchNextQuestion(filter: QuestionFilter = {}): Promise<Question> {
  const response = await fetch(`/api/questions${buildQuery(filter)}`, { cache: "no-store" });
  const parsed = QuestionSchema.safeParse(await readJson(response));
  if (!parsed.success) {
    throw new Error("The question could not be loaded. Please try again.");
  }
  return parsed.data;
}

export async function submitRound(question: Question, answer: string): Promise<RoundResponse> {
  const response = await fetch("/api/rounds", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ question, answer }),
  });
  const parsed = RoundResponseSchema.safeParse(await readJson(response));
  if (!parsed.success) {
    throw new Error("The server returned an unexpected round result.");
  }
  return parsed.data;
}
