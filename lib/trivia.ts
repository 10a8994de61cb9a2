import { randomUUID } from "crypto";
import { decode } from "he";
import { z } from "zod";
import { DEFAULT_TRIVIA_API_URL } from "./config";
import { FetchError, errorMessage } from "./errors";
import { logJsonLine } from "./logger";
import { shuffle, uniqueStrings } from "./shuffle";
import type { Difficulty, Question, QuestionFilter } from "./types";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const DIFFICULTIES = ["easy", "medium", "hard"] as const satisfies readonly Difficulty[];

const TriviaItem = z.object({
  category: z.string(),
  type: z.string(),
  difficulty: z.string(),
  question: z.string().min(1),
  correct_answer: z.string().min(1),
  incorrect_answers: z.array(z.string()),
});

const TriviaPayload = z.object({
  response_code: z.number().int(),
  results: z.array(TriviaItem),
});

export type TriviaItem = z.infer<typeof TriviaItem>;

// Open Trivia DB response codes other than 0 (success). 3 and 4 concern
// session tokens, which are never requested.
const RESPONSE_CODE_MESSAGES: Record<number, string> = {
  1: "The trivia service has no questions for this selection.",
  2: "The trivia service rejected the request parameters.",
  5: "Too many requests to the trivia service. Wait a few seconds and retry.",
};

export interface FetchQuestionsOptions extends QuestionFilter {
  amount?: number;
  baseUrl?: string;
  fetchImpl?: FetchLike;
  random?: () => number;
}

export function buildTriviaUrl(
  baseUrl: string,
  { amount = 1, category, difficulty }: QuestionFilter & { amount?: number }
): string {
  const url = new URL(baseUrl);
  url.searchParams.set("amount", String(amount));
  url.searchParams.set("type", "multiple");
  if (typeof category === "number") url.searchParams.set("category", String(category));
  if (difficulty) url.searchParams.set("difficulty", difficulty);
  return url.toString();
}

function toDifficulty(raw: string): Difficulty | undefined {
  return DIFFICULTIES.find((d) => d === raw);
}

export function toQuestion(item: TriviaItem, random: () => number = Math.random): Question {
  const correct = decode(item.correct_answer);
  const incorrect = item.incorrect_answers.map((a) => decode(a));
  // correct goes first so de-duplication can never drop it
  const options = shuffle(uniqueStrings([correct, ...incorrect]), random);
  const category = decode(item.category).trim();
  return {
    id: randomUUID(),
    prompt: decode(item.question),
    options,
    correct,
    category: category.length > 0 ? category : undefined,
    difficulty: toDifficulty(item.difficulty),
  };
}

export async function fetchQuestions(options: FetchQuestionsOptions = {}): Promise<Question[]> {
  const {
    baseUrl = DEFAULT_TRIVIA_API_URL,
    fetchImpl = fetch,
    random = Math.random,
    ...filter
  } = options;
  const url = buildTriviaUrl(baseUrl, filter);

  await logJsonLine("trivia_request", {
    amount: filter.amount ?? 1,
    category: filter.category ?? null,
    difficulty: filter.difficulty ?? null,
  });

  let response: Response;
  try {
    response = await fetchImpl(url, { cache: "no-store" });
  } catch (e) {
    throw new FetchError(`Could not reach the trivia service: ${errorMessage(e)}`, { cause: e });
  }

  await logJsonLine("trivia_response", { status: response.status, ok: response.ok });

  if (!response.ok) {
    throw new FetchError(`Trivia service request failed (HTTP ${response.status})`, {
      status: response.status,
    });
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (e) {
    throw new FetchError("Trivia service returned a response that is not JSON", {
      status: response.status,
      cause: e,
    });
  }

  const parsed = TriviaPayload.safeParse(body);
  if (!parsed.success) {
    throw new FetchError("Trivia service returned an unexpected payload", {
      status: response.status,
      cause: parsed.error,
    });
  }

  const { response_code, results } = parsed.data;
  if (response_code !== 0) {
    throw new FetchError(
      RESPONSE_CODE_MESSAGES[response_code] ?? `Trivia service error (code ${response_code})`,
      { status: response.status }
    );
  }
  if (results.length === 0) {
    throw new FetchError("Trivia service returned no questions", { status: response.status });
  }

  const questions = results.map((item) => toQuestion(item, random));
  if (questions.some((q) => q.options.length < 2)) {
    throw new FetchError("Trivia service returned a question with fewer than two distinct options", {
      status: response.status,
    });
  }
  return questions;
}

export async function fetchQuestion(
  options: Omit<FetchQuestionsOptions, "amount"> = {}
): Promise<Question> {
  const [question] = await fetchQuestions({ ...options, amount: 1 });
  return question;
}
