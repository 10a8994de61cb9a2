import { z } from "zod";
import type { AppConfig } from "./config";
import { GenerationError, errorMessage } from "./errors";
import { safeJsonParse } from "./json";
import { logJsonLine } from "./logger";
import type { FetchLike } from "./trivia";
import type { Question } from "./types";

export const OPENAI_RESPONSES_URL = "https://api.openai.com/v1/responses";
const budget = 400;

export interface ExplanationInput {
  question: Pick<Question, "prompt" | "correct">;
  userAnswer: string;
  correct: boolean;
}

const OutputContent = z.object({
  type: z.string(),
  text: z.string().optional(),
});

const ResponsesBody = z.object({
  output: z
    .array(
      z.object({
        type: z.string(),
        content: z.array(OutputContent).optional(),
      })
    )
    .default([]),
  output_text: z.string().optional(),
});

const ErrorBody = z.object({
  error: z.object({ message: z.string() }),
});

export function buildExplanationPrompt({ question, userAnswer, correct }: ExplanationInput) {
  const lines = [
    `Explain in simple terms why '${question.correct}' is the correct answer for: '${question.prompt}'.`,
  ];
  if (!correct) {
    lines.push(`The player answered '${userAnswer}'. Briefly say why that answer is not right.`);
  }
  lines.push("Keep it to a short paragraph of plain text without markdown.");
  return lines.join("\n");
}

export function extractOutputText(body: unknown): string {
  const parsed = ResponsesBody.safeParse(body);
  if (!parsed.success) return "";
  const parts: string[] = [];
  for (const entry of parsed.data.output) {
    for (const c of entry.content ?? []) {
      if (c.type === "output_text" && typeof c.text === "string") parts.push(c.text);
    }
  }
  if (parts.length > 0) return parts.join("").trim();
  return (parsed.data.output_text ?? "").trim();
}

function failureKind(status: number) {
  if (status === 401 || status === 403) return "unauthorized" as const;
  if (status === 429) return "rate_limited" as const;
  return "upstream" as const;
}

function upstreamMessage(text: string, status: number) {
  const parsed = ErrorBody.safeParse(safeJsonParse(text));
  if (parsed.success) return parsed.data.error.message;
  return `OpenAI API request failed (HTTP ${status})`;
}

export async function generateExplanation(
  input: ExplanationInput,
  config: Pick<AppConfig, "openaiApiKey" | "openaiModel">,
  fetchImpl: FetchLike = fetch
): Promise<string> {
  const payload = {
    model: config.openaiModel,
    input: buildExplanationPrompt(input),
    max_output_tokens: budget,
  };

  await logJsonLine("gpt_request", {
    purpose: "explain-answer",
    model: config.openaiModel,
    correct: input.correct,
  });

  const start = Date.now();
  let r: Response;
  try {
    r = await fetchImpl(OPENAI_RESPONSES_URL, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${config.openaiApiKey}`,
      },
      body: JSON.stringify(payload),
    });
  } catch (e) {
    await logJsonLine("gpt_response", {
      purpose: "explain-answer",
      stage: "exception",
      message: errorMessage(e),
      durationMs: Date.now() - start,
    });
    throw new GenerationError("network", "Failed to reach OpenAI API", { cause: e });
  }

  const requestId = r.headers.get("x-request-id");
  const text = await r.text();
  await logJsonLine("gpt_response", {
    purpose: "explain-answer",
    status: r.status,
    requestId,
    durationMs: Date.now() - start,
  });

  if (!r.ok) {
    throw new GenerationError(failureKind(r.status), upstreamMessage(text, r.status), {
      status: r.status,
      requestId,
    });
  }

  const explanation = extractOutputText(safeJsonParse(text));
  if (!explanation) {
    throw new GenerationError("empty", "OpenAI API returned no explanation text", {
      status: r.status,
      requestId,
    });
  }
  return explanation;
}
