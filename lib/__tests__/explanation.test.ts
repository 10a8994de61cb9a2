import test from "node:test";
import assert from "node:assert/strict";
import os from "os";
import path from "path";

import { GenerationError } from "../errors";
import {
  OPENAI_RESPONSES_URL,
  buildExplanationPrompt,
  extractOutputText,
  generateExplanation,
} from "../explanation";
import type { FetchLike } from "../trivia";

process.env.APP_LOG_DIR = path.join(os.tmpdir(), "quiz-master-test-logs");

const config = { openaiApiKey: "test-key", openaiModel: "gpt-4o-mini" };
const question = { prompt: "Capital of France?", correct: "Paris" };

function respond(body: string, status = 200, headers: Record<string, string> = {}) {
  const calls: { url: string; init?: RequestInit }[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return new Response(body, { status, headers });
  };
  return { calls, fetchImpl };
}

test("the prompt asks why the correct answer is right", () => {
  assert.equal(
    buildExplanationPrompt({ question, userAnswer: "Paris", correct: true }),
    "Explain in simple terms why 'Paris' is the correct answer for: 'Capital of France?'.\n" +
      "Keep it to a short paragraph of plain text without markdown."
  );
});

test("the prompt mentions the player's answer when it was wrong", () => {
  const prompt = buildExplanationPrompt({ question, userAnswer: "Rome", correct: false });
  assert.equal(
    prompt.split("\n")[1],
    "The player answered 'Rome'. Briefly say why that answer is not right."
  );
});

test("generateExplanation posts the prompt and returns the output text", async () => {
  const { calls, fetchImpl } = respond(
    JSON.stringify({
      output: [
        { type: "reasoning", summary: [] },
        {
          type: "message",
          content: [{ type: "output_text", text: " Paris is the capital of France. " }],
        },
      ],
    })
  );

  const text = await generateExplanation({ question, userAnswer: "Paris", correct: true }, config, fetchImpl);
  assert.equal(text, "Paris is the capital of France.");

  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, OPENAI_RESPONSES_URL);
  assert.equal(calls[0].init?.method, "POST");
  assert.equal(new Headers(calls[0].init?.headers).get("authorization"), "Bearer test-key");
  const sent = calls[0].init?.body;
  assert.equal(typeof sent, "string");
  assert.deepEqual(JSON.parse(String(sent)), {
    model: "gpt-4o-mini",
    input: buildExplanationPrompt({ question, userAnswer: "Paris", correct: true }),
    max_output_tokens: 400,
  });
});

test("extractOutputText falls back to a top-level output_text", () => {
  assert.equal(extractOutputText({ output_text: "Because." }), "Because.");
  assert.equal(extractOutputText("not an object"), "");
});

test("401 becomes an unauthorized GenerationError with the API message", async () => {
  const { fetchImpl } = respond(
    JSON.stringify({ error: { message: "Incorrect API key provided" } }),
    401
  );
  await assert.rejects(
    generateExplanation({ question, userAnswer: "Paris", correct: true }, config, fetchImpl),
    (e: unknown) =>
      e instanceof GenerationError &&
      e.kind === "unauthorized" &&
      e.status === 401 &&
      e.message === "Incorrect API key provided"
  );
});

test("429 becomes a rate_limited GenerationError", async () => {
  const { fetchImpl } = respond("slow down", 429);
  await assert.rejects(
    generateExplanation({ question, userAnswer: "Paris", correct: true }, config, fetchImpl),
    (e: unknown) =>
      e instanceof GenerationError &&
      e.kind === "rate_limited" &&
      e.message === "OpenAI API request failed (HTTP 429)"
  );
});

test("other upstream failures keep the request id", async () => {
  const { fetchImpl } = respond("{}", 500, { "x-request-id": "req_test" });
  await assert.rejects(
    generateExplanation({ question, userAnswer: "Paris", correct: true }, config, fetchImpl),
    (e: unknown) => e instanceof GenerationError && e.kind === "upstream" && e.requestId === "req_test"
  );
});

test("network failures become GenerationError", async () => {
  const fetchImpl: FetchLike = async () => {
    throw new TypeError("fetch failed");
  };
  await assert.rejects(
    generateExplanation({ question, userAnswer: "Paris", correct: true }, config, fetchImpl),
    (e: unknown) => e instanceof GenerationError && e.kind === "network"
  );
});

test("a response without text is an empty GenerationError", async () => {
  const { fetchImpl } = respond(JSON.stringify({ output: [] }));
  await assert.rejects(
    generateExplanation({ question, userAnswer: "Paris", correct: true }, config, fetchImpl),
    (e: unknown) => e instanceof GenerationError && e.kind === "empty"
  );
});
