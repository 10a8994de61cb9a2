import test from "node:test";
import assert from "node:assert/strict";
import os from "os";
import path from "path";

import { FetchError } from "../errors";
import { buildTriviaUrl, fetchQuestion, fetchQuestions, toQuestion, type FetchLike } from "../trivia";

process.env.APP_LOG_DIR = path.join(os.tmpdir(), "quiz-master-test-logs");

function stubFetch(body: string, status = 200) {
  const calls: string[] = [];
  const fetchImpl: FetchLike = async (input) => {
    calls.push(input);
    return new Response(body, { status, headers: { "content-type": "application/json" } });
  };
  return { calls, fetchImpl };
}

function payload(results: unknown[], responseCode = 0) {
  return JSON.stringify({ response_code: responseCode, results });
}

const capitalItem = {
  category: "Geography",
  type: "multiple",
  difficulty: "easy",
  question: "Capital of France?",
  correct_answer: "Paris",
  incorrect_answers: ["London", "Rome", "Berlin"],
};

test("buildTriviaUrl asks for multiple choice questions with filters", () => {
  assert.equal(
    buildTriviaUrl("https://opentdb.com/api.php", { amount: 5, category: 22, difficulty: "medium" }),
    "https://opentdb.com/api.php?amount=5&type=multiple&category=22&difficulty=medium"
  );
});

test("fetchQuestion requests a single question", async () => {
  const { calls, fetchImpl } = stubFetch(payload([capitalItem]));
  await fetchQuestion({ fetchImpl, difficulty: "hard" });
  assert.deepEqual(calls, ["https://opentdb.com/api.php?amount=1&type=multiple&difficulty=hard"]);
});

test("fetchQuestion decodes HTML entities in every text field", async () => {
  const { fetchImpl } = stubFetch(
    payload([
      {
        category: "Entertainment: Film &amp; TV",
        type: "multiple",
        difficulty: "medium",
        question: "Who said &quot;I&#039;ll be back&quot;?",
        correct_answer: "The Terminator",
        incorrect_answers: ["Rocky &amp; Apollo", "Ren&eacute;e", "Nobody"],
      },
    ])
  );
  const q = await fetchQuestion({ fetchImpl });
  assert.equal(q.prompt, `Who said "I'll be back"?`);
  assert.equal(q.category, "Entertainment: Film & TV");
  assert.equal(q.correct, "The Terminator");
  assert.equal(q.difficulty, "medium");
  assert.deepEqual([...q.options].sort(), ["Nobody", "Renée", "Rocky & Apollo", "The Terminator"]);
});

test("options always contain the correct answer exactly once", () => {
  const item = { ...capitalItem, incorrect_answers: ["Paris", "Rome", "Rome"] };
  for (const r of [0, 0.25, 0.5, 0.99]) {
    const q = toQuestion(item, () => r);
    assert.deepEqual([...q.options].sort(), ["Paris", "Rome"]);
    assert.equal(new Set(q.options).size, q.options.length);
    assert.ok(q.options.includes(q.correct));
  }
});

test("options are shuffled with the supplied random source", () => {
  const q = toQuestion(capitalItem, () => 0);
  assert.deepEqual(q.options, ["London", "Rome", "Berlin", "Paris"]);
});

test("unknown difficulty values are dropped", () => {
  const q = toQuestion({ ...capitalItem, difficulty: "extreme" });
  assert.equal(q.difficulty, undefined);
});

test("fetchQuestions returns one question per result", async () => {
  const { fetchImpl } = stubFetch(payload([capitalItem, { ...capitalItem, question: "Capital of Italy?" }]));
  const questions = await fetchQuestions({ fetchImpl, amount: 2 });
  assert.deepEqual(
    questions.map((q) => q.prompt),
    ["Capital of France?", "Capital of Italy?"]
  );
  assert.notEqual(questions[0].id, questions[1].id);
});

test("HTTP 500 raises FetchError carrying the status", async () => {
  const { fetchImpl } = stubFetch("oops", 500);
  await assert.rejects(
    fetchQuestion({ fetchImpl }),
    (e: unknown) =>
      e instanceof FetchError &&
      e.status === 500 &&
      e.message === "Trivia service request failed (HTTP 500)"
  );
});

test("network failure raises FetchError", async () => {
  const fetchImpl: FetchLike = async () => {
    throw new TypeError("fetch failed");
  };
  await assert.rejects(
    fetchQuestion({ fetchImpl }),
    (e: unknown) =>
      e instanceof FetchError && e.message === "Could not reach the trivia service: fetch failed"
  );
});

test("non-JSON body raises FetchError", async () => {
  const { fetchImpl } = stubFetch("<html>maintenance</html>");
  await assert.rejects(fetchQuestion({ fetchImpl }), FetchError);
});

test("malformed payload raises FetchError", async () => {
  const { fetchImpl } = stubFetch(JSON.stringify({ results: [{ question: "no answers" }] }));
  await assert.rejects(
    fetchQuestion({ fetchImpl }),
    (e: unknown) => e instanceof FetchError && e.message === "Trivia service returned an unexpected payload"
  );
});

test("non-zero response codes raise FetchError", async () => {
  const { fetchImpl } = stubFetch(payload([], 5));
  await assert.rejects(
    fetchQuestion({ fetchImpl }),
    (e: unknown) =>
      e instanceof FetchError &&
      e.message === "Too many requests to the trivia service. Wait a few seconds and retry."
  );
});

test("an empty result list raises FetchError", async () => {
  const { fetchImpl } = stubFetch(payload([]));
  await assert.rejects(
    fetchQuestion({ fetchImpl }),
    (e: unknown) => e instanceof FetchError && e.message === "Trivia service returned no questions"
  );
});

test("unknown response codes fall back to a generic message", async () => {
  const { fetchImpl } = stubFetch(payload([], 3));
  await assert.rejects(
    fetchQuestion({ fetchImpl }),
    (e: unknown) => e instanceof FetchError && e.message === "Trivia service error (code 3)"
  );
});

test("a question whose answers decode to the same text raises FetchError", async () => {
  const { fetchImpl } = stubFetch(
    payload([
      {
        ...capitalItem,
        correct_answer: "Rock &amp; Roll",
        incorrect_answers: ["Rock & Roll", "Rock &#38; Roll", "Rock &#x26; Roll"],
      },
    ])
  );
  await assert.rejects(
    fetchQuestion({ fetchImpl }),
    (e: unknown) =>
      e instanceof FetchError &&
      e.message === "Trivia service returned a question with fewer than two distinct options" &&
      e.status === 200
  );
});
