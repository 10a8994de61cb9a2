import type { AppConfig } from "./config";
import { GenerationError, LogWriteError } from "./errors";
import { isCorrectAnswer } from "./evaluator";
import { generateExplanation, type ExplanationInput } from "./explanation";
import { logJsonLine } from "./logger";
import { appendRound } from "./quizLog";
import { FALLBACK_EXPLANATION, buildRoundRecord } from "./records";
import type { Question, RoundRecord, RoundResponse } from "./types";

export interface RoundDeps {
  explain: (input: ExplanationInput) => Promise<string>;
  append: (record: RoundRecord) => Promise<number>;
  now: () => Date;
}

export function defaultRoundDeps(config: AppConfig): RoundDeps {
  return {
    explain: (input) => generateExplanation(input, config),
    append: (record) => appendRound(record, config.quizLogFile),
    now: () => new Date(),
  };
}

/**
 * Explains and logs one answered question. Explanation and log failures are
 * reported on the response instead of failing the round.
 */
export async function playRound(
  question: Question,
  answer: string,
  deps: RoundDeps
): Promise<RoundResponse> {
  const correct = isCorrectAnswer(question, answer);
  const out: Omit<RoundResponse, "record"> = {};

  let explanation = FALLBACK_EXPLANATION;
  try {
    explanation = await deps.explain({ question, userAnswer: answer, correct });
  } catch (e) {
    if (!(e instanceof GenerationError)) throw e;
    out.explanationError = e.message;
  }

  const record = buildRoundRecord(question, answer, explanation, deps.now());

  try {
    await deps.append(record);
  } catch (e) {
    if (!(e instanceof LogWriteError)) throw e;
    out.logError = e.message;
  }

  await logJsonLine("round_completed", {
    correct,
    explained: out.explanationError === undefined,
    logged: out.logError === undefined,
  });

  return { record, ...out };
}
