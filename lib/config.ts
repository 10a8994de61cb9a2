import { z } from "zod";
import { ConfigError } from "./errors";

export const DEFAULT_TRIVIA_API_URL = "https://opentdb.com/api.php";
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

const EnvSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: "OPENAI_API_KEY is required" })
    .trim()
    .min(1, "OPENAI_API_KEY is required"),
  OPENAI_MODEL: z.string().trim().min(1).default(DEFAULT_OPENAI_MODEL),
  TRIVIA_API_URL: z.string().url().default(DEFAULT_TRIVIA_API_URL),
  QUIZ_QUESTION_COUNT: z.coerce.number().int().min(1).max(50).default(5),
  QUIZ_ADVANCE_DELAY_MS: z.coerce.number().int().min(0).max(600_000).default(20_000),
  QUIZ_LOG_FILE: z.string().trim().min(1).default("quiz_log.json"),
});

export interface AppConfig {
  openaiApiKey: string;
  openaiModel: string;
  triviaApiUrl: string;
  questionCount: number;
  advanceDelayMs: number;
  quizLogFile: string;
}

/** Settings the browser is allowed to see. */
export interface PublicConfig {
  questionCount: number;
  advanceDelayMs: number;
}

type Env = Record<string, string | undefined>;

// Empty strings in .env files mean "unset".
function blankToUndefined(env: Env): Env {
  const out: Env = {};
  for (const [k, v] of Object.entries(env)) {
    out[k] = typeof v === "string" && v.trim().length === 0 ? undefined : v;
  }
  return out;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => {
        const key = i.path.join(".");
        return i.message.startsWith(key) ? i.message : `${key}: ${i.message}`;
      })
    );
  }
  const e = parsed.data;
  return {
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    triviaApiUrl: e.TRIVIA_API_URL,
    questionCount: e.QUIZ_QUESTION_COUNT,
    advanceDelayMs: e.QUIZ_ADVANCE_DELAY_MS,
    quizLogFile: e.QUIZ_LOG_FILE,
  };
}

export function publicConfig(config: AppConfig): PublicConfig {
  return {
    questionCount: config.questionCount,
    advanceDelayMs: config.advanceDelayMs,
  };
}
