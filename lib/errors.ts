export type QuizErrorCode =
  | "fetch_failed"
  | "generation_failed"
  | "log_write_failed"
  | "config_invalid";

export class QuizError extends Error {
  readonly code: QuizErrorCode;

  constructor(code: QuizErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Trivia API unreachable, non-2xx, or returned a payload we cannot decode. */
export class FetchError extends QuizError {
  readonly status: number | null;

  constructor(message: string, options?: { status?: number | null; cause?: unknown }) {
    super("fetch_failed", message, options);
    this.status = options?.status ?? null;
  }
}

export type GenerationErrorKind =
  | "network"
  | "unauthorized"
  | "rate_limited"
  | "upstream"
  | "empty";

export class GenerationError extends QuizError {
  readonly kind: GenerationErrorKind;
  readonly status: number | null;
  readonly requestId: string | null;

  constructor(
    kind: GenerationErrorKind,
    message: string,
    options?: { status?: number | null; requestId?: string | null; cause?: unknown }
  ) {
    super("generation_failed", message, options);
    this.kind = kind;
    this.status = options?.status ?? null;
    this.requestId = options?.requestId ?? null;
  }
}

export class LogWriteError extends QuizError {
  readonly file: string;

  constructor(file: string, options?: { cause?: unknown }) {
    super("log_write_failed", `Could not write quiz log ${file}`, options);
    this.file = file;
  }
}

export class ConfigError extends QuizError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config_invalid", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
