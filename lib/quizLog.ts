import { promises as fs } from "fs";
import path from "path";
import { LogWriteError, errorMessage } from "./errors";
import { safeJsonParse } from "./json";
import { logJsonLine } from "./logger";
import { RoundRecordSchema } from "./schemas";
import type { RoundRecord } from "./types";

export const DEFAULT_QUIZ_LOG_FILE = "quiz_log.json";

function resolveLogFile(file: string) {
  return path.resolve(process.cwd(), file);
}

function isMissing(e: unknown) {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Reads the log as a raw array. A missing file, invalid JSON or a non-array
 * document all read as `[]`.
 */
async function readEntries(file: string): Promise<unknown[]> {
  let text: string;
  try {
    text = await fs.readFile(file, { encoding: "utf8" });
  } catch (e) {
    if (isMissing(e)) return [];
    await logJsonLine("quiz_log_recovered", { file, reason: "unreadable", message: errorMessage(e) });
    return [];
  }
  if (text.trim().length === 0) return [];

  const parsed = safeJsonParse(text);
  if (!Array.isArray(parsed)) {
    await logJsonLine("quiz_log_recovered", {
      file,
      reason: parsed === undefined ? "invalid_json" : "not_an_array",
    });
    return [];
  }
  return parsed;
}

/**
 * Full read-modify-write of the log. There is no locking: two writers racing
 * on the same file can drop each other's entries.
 *
 * @returns the number of records in the log after the append
 */
export async function appendRound(
  record: RoundRecord,
  file: string = DEFAULT_QUIZ_LOG_FILE
): Promise<number> {
  const target = resolveLogFile(file);
  const entries = await readEntries(target);
  const next = [...entries, record];
  try {
    await fs.writeFile(target, JSON.stringify(next, null, 2), { encoding: "utf8" });
  } catch (e) {
    await logJsonLine("quiz_log_write_failed", { file: target, message: errorMessage(e) });
    throw new LogWriteError(target, { cause: e });
  }
  return next.length;
}

/** Entries that do not look like round records are skipped. */
export async function readRounds(file: string = DEFAULT_QUIZ_LOG_FILE): Promise<RoundRecord[]> {
  const entries = await readEntries(resolveLogFile(file));
  const rounds: RoundRecord[] = [];
  for (const entry of entries) {
    const parsed = RoundRecordSchema.safeParse(entry);
    if (parsed.success) rounds.push(parsed.data);
  }
  return rounds;
}
