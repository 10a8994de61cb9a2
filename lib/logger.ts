import { promises as fs } from "fs";
import path from "path";

export type LogData = Record<string, string | number | boolean | null | undefined | string[]>;

function logFile() {
  const dir = path.resolve(process.cwd(), process.env.APP_LOG_DIR || "logs");
  return { dir, file: path.join(dir, "app.log") };
}

export async function logJsonLine(event: string, data: LogData) {
  const { dir, file } = logFile();
  try {
    await fs.mkdir(dir, { recursive: true });
    const line = JSON.stringify({ ts: new Date().toISOString(), event, data }) + "\n";
    await fs.appendFile(file, line, { encoding: "utf8" });
  } catch (e) {
    // logging must never break the quiz flow
    console.error(`[logger] could not write ${event} to ${file}:`, e);
  }
}
