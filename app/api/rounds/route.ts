import { NextRequest } from "next/server";
import { loadConfig, type AppConfig } from "@/lib/config";
import { ConfigError } from "@/lib/errors";
import { logJsonLine } from "@/lib/logger";
import { readRounds } from "@/lib/quizLog";
import { defaultRoundDeps, playRound } from "@/lib/rounds";
import { RoundRequestSchema } from "@/lib/schemas";
import type { Question } from "@/lib/types";

export const runtime = "nodejs"; // fs
export const dynamic = "force-dynamic";

function json(data: unknown, status = 200) {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export async function GET() {
  try {
    const config = loadConfig();
    return json({ items: await readRounds(config.quizLogFile) });
  } catch (e) {
    if (e instanceof ConfigError) return json({ error: e.message }, 500);
    throw e;
  }
}

export async function POST(req: NextRequest) {
  const raw: unknown = await req.json().catch(() => null);
  const body = RoundRequestSchema.safeParse(raw);
  if (!body.success) {
    return json({ error: "Invalid request", details: body.error.message }, 400);
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    await logJsonLine("config_error", { issues: e.issues });
    return json({ error: e.message }, 500);
  }

  const question: Question = body.data.question;
  const result = await playRound(question, body.data.answer, defaultRoundDeps(config));
  return json(result);
}
