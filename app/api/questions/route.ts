import { NextRequest } from "next/server";
import { ConfigError, FetchError } from "@/lib/errors";
import { loadConfig } from "@/lib/config";
import { logJsonLine } from "@/lib/logger";
import { QuestionQuerySchema } from "@/lib/schemas";
import { fetchQuestion } from "@/lib/trivia";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

function json(data: unknown, status = 200) {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export async function GET(req: NextRequest) {
  const { searchParams } = new URL(req.url);
  const query = QuestionQuerySchema.safeParse({
    category: searchParams.get("category") || undefined,
    difficulty: searchParams.get("difficulty") || undefined,
  });
  if (!query.success) {
    return json({ error: "Invalid request", details: query.error.message }, 400);
  }

  try {
    const config = loadConfig();
    const question = await fetchQuestion({ ...query.data, baseUrl: config.triviaApiUrl });
    return json(question);
  } catch (e) {
    if (e instanceof ConfigError) {
      await logJsonLine("config_error", { issues: e.issues });
      return json({ error: e.message }, 500);
    }
    if (e instanceof FetchError) return json({ error: e.message }, 502);
    throw e;
  }
}
