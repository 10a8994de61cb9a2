import { QuizApp } from "@/components/QuizApp";
import { loadConfig, publicConfig, type AppConfig } from "@/lib/config";
import { ConfigError } from "@/lib/errors";
import { logJsonLine } from "@/lib/logger";

// read the environment per request, never at build time
export const dynamic = "force-dynamic";

export default async function Home() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    await logJsonLine("config_error", { issues: e.issues });
    return (
      <div className="card p-4 text-red-300 border-red-500/40 border">
        <div className="font-semibold">Configuration error. Set these in .env.local and restart:</div>
        <ul className="mt-2 text-sm list-disc pl-5">
          {e.issues.map((issue) => (
            <li key={issue}>{issue}</li>
          ))}
        </ul>
      </div>
    );
  }

  return (
    <div className="space-y-6">
      <header className="text-center">
        <h1 className="text-3xl font-bold">AI Quiz Master</h1>
        <p className="text-white/70 mt-1">Test your knowledge and get AI-powered explanations!</p>
      </header>
      <QuizApp config={publicConfig(config)} />
    </div>
  );
}
