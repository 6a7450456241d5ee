import "dotenv/config";
import { serve } from "@hono/node-server";
import { buildLiteratureReviewGraph, createDefaultDeps, describeError, loadConfig } from "@/lib/agent";
import { RunRegistry } from "@/lib/runs/registry";
import { RunRunner } from "@/lib/runs/runner";
import { createApp } from "./server";

function main() {
  const config = loadConfig();
  if (!config.GEMINI_API_KEY) {
    console.warn("[server] GEMINI_API_KEY is not set; analysis and synthesis will fail.");
  }

  const registry = new RunRegistry();
  const graph = buildLiteratureReviewGraph(createDefaultDeps(config));
  const runner = new RunRunner(registry, graph, config.DEFAULT_PAPER_LIMIT);
  registry.startSweeper(config.RUN_TTL_MINUTES * 60_000);

  const app = createApp({ registry, runner });
  serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    console.log(`[server] Listening on http://localhost:${info.port}`);
  });
}

try {
  main();
} catch (err) {
  console.error(`[server] Startup failed: ${describeError(err)}`);
  process.exit(1);
}
