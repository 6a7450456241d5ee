/**
 * One-shot literature review from the command line:
 *
 *   tsx app/cli.ts "graph neural networks for drug discovery" 5
 */

import "dotenv/config";
import {
  buildLiteratureReviewGraph,
  createDefaultDeps,
  describeError,
  loadConfig,
  runResearch,
  type ResearchState,
} from "@/lib/agent";

async function main(argv: string[]): Promise<number> {
  const [topic, limitArg] = argv;
  if (!topic?.trim()) {
    console.error('Usage: tsx app/cli.ts "<topic>" [paperLimit]');
    return 1;
  }

  const paperLimit = limitArg === undefined ? undefined : Number.parseInt(limitArg, 10);
  if (paperLimit !== undefined && !(Number.isInteger(paperLimit) && paperLimit > 0)) {
    console.error(`paperLimit must be a positive integer, got "${limitArg}"`);
    return 1;
  }

  const config = loadConfig();
  const graph = buildLiteratureReviewGraph(createDefaultDeps(config));

  let final: ResearchState | null = null;
  let reportedError: string | null = null;
  for await (const { stage, state } of runResearch(graph, {
    topic,
    paperLimit: paperLimit ?? config.DEFAULT_PAPER_LIMIT,
  })) {
    if (stage) console.log(`✓ ${stage}: ${state.trail.at(-1)?.summary ?? ""}`);
    if (state.lastError && state.lastError !== reportedError) {
      reportedError = state.lastError;
      console.warn(`  ! ${state.errorKind}: ${state.lastError}`);
    }
    final = state;
  }

  console.log("\n--- Workflow finished ---");
  console.log(`Topic:       ${final?.topic ?? topic}`);
  console.log(`Report:      ${final?.reportPath ?? "not generated"}`);
  console.log(`Last error:  ${final?.lastError ?? "none"}`);
  return final?.reportPath ? 0 : 1;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Critical error: ${describeError(err)}`);
    process.exitCode = 1;
  });
