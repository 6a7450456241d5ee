/**
 * Background execution of pipeline runs, reported through the registry.
 */

import { access } from "node:fs/promises";
import { describeError } from "@/lib/agent/errors";
import { runToCompletion, type LiteratureReviewGraph } from "@/lib/agent/graph";
import type { ResearchState } from "@/lib/agent/state";
import type { RunHandle, RunPatch, RunRecord, RunRegistry } from "./registry";

export const MISSING_REPORT_MESSAGE = "Workflow finished but report path missing.";

export interface StartRequest {
  topic: string;
  paperLimit?: number;
}

export interface StartedRun {
  runId: string;
  /** Settles with the final record; never rejects. */
  done: Promise<Readonly<RunRecord>>;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Map the final pipeline state onto the run's terminal record. */
export async function outcomeOf(state: ResearchState): Promise<RunPatch> {
  if (state.reportPath && (await fileExists(state.reportPath))) {
    return {
      status: "completed",
      artifactPath: state.reportPath,
      errorMessage: state.lastError ?? undefined,
    };
  }
  return { status: "failed", errorMessage: state.lastError ?? MISSING_REPORT_MESSAGE };
}

/**
 * Starts pipelines without waiting for them.  Runs cannot be cancelled
 * once started.
 */
export class RunRunner {
  constructor(
    private readonly registry: RunRegistry,
    private readonly graph: LiteratureReviewGraph,
    private readonly defaultPaperLimit: number
  ) {}

  start(request: StartRequest): StartedRun {
    const paperLimit = request.paperLimit ?? this.defaultPaperLimit;
    const handle = this.registry.create({ topic: request.topic, paperLimit });
    console.log(`[runs] ${handle.runId} queued: "${request.topic}" (limit ${paperLimit})`);
    return { runId: handle.runId, done: this.execute(handle, request.topic, paperLimit) };
  }

  private async execute(
    handle: RunHandle,
    topic: string,
    paperLimit: number
  ): Promise<Readonly<RunRecord>> {
    try {
      // stays pending until the caller has the run id
      await Promise.resolve();
      handle.update({ status: "running" });
      const finalState = await runToCompletion(
        this.graph,
        { runId: handle.runId, topic, paperLimit },
        ({ stage }) => {
          if (stage) handle.update({ stage });
        }
      );
      const record = handle.update(await outcomeOf(finalState));
      console.log(
        `[runs] ${handle.runId} ${record.status}` +
          (record.errorMessage ? `: ${record.errorMessage}` : "")
      );
      return record;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[runs] ${handle.runId} crashed: ${describeError(err)}`);
      return handle.update({
        status: "failed",
        errorMessage: `Critical error during workflow execution: ${message}`,
      });
    }
  }
}
