/**
 * In-memory run registry.
 *
 * Each run has exactly one writer: the RunHandle returned by create().
 * Readers get frozen snapshots, so polling never observes a record
 * half-way through an update.
 */

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { StageName } from "@/lib/agent/state";

export const RunStatus = z.enum(["pending", "running", "completed", "failed"]);
export type RunStatus = z.infer<typeof RunStatus>;

export interface RunRecord {
  runId: string;
  topic: string;
  paperLimit: number;
  status: RunStatus;
  /** Last stage that finished; null until the first one does. */
  stage: StageName | null;
  artifactPath?: string;
  errorMessage?: string;
  createdAt: string;
  updatedAt: string;
}

export type RunPatch = Partial<Pick<RunRecord, "status" | "stage" | "artifactPath" | "errorMessage">>;

export interface RunHandle {
  readonly runId: string;
  update(patch: RunPatch): Readonly<RunRecord>;
}

const FINISHED: ReadonlySet<RunStatus> = new Set(["completed", "failed"]);

export class RunRegistry {
  private readonly runs = new Map<string, Readonly<RunRecord>>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(params: { topic: string; paperLimit: number; runId?: string }): RunHandle {
    const runId = params.runId ?? uuidv4();
    if (this.runs.has(runId)) throw new Error(`Run ${runId} already exists`);

    const timestamp = this.now().toISOString();
    const record: RunRecord = {
      runId,
      topic: params.topic,
      paperLimit: params.paperLimit,
      status: "pending",
      stage: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.runs.set(runId, Object.freeze(record));

    return {
      runId,
      update: (patch) => {
        const current = this.runs.get(runId);
        if (!current) throw new Error(`Run ${runId} is no longer registered`);
        const next: RunRecord = { ...current, ...patch, updatedAt: this.now().toISOString() };
        this.runs.set(runId, Object.freeze(next));
        return next;
      },
    };
  }

  get(runId: string): Readonly<RunRecord> | undefined {
    return this.runs.get(runId);
  }

  list(): Readonly<RunRecord>[] {
    return [...this.runs.values()];
  }

  /** Drop finished runs last touched more than `maxAgeMs` ago. */
  prune(maxAgeMs: number): number {
    const cutoff = this.now().getTime() - maxAgeMs;
    let removed = 0;
    for (const [runId, record] of this.runs) {
      if (FINISHED.has(record.status) && Date.parse(record.updatedAt) < cutoff) {
        this.runs.delete(runId);
        removed++;
      }
    }
    if (removed > 0) console.log(`[runs] Pruned ${removed} finished runs.`);
    return removed;
  }

  /** Periodic prune; the timer never keeps the process alive. Returns a stop function. */
  startSweeper(maxAgeMs: number, intervalMs = 60_000): () => void {
    const timer = setInterval(() => this.prune(maxAgeMs), intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}
