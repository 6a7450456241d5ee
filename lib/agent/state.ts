/**
 * state.ts: Literature Review Agent
 *
 * Single source of truth for every field that flows through the
 * StateGraph.  Zod gives us runtime validation; the inferred TS
 * types keep every stage strictly typed.
 */

import { z } from "zod";

export const DEFAULT_PAPER_LIMIT = 3;

// ─────────────────────────────────────────────────────────────
// Enumerations
// ─────────────────────────────────────────────────────────────

/** Every stage node in the graph, in execution order. */
export const StageName = z.enum([
  "discover",
  "acquire",
  "analyze",
  "synthesize",
  "assemble",
]);
export type StageName = z.infer<typeof StageName>;

/** Stage-level failures recorded in the error slot. */
export const TerminalErrorKind = z.enum([
  "TopicMissing",
  "DiscoveryExhausted",
  "AcquisitionAllFailed",
  "AnalysisAllFailed",
  "SynthesisBlocked",
  "RenderFailed",
]);
export type TerminalErrorKind = z.infer<typeof TerminalErrorKind>;

// ─────────────────────────────────────────────────────────────
// Sub-schemas
// ─────────────────────────────────────────────────────────────

/** A discovered candidate that carries a resolvable document link. */
export const PaperRef = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  documentUrl: z.string().url(),
});
export type PaperRef = z.infer<typeof PaperRef>;

/** A discovered paper whose document yielded non-empty text. */
export const ExtractedPaper = PaperRef.extend({
  text: z.string().min(1),
});
export type ExtractedPaper = z.infer<typeof ExtractedPaper>;

export const PaperAnalysis = z.object({
  title: z.string(),
  documentUrl: z.string(),
  summary: z.string(),
  methodology: z.string(),
  keyFindings: z.string(),
});
export type PaperAnalysis = z.infer<typeof PaperAnalysis>;

/**
 * One entry in the stage trail.  Every stage appends here
 * so callers can replay what happened during the run.
 */
export const StageEntry = z.object({
  stage: StageName,
  timestamp: z.string().datetime(),
  summary: z.string(),
});
export type StageEntry = z.infer<typeof StageEntry>;

// ─────────────────────────────────────────────────────────────
// Root State Schema
// ─────────────────────────────────────────────────────────────

/**
 * ResearchState: the single value threaded through all stages.
 *
 * Collections only ever narrow from one stage to the next:
 * extractedItems ⊆ discoveredItems, analyses ⊆ extractedItems.
 */
export const ResearchState = z.object({
  // ── Identity & Input ─────────────────────────────────────
  runId: z.string().uuid(),
  /** Set once at pipeline start; the graph channel keeps the first value. */
  topic: z.string(),
  /** Target count of documents to acquire. */
  paperLimit: z.number().int().positive().default(DEFAULT_PAPER_LIMIT),

  // ── Stage outputs ────────────────────────────────────────
  discoveredItems: z.array(PaperRef).default([]),
  extractedItems: z.array(ExtractedPaper).default([]),
  analyses: z.array(PaperAnalysis).default([]),
  topicOverview: z.string().default(""),
  comparison: z.string().default(""),
  reportPath: z.string().nullable().default(null),

  // ── Error carry-forward ──────────────────────────────────
  /** First terminal error recorded by any stage; never silently dropped. */
  lastError: z.string().nullable().default(null),
  errorKind: TerminalErrorKind.nullable().default(null),

  // ── Observability ────────────────────────────────────────
  trail: z.array(StageEntry).default([]),
  updatedAt: z.string().datetime(),
});

export type ResearchState = z.infer<typeof ResearchState>;

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

/**
 * Stamp a trail entry.  Stages return it as `trail: [entry]`; the
 * graph channel concatenates, so the trail stays append-only.
 */
export function stageEntry(stage: StageName, summary: string): StageEntry {
  return { stage, summary, timestamp: new Date().toISOString() };
}

/** Returns a fresh, validated initial state for a new run. */
export function createInitialState(params: {
  runId: string;
  topic: string;
  paperLimit?: number;
}): ResearchState {
  return ResearchState.parse({
    ...params,
    updatedAt: new Date().toISOString(),
  });
}
