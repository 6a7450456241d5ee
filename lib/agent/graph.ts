/**
 * graph.ts: Literature Review Agent
 *
 * Defines the fixed, strictly sequential StateGraph:
 *
 *   [START] ──► discover ──► acquire ──► analyze ──► synthesize ──► assemble ──► [END]
 *
 * Every stage runs even after an upstream failure; each one decides
 * from the state it receives whether to work or skip.  The
 * channels below are the composition rules:
 *   - topic keeps its first value (set once at start),
 *   - lastError / errorKind keep the first error recorded,
 *   - trail is append-only,
 *   - everything else takes the latest write.
 */

import { StateGraph, START, END } from "@langchain/langgraph";
import { v4 as uuidv4 } from "uuid";
import type { PipelineDeps } from "./collaborators";
import { firstError } from "./errors";
import { createAcquisitionNode } from "./nodes/acquisition";
import { createAnalysisNode } from "./nodes/analysis";
import { createDiscoveryNode } from "./nodes/discovery";
import { createReportNode } from "./nodes/report";
import { createSynthesisNode } from "./nodes/synthesis";
import {
  ResearchState,
  StageEntry,
  StageName,
  TerminalErrorKind,
  createInitialState,
} from "./state";

const latest = <T>() => ({ value: (_current: T, next: T) => next });

/**
 * Builds and compiles the literature review StateGraph around the
 * given collaborators.
 */
export function buildLiteratureReviewGraph(deps: PipelineDeps) {
  const graph = new StateGraph<ResearchState>({
    channels: {
      runId:           latest<string>(),
      topic:           { value: (current: string, _next: string) => current },
      paperLimit:      latest<number>(),
      discoveredItems: latest<ResearchState["discoveredItems"]>(),
      extractedItems:  latest<ResearchState["extractedItems"]>(),
      analyses:        latest<ResearchState["analyses"]>(),
      topicOverview:   latest<string>(),
      comparison:      latest<string>(),
      reportPath:      latest<string | null>(),
      // first terminal error wins
      lastError: {
        value: (current: string | null, next: string | null) => firstError(current, next),
        default: () => null,
      },
      errorKind: {
        value: (current: TerminalErrorKind | null, next: TerminalErrorKind | null) =>
          firstError(current, next),
        default: () => null,
      },
      // trail is append-only; merged by concatenation
      trail: {
        value: (existing: StageEntry[], incoming: StageEntry[]) =>
          [...(existing ?? []), ...(incoming ?? [])],
        default: () => [],
      },
      updatedAt: latest<string>(),
    },
  })
    // ── Nodes ──────────────────────────────────────────────
    .addNode("discover",   createDiscoveryNode(deps))
    .addNode("acquire",    createAcquisitionNode(deps))
    .addNode("analyze",    createAnalysisNode(deps))
    .addNode("synthesize", createSynthesisNode(deps))
    .addNode("assemble",   createReportNode(deps))

    // ── Edges ──────────────────────────────────────────────
    .addEdge(START,        "discover")
    .addEdge("discover",   "acquire")
    .addEdge("acquire",    "analyze")
    .addEdge("analyze",    "synthesize")
    .addEdge("synthesize", "assemble")
    .addEdge("assemble",   END);

  return graph.compile();
}

export type LiteratureReviewGraph = ReturnType<typeof buildLiteratureReviewGraph>;

export interface ResearchRequest {
  topic: string;
  paperLimit?: number;
  /** Defaults to a fresh uuid. */
  runId?: string;
}

export interface StageEvent {
  /** Stage that produced this snapshot; null for the initial state. */
  stage: StageName | null;
  state: ResearchState;
}

/**
 * Run the pipeline and stream a full state snapshot after each stage.
 *
 * @example
 * ```ts
 * for await (const { stage, state } of runResearch(graph, { topic: "graph neural networks" })) {
 *   console.log(stage, state.lastError);
 * }
 * ```
 */
export async function* runResearch(
  graph: LiteratureReviewGraph,
  request: ResearchRequest
): AsyncGenerator<StageEvent> {
  const initialState = createInitialState({
    runId: request.runId ?? uuidv4(),
    topic: request.topic,
    paperLimit: request.paperLimit,
  });

  for await (const snapshot of await graph.stream(initialState, { streamMode: "values" })) {
    const state = ResearchState.parse(snapshot);
    const stage = state.trail.at(-1)?.stage ?? null;
    yield { stage, state };
  }
}

/** Drive the pipeline to the end and return the final state. */
export async function runToCompletion(
  graph: LiteratureReviewGraph,
  request: ResearchRequest,
  onStage?: (event: StageEvent) => void
): Promise<ResearchState> {
  let last: ResearchState | null = null;
  for await (const event of runResearch(graph, request)) {
    onStage?.(event);
    last = event.state;
  }
  if (!last) throw new Error("Pipeline produced no state");
  return last;
}
