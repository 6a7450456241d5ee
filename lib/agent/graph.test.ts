import { describe, expect, it } from "vitest";
import { buildLiteratureReviewGraph, runResearch, runToCompletion } from "./graph";
import {
  FakeFetcher,
  FakePrimarySearch,
  FakeSecondarySearch,
  RUN_ID,
  RecordingRenderer,
  ScriptedModel,
  makeDeps,
  text,
} from "./testing";

const PAPERS = [
  { id: "s1", title: "Sparse Transformers", openAccessUrl: "https://oa.test/1.pdf" },
  { id: "s2", title: "Longformer Revisited", openAccessUrl: "https://oa.test/2.pdf" },
];

describe("literature review graph", () => {
  it("runs every stage in order and produces a report", async () => {
    const model = new ScriptedModel([
      text("Summary: S1. Methodology: M1. Key Findings: K1."),
      text("Summary: S2. Methodology: M2. Key Findings: K2."),
      text("Topic Overview: Shared. Detailed Comparative Analysis: Differs."),
    ]);
    const renderer = new RecordingRenderer(async () => "/reports/sparse.html");
    const graph = buildLiteratureReviewGraph(
      makeDeps({
        primarySearch: new FakePrimarySearch(PAPERS),
        fetcher: new FakeFetcher({ "https://oa.test/1.pdf": "one", "https://oa.test/2.pdf": "two" }),
        model,
        renderer,
      })
    );

    const stages: string[] = [];
    for await (const { stage } of runResearch(graph, { runId: RUN_ID, topic: "sparse attention", paperLimit: 2 })) {
      if (stage) stages.push(stage);
    }
    expect(stages).toEqual(["discover", "acquire", "analyze", "synthesize", "assemble"]);

    const final = renderer.inputs[0];
    expect(final).toEqual({
      runId: RUN_ID,
      topic: "sparse attention",
      analyses: [
        { title: "Sparse Transformers", documentUrl: "https://oa.test/1.pdf", summary: "S1.", methodology: "M1.", keyFindings: "K1." },
        { title: "Longformer Revisited", documentUrl: "https://oa.test/2.pdf", summary: "S2.", methodology: "M2.", keyFindings: "K2." },
      ],
      topicOverview: "Shared.",
      comparison: "Differs.",
    });
  });

  it("returns the final state with the report path and a full trail", async () => {
    const graph = buildLiteratureReviewGraph(
      makeDeps({
        primarySearch: new FakePrimarySearch(PAPERS.slice(0, 1)),
        fetcher: new FakeFetcher({ "https://oa.test/1.pdf": "one" }),
        model: new ScriptedModel([
          text("Summary: S1. Methodology: M1. Key Findings: K1."),
          text("Topic Overview: Alone."),
        ]),
        renderer: new RecordingRenderer(async () => "/reports/sparse.html"),
      })
    );

    const state = await runToCompletion(graph, { runId: RUN_ID, topic: "sparse attention", paperLimit: 1 });

    expect(state.reportPath).toBe("/reports/sparse.html");
    expect(state.lastError).toBeNull();
    expect(state.topicOverview).toBe("Alone.");
    expect(state.comparison).toBe("Comparison skipped: Only one paper was successfully analyzed.");
    expect(state.trail.map((entry) => entry.stage)).toEqual([
      "discover",
      "acquire",
      "analyze",
      "synthesize",
      "assemble",
    ]);
  });

  it("carries the discovery error to the end without calling the model", async () => {
    const model = new ScriptedModel([]);
    const renderer = new RecordingRenderer(async () => "/reports/never.html");
    const graph = buildLiteratureReviewGraph(
      makeDeps({
        primarySearch: new FakePrimarySearch([]),
        secondarySearch: new FakeSecondarySearch([]),
        model,
        renderer,
      })
    );

    const state = await runToCompletion(graph, { runId: RUN_ID, topic: "sparse attention" });

    expect(state.lastError).toBe("No papers with PDF links found");
    expect(state.errorKind).toBe("DiscoveryExhausted");
    expect(state.reportPath).toBeNull();
    expect(state.trail).toHaveLength(5);
    expect(model.prompts).toEqual([]);
    expect(renderer.inputs).toEqual([]);
  });

  it("keeps the acquisition error when every download fails", async () => {
    const model = new ScriptedModel([]);
    const graph = buildLiteratureReviewGraph(
      makeDeps({
        primarySearch: new FakePrimarySearch(PAPERS),
        fetcher: new FakeFetcher({}),
        model,
      })
    );

    const state = await runToCompletion(graph, { runId: RUN_ID, topic: "sparse attention", paperLimit: 2 });

    expect(state.discoveredItems).toHaveLength(2);
    expect(state.lastError).toBe("Failed to download or parse any valid PDFs.");
    expect(state.errorKind).toBe("AcquisitionAllFailed");
    expect(state.topicOverview).toBe("N/A - No papers analyzed.");
    expect(model.prompts).toEqual([]);
  });

  it("records a missing topic as the run's error", async () => {
    const graph = buildLiteratureReviewGraph(makeDeps());

    const state = await runToCompletion(graph, { runId: RUN_ID, topic: "" });

    expect(state.lastError).toBe("Topic missing");
    expect(state.errorKind).toBe("TopicMissing");
  });
});
