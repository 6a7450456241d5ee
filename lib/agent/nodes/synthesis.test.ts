import { describe, expect, it } from "vitest";
import { ModelError } from "../errors";
import { ScriptedModel, TEST_SETTINGS, makeState, paperAnalysis, text } from "../testing";
import {
  COMPARISON_SKIPPED,
  COMPARISON_UNPARSED,
  NO_DATA,
  PARSING_FAILED,
  createSynthesisNode,
  parseOverviewOnly,
  parseSynthesis,
} from "./synthesis";

describe("parseSynthesis", () => {
  it("splits the two sections in either order", () => {
    expect(
      parseSynthesis("Detailed Comparative Analysis:\nC text\nTopic Overview:\nO text")
    ).toEqual({ topicOverview: "O text", comparison: "C text" });
  });

  it("flags a missing comparison", () => {
    expect(parseSynthesis("Topic Overview: only the overview")).toEqual({
      topicOverview: "only the overview",
      comparison: COMPARISON_UNPARSED,
    });
  });

  it("falls back to the raw answer when neither heading is present", () => {
    expect(parseSynthesis("  free-form answer  ")).toEqual({
      topicOverview: "free-form answer",
      comparison: PARSING_FAILED,
    });
  });
});

describe("parseOverviewOnly", () => {
  it("prefers the labeled section over the whole answer", () => {
    expect(parseOverviewOnly("Topic Overview:\n* one\n* two")).toBe("* one\n* two");
    expect(parseOverviewOnly("Plain answer.")).toBe("Plain answer.");
  });
});

describe("synthesis node", () => {
  it("makes no model call when nothing was analyzed", async () => {
    const model = new ScriptedModel([]);
    const node = createSynthesisNode({ model, settings: TEST_SETTINGS });

    const update = await node(makeState());

    expect(model.prompts).toEqual([]);
    expect(update.topicOverview).toBe(NO_DATA);
    expect(update.comparison).toBe(NO_DATA);
    expect(update.lastError).toBe("No summaries available");
    expect(update.errorKind).toBe("SynthesisBlocked");
  });

  it("writes an overview only for a single paper", async () => {
    const model = new ScriptedModel([text("Topic Overview:\nOnly one paper so far.")]);
    const node = createSynthesisNode({ model, settings: TEST_SETTINGS });

    const update = await node(makeState({ analyses: [paperAnalysis(1)] }));

    expect(model.prompts).toHaveLength(1);
    expect(model.prompts[0]).not.toContain("Detailed Comparative Analysis:");
    expect(update.topicOverview).toBe("Only one paper so far.");
    expect(update.comparison).toBe(COMPARISON_SKIPPED);
  });

  it("asks for overview and comparison for several papers", async () => {
    const model = new ScriptedModel([
      text("Topic Overview:\nShared focus.\nDetailed Comparative Analysis:\n- 1 vs 2"),
    ]);
    const node = createSynthesisNode({ model, settings: TEST_SETTINGS });

    const update = await node(makeState({ analyses: [paperAnalysis(1), paperAnalysis(2)] }));

    expect(model.prompts[0]).toContain("--- Paper 2 (Paper 2) ---\nSummary: Summary 2.");
    expect(update).toMatchObject({ topicOverview: "Shared focus.", comparison: "- 1 vs 2" });
    expect(update.lastError).toBeUndefined();
  });

  it("records a blocked request", async () => {
    const node = createSynthesisNode({
      model: new ScriptedModel([{ kind: "blocked", reason: "SAFETY" }]),
      settings: TEST_SETTINGS,
    });

    const update = await node(makeState({ analyses: [paperAnalysis(1), paperAnalysis(2)] }));

    expect(update.lastError).toBe("Synthesis blocked by the language model (SAFETY)");
    expect(update.errorKind).toBe("SynthesisBlocked");
    expect(update.topicOverview).toBe("Synthesis blocked by the language model (SAFETY)");
  });

  it("keeps an earlier error when the model blocks", async () => {
    const node = createSynthesisNode({
      model: new ScriptedModel([{ kind: "blocked", reason: "SAFETY" }]),
      settings: TEST_SETTINGS,
    });

    const update = await node(
      makeState({
        analyses: [paperAnalysis(1), paperAnalysis(2)],
        lastError: "Topic missing",
        errorKind: "TopicMissing",
      })
    );

    expect(update.lastError).toBe("Topic missing");
    expect(update.errorKind).toBe("TopicMissing");
  });

  it("reports model failures in both sections", async () => {
    const node = createSynthesisNode({
      model: new ScriptedModel([new ModelError("Gemini request failed: boom")]),
      settings: TEST_SETTINGS,
    });

    const update = await node(makeState({ analyses: [paperAnalysis(1)] }));

    const message = "Synthesis failed: ModelError - Gemini request failed: boom";
    expect(update).toMatchObject({ topicOverview: message, comparison: message, lastError: message });
  });

  it("handles an empty answer", async () => {
    const node = createSynthesisNode({
      model: new ScriptedModel([{ kind: "empty" }]),
      settings: TEST_SETTINGS,
    });

    const update = await node(makeState({ analyses: [paperAnalysis(1), paperAnalysis(2)] }));

    expect(update.topicOverview).toBe("Overview failed: Empty response");
    expect(update.comparison).toBe("Comparison failed: Empty response");
    expect(update.lastError).toBe("Synthesis failed: empty response from the language model");
  });
});
