/**
 * Synthesis Node: topic overview and cross-paper comparison
 */

import type { ModelResponse, PipelineDeps } from "../collaborators";
import { describeError, recordFailure } from "../errors";
import { ResearchState, PaperAnalysis, stageEntry } from "../state";
import { parseLabeledSections } from "../utils/sections";

const OVERVIEW = "Topic Overview:";
const COMPARISON = "Detailed Comparative Analysis:";

export const NO_DATA = "N/A - No papers analyzed.";
export const COMPARISON_SKIPPED = "Comparison skipped: Only one paper was successfully analyzed.";
export const OVERVIEW_UNPARSED = "Could not parse topic overview section.";
export const COMPARISON_UNPARSED = "Could not parse detailed comparison section.";
export const PARSING_FAILED = "Parsing failed.";

function describeAnalyses(analyses: PaperAnalysis[]): string {
  return analyses
    .map(
      (a, i) =>
        `--- Paper ${i + 1} (${a.title}) ---\nSummary: ${a.summary}\nMethodology: ${a.methodology}\nKey Findings: ${a.keyFindings}`
    )
    .join("\n\n");
}

const OVERVIEW_TASK = (topic: string) => `
Synthesize insights from ALL provided papers to give a high-level overview of the research topic '${topic}'. Use bullet points for lists where appropriate (e.g., for methods, findings, future work). Address:
    * Current State/Focus: General status or recent focus.
    * Methods Used: Common techniques, algorithms, frameworks.
    * Performance/Accuracy: Key quantitative results or KPIs mentioned.
    * Accomplishments/Key Findings: Significant findings highlighted collectively.
    * Future Work/Directions: Common limitations or future research suggestions.`;

/** Overview-only prompt for a single analyzed paper. */
export function buildOverviewPrompt(topic: string, analyses: PaperAnalysis[]): string {
  return `
Based *only* on the provided analysis details from the retrieved paper below, generate a section titled "Topic Overview".

Analysis details from the retrieved papers:

${describeAnalyses(analyses)}

--- Analysis Task ---

Task (Topic Overview):
${OVERVIEW_TASK(topic)}

Structure your entire response with the exact heading "${OVERVIEW}" followed by its content. Do NOT use markdown formatting like asterisks for bolding within the generated text content itself.
  `.trim();
}

/** Combined overview + comparison prompt for two or more papers. */
export function buildSynthesisPrompt(topic: string, analyses: PaperAnalysis[]): string {
  return `
Based *only* on the provided analysis details from the retrieved papers below, generate two distinct sections: "Topic Overview" and "Detailed Comparative Analysis".

Analysis details from the retrieved papers:

${describeAnalyses(analyses)}

--- Analysis Tasks ---

Task 1 (Topic Overview):
${OVERVIEW_TASK(topic)}

Task 2 (Detailed Comparative Analysis):
Provide a point-by-point comparison *between* the papers. Use bullet points within each comparison category where appropriate. Analyze and highlight:
    * Core Objective & Scope: Compare goals and focus.
    * Methodology & Approach: Compare specific methods, novelty, complexity, tools.
    * Key Findings & Performance: Compare quantitative results and qualitative findings.
    * Advancements & Relation to State-of-the-Art: Compare novelty or improvements.
    * Limitations & Future Work: Compare stated limitations or future directions.
    * Overall Contribution & Theme: Compare their main contributions.

Structure your entire response clearly with the exact headings "${OVERVIEW}" followed by its content, and then "${COMPARISON}" followed by its content. Do NOT use markdown formatting like asterisks for bolding within the generated text content itself. Ensure lists naturally use bullet points or numbered formats.
  `.trim();
}

/**
 * Split a synthesis answer.  Label positions decide the slices, so the
 * two headings may come in either order.
 */
export function parseSynthesis(text: string): { topicOverview: string; comparison: string } {
  const { sections, preamble } = parseLabeledSections(text, [OVERVIEW, COMPARISON]);
  const overview = sections.get(OVERVIEW);
  const comparison = sections.get(COMPARISON);

  if (overview !== undefined && comparison !== undefined) {
    return {
      topicOverview: overview || OVERVIEW_UNPARSED,
      comparison: comparison || COMPARISON_UNPARSED,
    };
  }
  if (overview !== undefined) {
    return { topicOverview: overview || OVERVIEW_UNPARSED, comparison: COMPARISON_UNPARSED };
  }
  if (comparison !== undefined) {
    return { topicOverview: preamble || OVERVIEW_UNPARSED, comparison: comparison || COMPARISON_UNPARSED };
  }
  return { topicOverview: text.trim() || OVERVIEW_UNPARSED, comparison: PARSING_FAILED };
}

/** Overview for one paper: the labeled section, else the whole answer. */
export function parseOverviewOnly(text: string): string {
  const { sections } = parseLabeledSections(text, [OVERVIEW]);
  return sections.get(OVERVIEW) || text.trim() || OVERVIEW_UNPARSED;
}

export function createSynthesisNode(deps: Pick<PipelineDeps, "model" | "settings">) {
  return async function synthesisNode(
    state: ResearchState
  ): Promise<Partial<ResearchState>> {
    const analyses = state.analyses;
    const topic = state.topic || "the research field";

    if (analyses.length === 0) {
      console.log("[synthesis] No analyses available; skipping model call.");
      return {
        topicOverview: NO_DATA,
        comparison: NO_DATA,
        ...recordFailure(state, "SynthesisBlocked", "No summaries available"),
        trail: [stageEntry("synthesize", "Skipped: no analyses.")],
        updatedAt: new Date().toISOString(),
      };
    }

    const single = analyses.length === 1;
    console.log(
      single
        ? "[synthesis] Only one paper analyzed. Generating overview only."
        : `[synthesis] Generating overview & comparison for ${analyses.length} papers...`
    );

    const prompt = single
      ? buildOverviewPrompt(topic, analyses)
      : buildSynthesisPrompt(topic, analyses);

    let response: ModelResponse;
    try {
      response = await deps.model.generate(prompt, deps.settings.synthesisTimeoutSeconds);
    } catch (err) {
      const message = `Synthesis failed: ${describeError(err)}`;
      console.error(`[synthesis] ${message}`);
      return {
        topicOverview: message,
        comparison: message,
        ...recordFailure(state, "SynthesisBlocked", message),
        trail: [stageEntry("synthesize", "Model request failed.")],
        updatedAt: new Date().toISOString(),
      };
    }

    if (response.kind === "blocked") {
      const message = `Synthesis blocked by the language model (${response.reason})`;
      console.warn(`[synthesis] ${message}`);
      return {
        topicOverview: message,
        comparison: message,
        ...recordFailure(state, "SynthesisBlocked", message),
        trail: [stageEntry("synthesize", "Model refused the request.")],
        updatedAt: new Date().toISOString(),
      };
    }

    if (response.kind === "empty") {
      console.warn("[synthesis] Received empty response.");
      return {
        topicOverview: "Overview failed: Empty response",
        comparison: "Comparison failed: Empty response",
        ...recordFailure(state, "SynthesisBlocked", "Synthesis failed: empty response from the language model"),
        trail: [stageEntry("synthesize", "Model returned an empty response.")],
        updatedAt: new Date().toISOString(),
      };
    }

    const result = single
      ? { topicOverview: parseOverviewOnly(response.text), comparison: COMPARISON_SKIPPED }
      : parseSynthesis(response.text);

    return {
      ...result,
      trail: [
        stageEntry(
          "synthesize",
          single ? "Overview generated from one paper." : `Overview and comparison of ${analyses.length} papers.`
        ),
      ],
      updatedAt: new Date().toISOString(),
    };
  };
}
