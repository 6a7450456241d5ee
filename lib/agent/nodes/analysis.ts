/**
 * Analysis Node: one structured summary per extracted paper
 */

import type { PipelineDeps } from "../collaborators";
import { describeError, recordFailure } from "../errors";
import { ResearchState, ExtractedPaper, PaperAnalysis, stageEntry } from "../state";
import { parseLabeledSections, sectionOr } from "../utils/sections";

const SUMMARY = "Summary:";
const METHODOLOGY = "Methodology:";
const KEY_FINDINGS = "Key Findings:";
const LABELS = [SUMMARY, METHODOLOGY, KEY_FINDINGS] as const;

export const UNPARSED_SECTION = "Could not parse this section from the model response.";

/** Counts code points, so a surrogate pair is never split. */
export function truncateText(text: string, maxChars: number): string {
  return Array.from(text).slice(0, maxChars).join("");
}

export function buildAnalysisPrompt(text: string, maxChars: number): string {
  return `
Analyze the research paper text provided below. Extract the following information and present it clearly under the specified headings.

Summary:
Provide a concise summary (3-5 sentences) covering the paper's main objectives, methods, and key conclusions.

Methodology:
Briefly describe the core methodology, algorithms, or experimental approach used.

Key Findings:
List the 2-3 most significant findings, results, or outcomes reported in the paper.

--- START OF PAPER TEXT ---
${truncateText(text, maxChars)}
--- END OF PAPER TEXT ---

Provide the output clearly structured under the headings "Summary:", "Methodology:", and "Key Findings:". Ensure each section is clearly separated. Do NOT use markdown formatting like asterisks for bolding in your response text.
  `.trim();
}

/**
 * Slice the answer between its labels.  Text ahead of the first label
 * counts as the summary when the "Summary:" heading itself is missing.
 */
export function parseAnalysis(
  text: string
): Pick<PaperAnalysis, "summary" | "methodology" | "keyFindings"> {
  const { sections, preamble } = parseLabeledSections(text, LABELS);
  return {
    summary: sectionOr(sections.get(SUMMARY) ?? (preamble || undefined), UNPARSED_SECTION),
    methodology: sectionOr(sections.get(METHODOLOGY), UNPARSED_SECTION),
    keyFindings: sectionOr(sections.get(KEY_FINDINGS), UNPARSED_SECTION),
  };
}

/**
 * Sends each paper to the model on its own.  Blocked, empty or failed
 * responses skip that paper only.
 */
export function createAnalysisNode(deps: Pick<PipelineDeps, "model" | "settings">) {
  async function analyzeOne(paper: ExtractedPaper): Promise<PaperAnalysis | null> {
    try {
      const prompt = buildAnalysisPrompt(paper.text, deps.settings.maxAnalysisChars);
      const response = await deps.model.generate(prompt, deps.settings.analysisTimeoutSeconds);

      switch (response.kind) {
        case "text":
          return {
            title: paper.title,
            documentUrl: paper.documentUrl,
            ...parseAnalysis(response.text),
          };
        case "blocked":
          console.warn(`[analysis] Request blocked for "${paper.title}": ${response.reason}`);
          return null;
        case "empty":
          console.warn(`[analysis] Empty response for "${paper.title}"`);
          return null;
        default: {
          const exhaustiveCheck: never = response;
          throw new Error(`Unknown model response: ${JSON.stringify(exhaustiveCheck)}`);
        }
      }
    } catch (err) {
      console.error(`[analysis] Failed on "${paper.title}": ${describeError(err)}`);
      return null;
    }
  }

  return async function analysisNode(
    state: ResearchState
  ): Promise<Partial<ResearchState>> {
    const papers = state.extractedItems;

    if (papers.length === 0) {
      return {
        analyses: [],
        ...recordFailure(state, "AnalysisAllFailed", "Parsing step yielded no text."),
        trail: [stageEntry("analyze", "Skipped: no extracted text.")],
        updatedAt: new Date().toISOString(),
      };
    }

    console.log(`[analysis] Summarizing ${papers.length} papers...`);
    const analyses: PaperAnalysis[] = [];
    let failures = 0;
    for (const [i, paper] of papers.entries()) {
      console.log(`[analysis] Paper ${i + 1}/${papers.length}: "${paper.title}"`);
      const analysis = await analyzeOne(paper);
      if (analysis) analyses.push(analysis);
      else failures++;
    }

    console.log(`[analysis] Analyses generated: ${analyses.length}. Failures: ${failures}`);
    const summary = `Analyzed ${analyses.length}/${papers.length} papers.`;

    if (analyses.length === 0) {
      return {
        analyses: [],
        ...recordFailure(state, "AnalysisAllFailed", "Summarization failed for all parsed papers."),
        trail: [stageEntry("analyze", summary)],
        updatedAt: new Date().toISOString(),
      };
    }

    return {
      analyses,
      trail: [stageEntry("analyze", summary)],
      updatedAt: new Date().toISOString(),
    };
  };
}
