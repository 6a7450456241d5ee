/**
 * Report Node: hands the final state to the renderer
 */

import type { PipelineDeps } from "../collaborators";
import { describeError, recordFailure } from "../errors";
import { ResearchState, stageEntry } from "../state";

export function createReportNode(deps: Pick<PipelineDeps, "renderer">) {
  return async function reportNode(
    state: ResearchState
  ): Promise<Partial<ResearchState>> {
    if (state.analyses.length === 0) {
      console.log(
        state.lastError
          ? "[report] Skipping report generation due to prior error."
          : "[report] Nothing to render."
      );
      return {
        reportPath: null,
        ...recordFailure(state, "RenderFailed", "Cannot generate report without successful summaries"),
        trail: [stageEntry("assemble", "Skipped: no analyses to render.")],
        updatedAt: new Date().toISOString(),
      };
    }

    console.log(`[report] Generating report for topic: "${state.topic}"`);
    try {
      const reportPath = await deps.renderer.render({
        runId: state.runId,
        topic: state.topic,
        analyses: state.analyses,
        topicOverview: state.topicOverview,
        comparison: state.comparison,
      });
      console.log(`[report] Report saved to: ${reportPath}`);
      return {
        reportPath,
        trail: [stageEntry("assemble", `Report written to ${reportPath}.`)],
        updatedAt: new Date().toISOString(),
      };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[report] Report generation failed: ${describeError(err)}`);
      return {
        reportPath: null,
        ...recordFailure(state, "RenderFailed", `Report generation failed: ${reason}`),
        trail: [stageEntry("assemble", "Rendering failed.")],
        updatedAt: new Date().toISOString(),
      };
    }
  };
}
