/**
 * Acquisition Node: downloads each document and extracts its text
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import type { PipelineDeps } from "../collaborators";
import { describeError, recordFailure } from "../errors";
import { ResearchState, ExtractedPaper, PaperRef, stageEntry } from "../state";

/** Run-scoped index keeps names unique even when titles collide. */
export function transientFileName(index: number, title: string): string {
  const safeTitle = title.slice(0, 50).replace(/[^a-zA-Z0-9]/g, "_");
  return `${String(index + 1).padStart(3, "0")}-${safeTitle}.pdf`;
}

/**
 * Processes items one at a time.  A failure while fetching, writing or
 * extracting one item is logged and counted; the batch continues.  The
 * transient file lives exactly as long as its item's processing.
 */
export function createAcquisitionNode(
  deps: Pick<PipelineDeps, "fetcher" | "extractor" | "settings">
) {
  async function acquireOne(
    item: PaperRef,
    filePath: string
  ): Promise<ExtractedPaper | null> {
    try {
      if (deps.settings.downloadDelayMs > 0) await sleep(deps.settings.downloadDelayMs);
      console.log(`[acquisition] Downloading "${item.title}" from ${item.documentUrl}`);
      const bytes = await deps.fetcher.fetch(item.documentUrl);
      await writeFile(filePath, bytes);

      const text = await deps.extractor.extract(await readFile(filePath));
      if (!text.trim()) {
        console.warn(`[acquisition] No text extracted from "${item.title}" (${item.id})`);
        return null;
      }
      console.log(`[acquisition] Parsed "${item.title}": ${text.length} chars`);
      return { ...item, text };
    } catch (err) {
      console.error(`[acquisition] Failed on ${item.id} ("${item.title}"): ${describeError(err)}`);
      return null;
    } finally {
      await rm(filePath, { force: true }).catch((err: unknown) =>
        console.warn(`[acquisition] Could not delete ${filePath}: ${describeError(err)}`)
      );
    }
  }

  return async function acquisitionNode(
    state: ResearchState
  ): Promise<Partial<ResearchState>> {
    const items = state.discoveredItems;

    if (items.length === 0) {
      const inherited = state.lastError !== null;
      console.log(
        inherited
          ? "[acquisition] Skipping download due to previous error."
          : "[acquisition] No papers to process found in state."
      );
      return {
        extractedItems: [],
        ...recordFailure(state, "AcquisitionAllFailed", "No papers available to acquire."),
        trail: [stageEntry("acquire", "Skipped: nothing to download.")],
        updatedAt: new Date().toISOString(),
      };
    }

    const extracted: ExtractedPaper[] = [];
    let failures = 0;
    let workDir: string | null = null;
    try {
      await mkdir(deps.settings.downloadDir, { recursive: true });
      workDir = await mkdtemp(join(deps.settings.downloadDir, `run-${state.runId.slice(0, 8)}-`));
      for (const [index, item] of items.entries()) {
        const paper = await acquireOne(item, join(workDir, transientFileName(index, item.title)));
        if (paper) extracted.push(paper);
        else failures++;
      }
    } catch (err) {
      console.error(`[acquisition] Download directory unavailable: ${describeError(err)}`);
      failures = items.length - extracted.length;
    } finally {
      if (workDir) {
        const dir = workDir;
        await rm(dir, { recursive: true, force: true }).catch((err: unknown) =>
          console.warn(`[acquisition] Could not delete ${dir}: ${describeError(err)}`)
        );
      }
    }

    console.log(`[acquisition] Parsed ${extracted.length} papers, ${failures} failed.`);

    const summary = `Extracted text from ${extracted.length}/${items.length} papers.`;
    if (extracted.length === 0) {
      return {
        extractedItems: [],
        ...recordFailure(state, "AcquisitionAllFailed", "Failed to download or parse any valid PDFs."),
        trail: [stageEntry("acquire", summary)],
        updatedAt: new Date().toISOString(),
      };
    }

    return {
      extractedItems: extracted,
      trail: [stageEntry("acquire", summary)],
      updatedAt: new Date().toISOString(),
    };
  };
}
