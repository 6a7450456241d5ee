/**
 * Report renderer: self-contained, print-optimized HTML document.
 *
 * Open in a browser and print to PDF if a paged copy is needed.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { ReportInput, ReportRenderer } from "../collaborators";
import { RenderError } from "../errors";

// ─── Helpers ─────────────────────────────────────────────────────────────────

export type TextBlock = { kind: "bullet"; text: string } | { kind: "paragraph"; text: string };

const LIST_MARKER = /^(\*|-|\d+\.\s)\s*/;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Split model text into blocks: lines starting with `*`, `-` or `1. `
 * become bullets (marker removed), other non-empty lines paragraphs.
 */
export function textToBlocks(text: string): TextBlock[] {
  const blocks: TextBlock[] = [];
  for (const line of text.trim().split("\n")) {
    const stripped = line.trim();
    if (!stripped) continue;
    if (LIST_MARKER.test(stripped)) {
      blocks.push({ kind: "bullet", text: stripped.replace(LIST_MARKER, "") });
    } else {
      blocks.push({ kind: "paragraph", text: stripped });
    }
  }
  return blocks;
}

function blocksToHtml(text: string): string {
  const blocks = textToBlocks(text);
  if (blocks.length === 0) return "<p>N/A</p>";

  const html: string[] = [];
  let inList = false;
  for (const block of blocks) {
    if (block.kind === "bullet" && !inList) {
      html.push("<ul>");
      inList = true;
    } else if (block.kind === "paragraph" && inList) {
      html.push("</ul>");
      inList = false;
    }
    html.push(
      block.kind === "bullet" ? `<li>${escapeHtml(block.text)}</li>` : `<p>${escapeHtml(block.text)}</p>`
    );
  }
  if (inList) html.push("</ul>");
  return html.join("\n");
}

function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .slice(0, 60)
    .replace(/-+$/, "");
  return slug || "report";
}

export function reportFileName(input: Pick<ReportInput, "topic" | "runId">, date = new Date()): string {
  const day = date.toISOString().split("T")[0];
  return `${slugify(input.topic)}-${day}-${input.runId.slice(0, 8)}.html`;
}

// ─── Document ────────────────────────────────────────────────────────────────

const STYLES = `
  body { font-family: Calibri, "Segoe UI", Arial, sans-serif; font-size: 11pt; line-height: 1.5; max-width: 48rem; margin: 1in auto; color: #1a1a1a; }
  h1, h2.topic { text-align: center; }
  h2 { border-bottom: 1px solid #ccc; padding-bottom: 0.2rem; margin-top: 2rem; }
  .label { font-weight: bold; margin-bottom: 0.2rem; }
  .sources li em { margin-right: 0.4rem; }
  section.paper + section.paper { margin-top: 1.5rem; }
  @media print { section.page { page-break-before: always; } }
`;

export function renderReportHtml(input: ReportInput): string {
  const { topic, analyses, topicOverview, comparison } = input;

  const papers = analyses.length
    ? analyses
        .map(
          (analysis, i) => `
    <section class="paper">
      <h3>Paper ${i + 1}: ${escapeHtml(analysis.title || "N/A")}</h3>
      <p class="label">Summary:</p>
      ${blocksToHtml(analysis.summary)}
      <p class="label">Methodology:</p>
      ${blocksToHtml(analysis.methodology)}
      <p class="label">Key Findings:</p>
      ${blocksToHtml(analysis.keyFindings)}
    </section>`
        )
        .join("\n")
    : "<p>No individual paper summaries could be generated.</p>";

  const sources = analyses.length
    ? `<ul class="sources">
${analyses
  .map(
    (analysis, i) =>
      `      <li><em>${escapeHtml(analysis.title || `Paper ${i + 1}`)}:</em> ${escapeHtml(analysis.documentUrl || "URL not available")}</li>`
  )
  .join("\n")}
    </ul>`
    : "<p>No source papers were processed.</p>";

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Literature Review: ${escapeHtml(topic)}</title>
  <style>${STYLES}</style>
</head>
<body>
  <h1>Literature Review Report</h1>
  <h2 class="topic">Topic: ${escapeHtml(topic)}</h2>

  <section>
    <h2>Topic Overview</h2>
    ${blocksToHtml(topicOverview)}
  </section>

  <section class="page">
    <h2>Comparative Analysis</h2>
    ${blocksToHtml(comparison)}
  </section>

  <section class="page">
    <h2>Individual Paper Summaries</h2>
    ${papers}
  </section>

  <section class="page">
    <h2>Source Paper URLs</h2>
    ${sources}
  </section>
</body>
</html>
`;
}

export class HtmlReportRenderer implements ReportRenderer {
  constructor(private readonly reportDir: string) {}

  async render(input: ReportInput): Promise<string> {
    const path = resolve(join(this.reportDir, reportFileName(input)));
    try {
      await mkdir(this.reportDir, { recursive: true });
      await writeFile(path, renderReportHtml(input), "utf-8");
    } catch (err) {
      throw new RenderError(
        `Could not write report to ${path}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
    return path;
  }
}
