/**
 * Production wiring: the concrete clients behind each collaborator seam.
 */

import type { PipelineDeps } from "./collaborators";
import type { AppConfig } from "./config";
import { HttpDocumentFetcher } from "./documents/fetch";
import { PdfTextExtractor } from "./documents/pdf-text";
import { GeminiLanguageModel } from "./llm";
import { ArxivProvider } from "./providers/arxiv";
import { SemanticScholarProvider } from "./providers/semantic-scholar";
import { HtmlReportRenderer } from "./report/html-renderer";

/**
 * Build one set of collaborators.  Share the result between runs so
 * the Semantic Scholar rate gate covers every concurrent pipeline.
 */
export function createDefaultDeps(config: AppConfig): PipelineDeps {
  return {
    primarySearch: new SemanticScholarProvider({
      apiUrl: config.SEMANTIC_SCHOLAR_API_URL,
      apiKey: config.SEMANTIC_SCHOLAR_API_KEY || undefined,
      timeoutMs: config.SEARCH_TIMEOUT_MS,
      minIntervalMs: config.PRIMARY_MIN_INTERVAL_MS,
    }),
    secondarySearch: new ArxivProvider({
      apiUrl: config.ARXIV_API_URL,
      timeoutMs: config.SEARCH_TIMEOUT_MS,
    }),
    fetcher: new HttpDocumentFetcher(config.DOWNLOAD_TIMEOUT_MS),
    extractor: new PdfTextExtractor(),
    model: new GeminiLanguageModel({
      apiKey: config.GEMINI_API_KEY,
      model: config.GEMINI_MODEL,
    }),
    renderer: new HtmlReportRenderer(config.REPORT_DIR),
    settings: {
      maxAnalysisChars: config.MAX_ANALYSIS_CHARS,
      analysisTimeoutSeconds: config.ANALYSIS_TIMEOUT_SECONDS,
      synthesisTimeoutSeconds: config.SYNTHESIS_TIMEOUT_SECONDS,
      downloadDelayMs: config.DOWNLOAD_DELAY_MS,
      downloadDir: config.DOWNLOAD_DIR,
    },
  };
}
