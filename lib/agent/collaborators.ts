/**
 * Narrow interfaces to the external systems the pipeline talks to.
 * Stages only ever see these; concrete clients live under
 * providers/, documents/, llm/ and report/.
 */

import type { PaperAnalysis } from "./state";

export interface PrimarySearchResult {
  id: string;
  title: string;
  /** Direct open-access document link, when the provider has one. */
  openAccessUrl?: string;
  /** arXiv identifier, used to construct a document link. */
  externalId?: string;
}

/** Throws ProviderError on non-2xx, auth failure or malformed body. */
export interface SearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<PrimarySearchResult[]>;
}

export interface SecondarySearchResult {
  id: string;
  title: string;
  pdfUrl: string;
}

/** Results come back in the provider's own relevance order. */
export interface SecondarySearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<SecondarySearchResult[]>;
}

/** Throws FetchError on timeout or non-2xx status. */
export interface DocumentFetcher {
  fetch(url: string): Promise<Uint8Array>;
}

/** May resolve to an empty string for image-only documents. */
export interface TextExtractor {
  extract(document: Uint8Array): Promise<string>;
}

export type ModelResponse =
  | { kind: "text"; text: string }
  | { kind: "blocked"; reason: string }
  | { kind: "empty" };

/** Throws ModelError on transport or auth failure. */
export interface LanguageModel {
  generate(prompt: string, timeoutSeconds: number): Promise<ModelResponse>;
}

export interface ReportInput {
  runId: string;
  topic: string;
  analyses: PaperAnalysis[];
  topicOverview: string;
  comparison: string;
}

/** Resolves to the artifact path; throws RenderError on write failure. */
export interface ReportRenderer {
  render(input: ReportInput): Promise<string>;
}

/** Tunables the stages read; populated from config in production. */
export interface PipelineSettings {
  /** Character budget for one paper's text in the analysis prompt. */
  maxAnalysisChars: number;
  analysisTimeoutSeconds: number;
  synthesisTimeoutSeconds: number;
  /** Pause before each document download. */
  downloadDelayMs: number;
  /** Parent directory for transient downloaded files. */
  downloadDir: string;
}

export interface PipelineDeps {
  primarySearch: SearchProvider;
  secondarySearch: SecondarySearchProvider;
  fetcher: DocumentFetcher;
  extractor: TextExtractor;
  model: LanguageModel;
  renderer: ReportRenderer;
  settings: PipelineSettings;
}
