/**
 * In-process fakes for the collaborator seams.  Used by the tests only.
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import type {
  DocumentFetcher,
  LanguageModel,
  ModelResponse,
  PipelineDeps,
  PipelineSettings,
  PrimarySearchResult,
  ReportInput,
  ReportRenderer,
  SearchProvider,
  SecondarySearchProvider,
  SecondarySearchResult,
  TextExtractor,
} from "./collaborators";
import {
  createInitialState,
  type ExtractedPaper,
  type PaperAnalysis,
  type PaperRef,
  type ResearchState,
} from "./state";

export const RUN_ID = "123e4567-e89b-42d3-a456-426614174000";

export function makeState(overrides: Partial<ResearchState> = {}): ResearchState {
  return { ...createInitialState({ runId: RUN_ID, topic: "sparse attention" }), ...overrides };
}

export function paperRef(n: number): PaperRef {
  return { id: `p${n}`, title: `Paper ${n}`, documentUrl: `https://papers.test/${n}.pdf` };
}

export function extractedPaper(n: number): ExtractedPaper {
  return { ...paperRef(n), text: `Full text of paper ${n}.` };
}

export function paperAnalysis(n: number): PaperAnalysis {
  return {
    title: `Paper ${n}`,
    documentUrl: `https://papers.test/${n}.pdf`,
    summary: `Summary ${n}.`,
    methodology: `Method ${n}.`,
    keyFindings: `Finding ${n}.`,
  };
}

export const TEST_SETTINGS: PipelineSettings = {
  maxAnalysisChars: 1000,
  analysisTimeoutSeconds: 1,
  synthesisTimeoutSeconds: 1,
  downloadDelayMs: 0,
  downloadDir: join(tmpdir(), "literature-review-tests"),
};

export class FakePrimarySearch implements SearchProvider {
  readonly name = "fake_primary";
  readonly calls: Array<{ query: string; maxResults: number }> = [];

  constructor(private readonly results: PrimarySearchResult[] | Error = []) {}

  async search(query: string, maxResults: number): Promise<PrimarySearchResult[]> {
    this.calls.push({ query, maxResults });
    if (this.results instanceof Error) throw this.results;
    return this.results;
  }
}

export class FakeSecondarySearch implements SecondarySearchProvider {
  readonly name = "fake_secondary";
  readonly calls: Array<{ query: string; maxResults: number }> = [];

  constructor(private readonly results: SecondarySearchResult[] | Error = []) {}

  async search(query: string, maxResults: number): Promise<SecondarySearchResult[]> {
    this.calls.push({ query, maxResults });
    if (this.results instanceof Error) throw this.results;
    return this.results.slice(0, maxResults);
  }
}

/** Serves the UTF-8 bytes of the mapped text; unmapped or Error entries fail. */
export class FakeFetcher implements DocumentFetcher {
  readonly calls: string[] = [];

  constructor(private readonly documents: Record<string, string | Error>) {}

  async fetch(url: string): Promise<Uint8Array> {
    this.calls.push(url);
    const doc = this.documents[url];
    if (doc === undefined) throw new Error(`No document at ${url}`);
    if (doc instanceof Error) throw doc;
    return new TextEncoder().encode(doc);
  }
}

/** Treats the bytes as UTF-8 text. */
export class Utf8Extractor implements TextExtractor {
  async extract(document: Uint8Array): Promise<string> {
    return new TextDecoder().decode(document);
  }
}

/** Replies from a script, in order; an Error entry is thrown. */
export class ScriptedModel implements LanguageModel {
  readonly prompts: string[] = [];

  constructor(private readonly script: Array<ModelResponse | Error>) {}

  async generate(prompt: string): Promise<ModelResponse> {
    this.prompts.push(prompt);
    const next = this.script.shift();
    if (next === undefined) throw new Error("ScriptedModel ran out of responses");
    if (next instanceof Error) throw next;
    return next;
  }
}

export const text = (value: string): ModelResponse => ({ kind: "text", text: value });

export class RecordingRenderer implements ReportRenderer {
  readonly inputs: ReportInput[] = [];

  constructor(private readonly respond: (input: ReportInput) => Promise<string>) {}

  async render(input: ReportInput): Promise<string> {
    this.inputs.push(input);
    return this.respond(input);
  }
}

export function makeDeps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    primarySearch: new FakePrimarySearch(),
    secondarySearch: new FakeSecondarySearch(),
    fetcher: new FakeFetcher({}),
    extractor: new Utf8Extractor(),
    model: new ScriptedModel([]),
    renderer: new RecordingRenderer(async () => "/reports/unused.html"),
    settings: TEST_SETTINGS,
    ...overrides,
  };
}
