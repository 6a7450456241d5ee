/**
 * Literature Review Agent: Public API
 */

// Graph and public functions
export {
  buildLiteratureReviewGraph,
  runResearch,
  runToCompletion,
} from "./graph";
export type { LiteratureReviewGraph, ResearchRequest, StageEvent } from "./graph";

// State types and helpers
export {
  ResearchState,
  PaperRef,
  ExtractedPaper,
  PaperAnalysis,
  StageEntry,
  StageName,
  TerminalErrorKind,
  DEFAULT_PAPER_LIMIT,
  createInitialState,
  stageEntry,
} from "./state";

// Collaborator seams
export type {
  PipelineDeps,
  PipelineSettings,
  SearchProvider,
  SecondarySearchProvider,
  DocumentFetcher,
  TextExtractor,
  LanguageModel,
  ModelResponse,
  ReportRenderer,
  ReportInput,
} from "./collaborators";
export { createDefaultDeps } from "./defaults";

// Config and errors
export { loadConfig, ConfigError } from "./config";
export type { AppConfig } from "./config";
export { ProviderError, FetchError, ModelError, RenderError, describeError } from "./errors";
