/**
 * Environment configuration, validated with zod.
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_PAPER_LIMIT } from "./state";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Unset and empty variables both fall back to the default. */
const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const str = (fallback: string) =>
  z.preprocess(blankAsUndefined, z.string().default(fallback));

const int = (fallback: number, min = 0) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).default(fallback));

const EnvSchema = z.object({
  GEMINI_API_KEY: str(""),
  GEMINI_MODEL: str("gemini-2.5-flash"),
  SEMANTIC_SCHOLAR_API_KEY: str(""),
  SEMANTIC_SCHOLAR_API_URL: z.preprocess(
    blankAsUndefined,
    z.string().url().default("https://api.semanticscholar.org/graph/v1/paper/search")
  ),
  ARXIV_API_URL: z.preprocess(
    blankAsUndefined,
    z.string().url().default("https://export.arxiv.org/api/query")
  ),
  DEFAULT_PAPER_LIMIT: int(DEFAULT_PAPER_LIMIT, 1),
  PRIMARY_MIN_INTERVAL_MS: int(1100),
  SEARCH_TIMEOUT_MS: int(30_000, 1),
  DOWNLOAD_DELAY_MS: int(500),
  DOWNLOAD_TIMEOUT_MS: int(90_000, 1),
  ANALYSIS_TIMEOUT_SECONDS: int(180, 1),
  SYNTHESIS_TIMEOUT_SECONDS: int(300, 1),
  MAX_ANALYSIS_CHARS: int(40_000, 1),
  DOWNLOAD_DIR: str(join(tmpdir(), "literature-review")),
  REPORT_DIR: str("reports"),
  PORT: int(8000, 1),
  RUN_TTL_MINUTES: int(120, 1),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid environment configuration:\n${problems}`);
  }
  return result.data;
}
