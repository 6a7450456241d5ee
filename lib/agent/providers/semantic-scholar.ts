/**
 * Semantic Scholar Graph API: primary paper search.
 */

import { z } from "zod";
import type { PrimarySearchResult, SearchProvider } from "../collaborators";
import { ProviderError } from "../errors";
import { createRateGate, type RateGate } from "./rate-gate";

const SearchResponse = z.object({
  total: z.number().optional(),
  data: z
    .array(
      z.object({
        paperId: z.string().nullable().optional(),
        title: z.string().nullable().optional(),
        externalIds: z.record(z.union([z.string(), z.number()])).nullable().optional(),
        openAccessPdf: z
          .object({ url: z.string().nullable().optional() })
          .nullable()
          .optional(),
      })
    )
    .default([]),
});

export interface SemanticScholarOptions {
  apiUrl: string;
  apiKey?: string;
  timeoutMs: number;
  /** Minimum spacing between requests (the public API allows ~1 req/s). */
  minIntervalMs: number;
  gate?: RateGate;
}

export class SemanticScholarProvider implements SearchProvider {
  readonly name = "semantic_scholar";
  private readonly gate: RateGate;

  constructor(private readonly options: SemanticScholarOptions) {
    this.gate = options.gate ?? createRateGate(options.minIntervalMs);
  }

  async search(query: string, maxResults: number): Promise<PrimarySearchResult[]> {
    const url = new URL(this.options.apiUrl);
    url.searchParams.set("query", query);
    url.searchParams.set("limit", String(maxResults));
    url.searchParams.set("fields", "title,paperId,externalIds,openAccessPdf");

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.apiKey) headers["x-api-key"] = this.options.apiKey;

    await this.gate.wait();

    let response: Response;
    try {
      response = await fetch(url, {
        headers,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new ProviderError(
        `Semantic Scholar request failed: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
        undefined,
        { cause: err }
      );
    }

    if (!response.ok) {
      const reason =
        response.status === 401 || response.status === 403
          ? "authentication rejected"
          : response.status === 429
            ? "rate limited"
            : "request failed";
      throw new ProviderError(
        `Semantic Scholar ${reason} (HTTP ${response.status})`,
        this.name,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ProviderError("Semantic Scholar returned a non-JSON body", this.name, response.status, {
        cause: err,
      });
    }

    const parsed = SearchResponse.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(
        `Semantic Scholar returned a malformed body: ${parsed.error.issues[0]?.message ?? "unknown"}`,
        this.name,
        response.status
      );
    }

    const results: PrimarySearchResult[] = [];
    for (const paper of parsed.data.data) {
      if (!paper.paperId || !paper.title) continue;
      const arxivId = paper.externalIds?.["ArXiv"];
      results.push({
        id: paper.paperId,
        title: paper.title,
        openAccessUrl: paper.openAccessPdf?.url || undefined,
        externalId: arxivId === undefined ? undefined : String(arxivId),
      });
    }
    return results;
  }
}
