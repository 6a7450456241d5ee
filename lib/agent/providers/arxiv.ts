/**
 * arXiv export API: secondary paper search.
 *
 * The Atom feed is parsed with regular expressions; the entries we
 * need are flat and well-formed.
 */

import type { SecondarySearchProvider, SecondarySearchResult } from "../collaborators";
import { ProviderError } from "../errors";

export interface ArxivOptions {
  apiUrl: string;
  timeoutMs: number;
}

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
};

function decodeEntities(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|apos);/g, (entity) => ENTITIES[entity] ?? entity);
}

function getTag(entry: string, tag: string): string {
  const m = entry.match(new RegExp(`<${tag}[^>]*>([\\s\\S]*?)<\\/${tag}>`));
  return m ? decodeEntities(m[1].trim().replace(/\s+/g, " ")) : "";
}

function getPdfLink(entry: string): string | null {
  for (const link of entry.match(/<link\b[^>]*>/g) ?? []) {
    const isPdf = /title="pdf"/.test(link) || /type="application\/pdf"/.test(link);
    const href = link.match(/href="([^"]+)"/);
    if (isPdf && href) return href[1];
  }
  return null;
}

/** Parse an arXiv Atom feed into ranked results, feed order preserved. */
export function parseArxivFeed(xmlText: string): SecondarySearchResult[] {
  const entryRegex = /<entry>([\s\S]*?)<\/entry>/g;
  const results: SecondarySearchResult[] = [];
  let match: RegExpExecArray | null;

  while ((match = entryRegex.exec(xmlText)) !== null) {
    const entry = match[1];
    const fullId = getTag(entry, "id");
    const title = getTag(entry, "title");
    if (!fullId || !title) continue;

    // "http://arxiv.org/abs/2301.12345v1" → "2301.12345v1"
    const arxivId = fullId.replace(/^https?:\/\/(export\.)?arxiv\.org\/abs\//, "");
    const pdfUrl = getPdfLink(entry) ?? `https://arxiv.org/pdf/${arxivId}`;

    results.push({ id: `arXiv:${arxivId}`, title, pdfUrl });
  }

  return results;
}

export class ArxivProvider implements SecondarySearchProvider {
  readonly name = "arxiv";

  constructor(private readonly options: ArxivOptions) {}

  async search(query: string, maxResults: number): Promise<SecondarySearchResult[]> {
    const url = new URL(this.options.apiUrl);
    url.searchParams.set("search_query", `all:${query}`);
    url.searchParams.set("max_results", String(maxResults));
    url.searchParams.set("sortBy", "relevance");

    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (err) {
      throw new ProviderError(
        `arXiv request failed: ${err instanceof Error ? err.message : String(err)}`,
        this.name,
        undefined,
        { cause: err }
      );
    }

    if (!response.ok) {
      throw new ProviderError(`arXiv request failed (HTTP ${response.status})`, this.name, response.status);
    }

    const xmlText = await response.text();
    if (!xmlText.includes("<feed")) {
      throw new ProviderError("arXiv returned a malformed body", this.name, response.status);
    }

    return parseArxivFeed(xmlText).slice(0, maxResults);
  }
}
