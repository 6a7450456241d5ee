/**
 * Discovery Node: finds papers that carry a downloadable document link
 */

import type { PipelineDeps, PrimarySearchResult } from "../collaborators";
import { describeError, recordFailure } from "../errors";
import { ResearchState, PaperRef, stageEntry } from "../state";

/** Characters of the normalized title compared across sources. */
export const TITLE_PREFIX_LENGTH = 50;

export function titleKey(title: string): string {
  return title.toLowerCase().replace(/\s+/g, " ").trim().slice(0, TITLE_PREFIX_LENGTH);
}

/**
 * Ids and normalized title prefixes of every accepted paper.  Primary
 * results are compared by id only; the title prefix is for matching
 * secondary results against what is already collected.
 */
export class DedupIndex {
  private readonly ids = new Set<string>();
  private readonly titles = new Set<string>();

  hasId(id: string): boolean {
    return this.ids.has(id);
  }

  hasTitle(title: string): boolean {
    return this.titles.has(titleKey(title));
  }

  add(ref: Pick<PaperRef, "id" | "title">): void {
    this.ids.add(ref.id);
    this.titles.add(titleKey(ref.title));
  }
}

/**
 * Link priority: open-access URL, else a link built from the arXiv id,
 * else null (the paper cannot be acquired later).
 */
export function resolveDocumentUrl(result: PrimarySearchResult): string | null {
  if (result.openAccessUrl) return result.openAccessUrl;
  if (result.externalId) return `https://arxiv.org/pdf/${result.externalId}.pdf`;
  return null;
}

/** A candidate whose link does not parse as a URL is dropped. */
function toRef(id: string, title: string, documentUrl: string): PaperRef | null {
  const parsed = PaperRef.safeParse({ id, title, documentUrl });
  return parsed.success ? parsed.data : null;
}

/**
 * Queries the primary provider for 2×limit candidates and tops up from
 * the secondary provider when fewer than `paperLimit` linked papers
 * were found.  Provider failures are logged and treated as zero results.
 */
export function createDiscoveryNode(deps: Pick<PipelineDeps, "primarySearch" | "secondarySearch">) {
  return async function discoveryNode(
    state: ResearchState
  ): Promise<Partial<ResearchState>> {
    const topic = state.topic.trim();
    const limit = state.paperLimit;

    if (!topic) {
      console.error("[discovery] Topic not found in state.");
      return {
        discoveredItems: [],
        ...recordFailure(state, "TopicMissing", "Topic missing"),
        trail: [stageEntry("discover", "Skipped: no topic given.")],
        updatedAt: new Date().toISOString(),
      };
    }

    console.log(`[discovery] Searching for "${topic}" (targeting ${limit} papers with PDFs)`);

    const found: PaperRef[] = [];
    const seen = new DedupIndex();
    const accept = (ref: PaperRef) => {
      seen.add(ref);
      found.push(ref);
    };

    // ── 1. Primary provider ────────────────────────────────
    let primaryCount = 0;
    try {
      const results = await deps.primarySearch.search(topic, limit * 2);
      console.log(`[discovery] ${deps.primarySearch.name} returned ${results.length} candidates`);
      for (const result of results) {
        if (found.length >= limit) break;
        const documentUrl = resolveDocumentUrl(result);
        if (!documentUrl) continue;
        const ref = toRef(result.id, result.title, documentUrl);
        if (!ref || seen.hasId(ref.id)) continue;
        accept(ref);
        primaryCount++;
      }
    } catch (err) {
      console.warn(`[discovery] ${deps.primarySearch.name} search failed: ${describeError(err)}`);
    }

    // ── 2. Secondary provider (top-up) ─────────────────────
    let secondaryCount = 0;
    if (found.length < limit) {
      const needed = limit - found.length;
      console.log(`[discovery] Looking for ${needed} more via ${deps.secondarySearch.name}`);
      try {
        const results = await deps.secondarySearch.search(topic, needed * 2);
        for (const result of results) {
          if (found.length >= limit) break;
          const ref = toRef(result.id, result.title, result.pdfUrl);
          if (!ref || seen.hasId(ref.id) || seen.hasTitle(ref.title)) continue;
          accept(ref);
          secondaryCount++;
        }
      } catch (err) {
        console.warn(`[discovery] ${deps.secondarySearch.name} search failed: ${describeError(err)}`);
      }
    }

    if (found.length === 0) {
      console.error("[discovery] No papers with PDF links found from any source.");
      return {
        discoveredItems: [],
        ...recordFailure(state, "DiscoveryExhausted", "No papers with PDF links found"),
        trail: [stageEntry("discover", "No papers with PDF links found.")],
        updatedAt: new Date().toISOString(),
      };
    }

    console.log(`[discovery] Total papers with PDF links: ${found.length}`);
    return {
      discoveredItems: found,
      trail: [
        stageEntry(
          "discover",
          `Found ${found.length}/${limit} papers (${primaryCount} primary, ${secondaryCount} secondary).`
        ),
      ],
      updatedAt: new Date().toISOString(),
    };
  };
}
