import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { TextExtractor } from "../collaborators";
import { FetchError } from "../errors";
import { FakeFetcher, TEST_SETTINGS, Utf8Extractor, makeState, paperRef } from "../testing";
import { createAcquisitionNode, transientFileName } from "./acquisition";

describe("transientFileName", () => {
  it("prefixes a padded run index and sanitizes the title", () => {
    expect(transientFileName(0, "A/B: c")).toBe("001-A_B__c.pdf");
    expect(transientFileName(11, "x".repeat(80))).toBe(`012-${"x".repeat(50)}.pdf`);
  });
});

describe("acquisition node", () => {
  let downloadDir: string;

  beforeEach(async () => {
    downloadDir = await mkdtemp(join(tmpdir(), "acquisition-test-"));
  });

  afterEach(async () => {
    await rm(downloadDir, { recursive: true, force: true });
  });

  const settings = () => ({ ...TEST_SETTINGS, downloadDir });

  it("keeps going past a failed item and preserves discovery order", async () => {
    const [p1, p2, p3] = [paperRef(1), paperRef(2), paperRef(3)];
    const fetcher = new FakeFetcher({
      [p1.documentUrl]: "text of one",
      [p2.documentUrl]: new FetchError("Download timed out after 90000ms", p2.documentUrl),
      [p3.documentUrl]: "text of three",
    });
    const node = createAcquisitionNode({ fetcher, extractor: new Utf8Extractor(), settings: settings() });

    const update = await node(makeState({ discoveredItems: [p1, p2, p3] }));

    expect(fetcher.calls).toEqual([p1.documentUrl, p2.documentUrl, p3.documentUrl]);
    expect(update.extractedItems).toEqual([
      { ...p1, text: "text of one" },
      { ...p3, text: "text of three" },
    ]);
    expect(update.lastError).toBeUndefined();
    expect(update.trail?.[0].summary).toBe("Extracted text from 2/3 papers.");
  });

  it("removes every transient file once the batch is done", async () => {
    const p1 = paperRef(1);
    const seen: string[] = [];
    const extractor: TextExtractor = {
      async extract(document) {
        seen.push(...(await readdir(downloadDir)));
        return new TextDecoder().decode(document);
      },
    };
    const node = createAcquisitionNode({
      fetcher: new FakeFetcher({ [p1.documentUrl]: "body" }),
      extractor,
      settings: settings(),
    });

    await node(makeState({ discoveredItems: [p1] }));

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatch(/^run-123e4567-/);
    expect(await readdir(downloadDir)).toEqual([]);
  });

  it("counts whitespace-only text as a failure", async () => {
    const p1 = paperRef(1);
    const node = createAcquisitionNode({
      fetcher: new FakeFetcher({ [p1.documentUrl]: "   \n " }),
      extractor: new Utf8Extractor(),
      settings: settings(),
    });

    const update = await node(makeState({ discoveredItems: [p1] }));

    expect(update.extractedItems).toEqual([]);
    expect(update.lastError).toBe("Failed to download or parse any valid PDFs.");
    expect(update.errorKind).toBe("AcquisitionAllFailed");
  });

  it("keeps an inherited error and downloads nothing when there are no items", async () => {
    const fetcher = new FakeFetcher({});
    const node = createAcquisitionNode({ fetcher, extractor: new Utf8Extractor(), settings: settings() });

    const update = await node(
      makeState({ lastError: "No papers with PDF links found", errorKind: "DiscoveryExhausted" })
    );

    expect(fetcher.calls).toEqual([]);
    expect(update.extractedItems).toEqual([]);
    expect(update.lastError).toBe("No papers with PDF links found");
    expect(update.errorKind).toBe("DiscoveryExhausted");
  });

  it("records its own error when given nothing to acquire", async () => {
    const node = createAcquisitionNode({
      fetcher: new FakeFetcher({}),
      extractor: new Utf8Extractor(),
      settings: settings(),
    });

    const update = await node(makeState());

    expect(update.lastError).toBe("No papers available to acquire.");
    expect(update.errorKind).toBe("AcquisitionAllFailed");
  });
});
