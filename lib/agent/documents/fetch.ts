/**
 * HTTP document download with a hard timeout.
 */

import type { DocumentFetcher } from "../collaborators";
import { FetchError } from "../errors";

export class HttpDocumentFetcher implements DocumentFetcher {
  constructor(private readonly timeoutMs: number) {}

  async fetch(url: string): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await fetch(url, {
        redirect: "follow",
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === "TimeoutError";
      throw new FetchError(
        timedOut
          ? `Download timed out after ${this.timeoutMs}ms`
          : `Download failed: ${err instanceof Error ? err.message : String(err)}`,
        url,
        undefined,
        { cause: err }
      );
    }

    if (!response.ok) {
      throw new FetchError(`Download failed (HTTP ${response.status})`, url, response.status);
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      throw new FetchError("Download interrupted while reading the body", url, response.status, {
        cause: err,
      });
    }
  }
}
