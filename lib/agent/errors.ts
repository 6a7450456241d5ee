/**
 * Error taxonomy: collaborator errors are thrown and caught at the
 * stage boundary; terminal errors are values carried in state.
 */

import type { ResearchState, TerminalErrorKind } from "./state";

/** Search provider returned non-2xx, rejected auth, or sent a malformed body. */
export class ProviderError extends Error {
  constructor(
    message: string,
    readonly provider: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

/** Document download timed out or returned a non-2xx status. */
export class FetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

/** Language-model transport or auth failure. */
export class ModelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelError";
  }
}

/** The report artifact could not be written. */
export class RenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
  }
}

export type ErrorSlot = Pick<ResearchState, "lastError" | "errorKind">;

/** Composition rule for the error slot: the earliest error wins. */
export function firstError<T>(current: T | null, next: T | null): T | null {
  return current ?? next;
}

/**
 * Record a terminal error unless one is already carried.  A stage that
 * is the first to fail owns the slot; later symptoms never replace it.
 */
export function recordFailure(
  state: ErrorSlot,
  kind: TerminalErrorKind,
  message: string
): ErrorSlot {
  if (state.lastError !== null) {
    return { lastError: state.lastError, errorKind: state.errorKind };
  }
  return { lastError: message, errorKind: kind };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name} - ${err.message}`;
  return String(err);
}
