/**
 * Pipeline error types.
 *
 * Only HistoryUnavailable ends a run. The per-revision errors are caught by
 * the aggregator, and CacheCorrupt never leaves the revision cache.
 */

import type { RevisionId } from "./types";

export class HistoryUnavailable extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HistoryUnavailable";
  }
}

export class RevisionReadError extends Error {
  constructor(
    message: string,
    public readonly revision: RevisionId,
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RevisionReadError";
  }
}

export class MalformedDocument extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedDocument";
  }
}

export class CacheCorrupt extends Error {
  constructor(
    message: string,
    public readonly cachePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CacheCorrupt";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
