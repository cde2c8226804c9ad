import type { FetchErrorReason, RejectedSource } from "./types";

export class FetchError extends Error {
  readonly sourceId: string;
  readonly reason: FetchErrorReason;
  readonly status?: number;

  constructor(sourceId: string, reason: FetchErrorReason, message: string, opts?: { status?: number; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "FetchError";
    this.sourceId = sourceId;
    this.reason = reason;
    this.status = opts?.status;
  }

  toRejected(): RejectedSource {
    return { sourceId: this.sourceId, reason: this.reason, message: this.message };
  }
}

/** Every configured source failed or was filtered out during one pass. */
export class NoValidSourceError extends Error {
  readonly code = "no_valid_source";
  readonly rejected: readonly RejectedSource[];

  constructor(rejected: readonly RejectedSource[]) {
    super(rejected.length ? `no_valid_source: ${rejected.map(r => `${r.sourceId}(${r.reason})`).join(", ")}` : "no_valid_source: no sources configured");
    this.name = "NoValidSourceError";
    this.rejected = rejected;
  }
}

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));
