import type { FetchError } from "./errors";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Freezes a plain value and everything reachable from it (JSON-shaped data, no cycles). */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

/** One observation of the spot gold price (USD per troy ounce) from one source. */
export type PriceQuote = {
  sourceId: string;
  value: number;
  /** epoch ms, UTC */
  observedAt: number;
  /** parsed response body, kept for diagnostics only */
  rawPayload: unknown;
};

export type FetchErrorReason =
  | "network"
  | "timeout"
  | "aborted"
  | "http_status"
  | "bad_payload"
  | "invalid_value"
  | "stale"
  | "implausible"
  | "adapter_fault";

export type RejectedSource = { sourceId: string; reason: FetchErrorReason; message: string };

export const SYNTHETIC_MEDIAN = "synthetic-median";

export type ReconciledPrice = {
  readonly chosenValue: number;
  /** a source id, or "synthetic-median" */
  readonly chosenSource: string;
  readonly candidates: readonly Readonly<PriceQuote>[];
  readonly spreadPct: number;
  readonly mismatch: boolean;
  readonly passTimestamp: number;
  readonly rejected: readonly Readonly<RejectedSource>[];
};

export interface SourceAdapter {
  readonly id: string;
  fetchQuote(signal?: AbortSignal): Promise<Result<PriceQuote, FetchError>>;
}

export type SourceOutcome = { sourceId: string; result: Result<PriceQuote, FetchError> };

export type ReconcileOptions = {
  primarySource?: string;
  /** percent, default 0.5 */
  mismatchThresholdPct?: number;
  /** ms; 0 or undefined disables the staleness guard */
  maxQuoteAgeMs?: number;
  /** quotes further than this factor from the previous value are dropped, default 10 */
  implausibleFactor?: number;
  previous?: ReconciledPrice;
  now?: number;
  signal?: AbortSignal;
};
