import { FetchError } from "./errors";
import type { PriceQuote } from "./types";

export const DEFAULT_IMPLAUSIBLE_FACTOR = 10;

export type ValidationContext = {
  now: number;
  maxQuoteAgeMs?: number;
  previousValue?: number;
  implausibleFactor?: number;
};

/** Returns why the quote must not enter the candidate set, or null when it may. */
export function validateQuote(q: PriceQuote, ctx: ValidationContext): FetchError | null {
  if (!Number.isFinite(q.value) || q.value <= 0) {
    return new FetchError(q.sourceId, "invalid_value", `price must be positive and finite, got ${q.value}`);
  }
  const { maxQuoteAgeMs } = ctx;
  if (maxQuoteAgeMs && maxQuoteAgeMs > 0) {
    const age = ctx.now - q.observedAt;
    if (!Number.isFinite(age) || age > maxQuoteAgeMs) {
      return new FetchError(q.sourceId, "stale", `quote is ${Math.round(age / 1000)}s old, limit ${Math.round(maxQuoteAgeMs / 1000)}s`);
    }
  }
  const prev = ctx.previousValue;
  const factor = ctx.implausibleFactor ?? DEFAULT_IMPLAUSIBLE_FACTOR;
  if (prev !== undefined && prev > 0 && (q.value > prev * factor || q.value < prev / factor)) {
    return new FetchError(q.sourceId, "implausible", `price ${q.value} is more than ${factor}x away from previous ${prev}`);
  }
  return null;
}
