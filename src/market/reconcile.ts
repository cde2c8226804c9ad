import { logger } from "../logger";
import { FetchError, NoValidSourceError, errorMessage } from "./errors";
import { validateQuote } from "./validate";
import {
  SYNTHETIC_MEDIAN,
  deepFreeze,
  err,
  ok,
  type PriceQuote,
  type ReconcileOptions,
  type ReconciledPrice,
  type RejectedSource,
  type Result,
  type SourceAdapter,
  type SourceOutcome,
} from "./types";

export const DEFAULT_MISMATCH_THRESHOLD_PCT = 0.5;

const bySourceId = (a: { sourceId: string }, b: { sourceId: string }) =>
  a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;

/** Median; for an even count the smaller of the two middle values. */
export function lowerMedian(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor((sorted.length - 1) / 2)];
}

/** (max - min) / min * 100 */
export function spreadPct(values: readonly number[]): number {
  const min = Math.min(...values);
  const max = Math.max(...values);
  return ((max - min) / min) * 100;
}

/**
 * Pure selection over the outcomes of one pass. Failed, invalid, stale and implausible
 * quotes are set aside; the primary source wins when valid, otherwise the lower median.
 * Output only depends on the set of outcomes and `now`.
 */
export function selectPrice(
  outcomes: readonly SourceOutcome[],
  opts: ReconcileOptions = {},
): Result<ReconciledPrice, NoValidSourceError> {
  const { primarySource, mismatchThresholdPct = DEFAULT_MISMATCH_THRESHOLD_PCT, previous, now = Date.now() } = opts;
  const used: PriceQuote[] = [];
  const removed: RejectedSource[] = [];

  for (const o of outcomes) {
    if (!o.result.ok) {
      removed.push(o.result.error.toRejected());
      continue;
    }
    const invalid = validateQuote(o.result.value, {
      now,
      maxQuoteAgeMs: opts.maxQuoteAgeMs,
      implausibleFactor: opts.implausibleFactor,
      previousValue: previous?.chosenValue,
    });
    if (invalid) removed.push(invalid.toRejected());
    else used.push(o.result.value);
  }
  used.sort(bySourceId);
  removed.sort(bySourceId);
  const rejected = Object.freeze(removed.map(r => Object.freeze({ ...r })));

  if (!used.length) return err(new NoValidSourceError(rejected));

  const candidates = Object.freeze(used.map(q => deepFreeze({ ...q })));
  if (candidates.length === 1) {
    const only = candidates[0];
    return ok(Object.freeze({
      chosenValue: only.value,
      chosenSource: only.sourceId,
      candidates,
      spreadPct: 0,
      mismatch: false,
      passTimestamp: now,
      rejected,
    }));
  }

  const values = candidates.map(q => q.value);
  const spread = spreadPct(values);
  const primary = primarySource ? candidates.find(q => q.sourceId === primarySource) : undefined;
  return ok(Object.freeze({
    chosenValue: primary ? primary.value : lowerMedian(values),
    chosenSource: primary ? primary.sourceId : SYNTHETIC_MEDIAN,
    candidates,
    spreadPct: spread,
    mismatch: spread > mismatchThresholdPct,
    passTimestamp: now,
    rejected,
  }));
}

/** Queries every adapter concurrently, then selects one price from whatever came back. */
export async function reconcile(
  adapters: readonly SourceAdapter[],
  opts: ReconcileOptions = {},
): Promise<Result<ReconciledPrice, NoValidSourceError>> {
  const settled = await Promise.allSettled(adapters.map(async a => a.fetchQuote(opts.signal)));
  const outcomes = settled.map((s, i): SourceOutcome => {
    const sourceId = adapters[i].id;
    if (s.status === "fulfilled") return { sourceId, result: s.value };
    return { sourceId, result: err(new FetchError(sourceId, "adapter_fault", errorMessage(s.reason), { cause: s.reason })) };
  });

  for (const o of outcomes) {
    if (o.result.ok) logger.debug("Quote received", { source: o.sourceId, price: o.result.value.value });
    else logger.debug("Source failed", { source: o.sourceId, reason: o.result.error.reason, error: o.result.error.message });
  }

  const result = selectPrice(outcomes, { ...opts, now: opts.now ?? Date.now() });
  if (result.ok && result.value.mismatch) {
    logger.warn("Sources disagree beyond threshold", {
      spreadPct: Number(result.value.spreadPct.toFixed(3)),
      quotes: result.value.candidates.map(q => `${q.sourceId}=${q.value}`),
    });
  }
  return result;
}
