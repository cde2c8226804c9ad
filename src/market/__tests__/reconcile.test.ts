import { FetchError, NoValidSourceError } from "../errors";
import { lowerMedian, reconcile, selectPrice, spreadPct } from "../reconcile";
import { SYNTHETIC_MEDIAN, err, ok, type FetchErrorReason, type Result, type SourceAdapter, type SourceOutcome } from "../types";

const NOW = Date.UTC(2024, 4, 1, 12, 0, 0);

const quoted = (sourceId: string, value: number, observedAt = NOW): SourceOutcome => ({
  sourceId,
  result: ok({ sourceId, value, observedAt, rawPayload: { price: value } }),
});

const failed = (sourceId: string, reason: FetchErrorReason = "network"): SourceOutcome => ({
  sourceId,
  result: err(new FetchError(sourceId, reason, "boom")),
});

function unwrap<T, E>(r: Result<T, E>): T {
  if (!r.ok) throw new Error("expected an ok result");
  return r.value;
}

describe("Reconciler", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("lowerMedian", () => {
    it("should take the middle value of an odd set", () => {
      expect(lowerMedian([3, 1, 2])).toBe(2);
    });

    it("should take the lower middle value of an even set", () => {
      expect(lowerMedian([2406, 2400, 2404, 2402])).toBe(2402);
    });
  });

  describe("spreadPct", () => {
    it("should measure (max - min) / min in percent", () => {
      expect(spreadPct([2400, 2450])).toBeCloseTo(2.0833, 3);
    });
  });

  describe("selectPrice", () => {
    it("should return the common value with zero spread when all quotes agree", () => {
      const r = unwrap(selectPrice([quoted("a", 2400), quoted("b", 2400), quoted("c", 2400)], { now: NOW }));
      expect(r.chosenValue).toBe(2400);
      expect(r.spreadPct).toBe(0);
      expect(r.mismatch).toBe(false);
    });

    it("should pick the median of three sources when no primary is configured", () => {
      const r = unwrap(selectPrice([quoted("a", 2401.1), quoted("b", 2402.0), quoted("c", 2403.5)], { now: NOW }));
      expect(r.chosenValue).toBe(2402.0);
      expect(r.chosenSource).toBe(SYNTHETIC_MEDIAN);
      expect(r.spreadPct).toBeCloseTo(0.1, 2);
      expect(r.mismatch).toBe(false);
      expect(r.passTimestamp).toBe(NOW);
    });

    it("should take the lower middle value of two disagreeing sources and flag the mismatch", () => {
      const r = unwrap(selectPrice([quoted("a", 2450), quoted("b", 2400)], { now: NOW }));
      expect(r.chosenValue).toBe(2400);
      expect(r.chosenSource).toBe(SYNTHETIC_MEDIAN);
      expect(r.spreadPct).toBeCloseTo(2.0833, 3);
      expect(r.mismatch).toBe(true);
    });

    it("should prefer a valid primary source regardless of the other values", () => {
      const r = unwrap(selectPrice([quoted("a", 2401.1), quoted("b", 2450), quoted("c", 2402)], { now: NOW, primarySource: "b" }));
      expect(r.chosenSource).toBe("b");
      expect(r.chosenValue).toBe(2450);
      expect(r.mismatch).toBe(true);
    });

    it("should fall back to the median when the primary source failed", () => {
      const r = unwrap(selectPrice([failed("p"), quoted("a", 2410), quoted("b", 2412)], { now: NOW, primarySource: "p" }));
      expect(r.chosenValue).toBe(2410);
      expect(r.chosenSource).toBe(SYNTHETIC_MEDIAN);
      expect(r.rejected).toEqual([{ sourceId: "p", reason: "network", message: "boom" }]);
    });

    it("should use a single valid quote as is", () => {
      const r = unwrap(selectPrice([failed("a"), quoted("b", 2405)], { now: NOW }));
      expect(r.chosenValue).toBe(2405);
      expect(r.chosenSource).toBe("b");
      expect(r.spreadPct).toBe(0);
      expect(r.mismatch).toBe(false);
    });

    it("should honour a custom mismatch threshold", () => {
      const outcomes = [quoted("a", 2400), quoted("b", 2410)];
      expect(unwrap(selectPrice(outcomes, { now: NOW })).mismatch).toBe(false);
      expect(unwrap(selectPrice(outcomes, { now: NOW, mismatchThresholdPct: 0.3 })).mismatch).toBe(true);
    });

    it("should not change the chosen value when invalid quotes are added", () => {
      const base = [quoted("a", 2401.1), quoted("b", 2402), quoted("c", 2403.5)];
      const withInvalid = [...base, quoted("neg", -5), quoted("nan", Number.NaN), quoted("zero", 0)];
      const r = unwrap(selectPrice(withInvalid, { now: NOW }));
      expect(r.chosenValue).toBe(unwrap(selectPrice(base, { now: NOW })).chosenValue);
      expect(r.candidates.map(q => q.sourceId)).toEqual(["a", "b", "c"]);
      expect(r.rejected.map(x => `${x.sourceId}:${x.reason}`)).toEqual(["nan:invalid_value", "neg:invalid_value", "zero:invalid_value"]);
    });

    it("should report NoValidSource when every source fails", () => {
      const r = selectPrice([failed("a"), failed("b", "timeout")], { now: NOW });
      expect(r.ok).toBe(false);
      if (r.ok) return;
      expect(r.error).toBeInstanceOf(NoValidSourceError);
      expect(r.error.code).toBe("no_valid_source");
      expect(r.error.rejected.map(x => x.reason)).toEqual(["network", "timeout"]);
    });

    it("should report NoValidSource when no sources are configured", () => {
      const r = selectPrice([], { now: NOW });
      expect(r.ok).toBe(false);
    });

    it("should reject quotes older than the freshness window", () => {
      const r = unwrap(selectPrice(
        [quoted("old", 2300, NOW - 20 * 60_000), quoted("fresh", 2402, NOW - 60_000)],
        { now: NOW, maxQuoteAgeMs: 15 * 60_000 },
      ));
      expect(r.chosenSource).toBe("fresh");
      expect(r.rejected).toEqual([{ sourceId: "old", reason: "stale", message: "quote is 1200s old, limit 900s" }]);
    });

    it("should drop quotes an order of magnitude away from the previous price", () => {
      const previous = unwrap(selectPrice([quoted("a", 2400)], { now: NOW }));
      const r = unwrap(selectPrice([quoted("a", 2405), quoted("b", 240_000), quoted("c", 24)], { now: NOW, previous }));
      expect(r.chosenValue).toBe(2405);
      expect(r.rejected.map(x => x.reason)).toEqual(["implausible", "implausible"]);
    });

    it("should be byte-identical across runs and input orderings", () => {
      const outcomes = [quoted("c", 2403.5), failed("d"), quoted("a", 2401.1), quoted("b", 2402)];
      const first = JSON.stringify(selectPrice(outcomes, { now: NOW }));
      expect(JSON.stringify(selectPrice(outcomes, { now: NOW }))).toBe(first);
      expect(JSON.stringify(selectPrice([...outcomes].reverse(), { now: NOW }))).toBe(first);
    });

    it("should freeze the result", () => {
      const r = unwrap(selectPrice([quoted("a", 2400), quoted("b", 2401)], { now: NOW }));
      expect(Object.isFrozen(r)).toBe(true);
      expect(Object.isFrozen(r.candidates)).toBe(true);
      expect(Object.isFrozen(r.candidates[0])).toBe(true);
      expect(Object.isFrozen(r.candidates[0].rawPayload)).toBe(true);
      expect(Object.isFrozen(r.rejected)).toBe(true);
    });
  });

  describe("reconcile", () => {
    const adapter = (id: string, value: number): SourceAdapter => ({
      id,
      fetchQuote: async () => ok({ sourceId: id, value, observedAt: NOW, rawPayload: null }),
    });

    it("should query every adapter and select from the answers", async () => {
      const r = unwrap(await reconcile([adapter("a", 2401.1), adapter("b", 2402), adapter("c", 2403.5)], { now: NOW }));
      expect(r.chosenValue).toBe(2402);
      expect(r.candidates).toHaveLength(3);
    });

    it("should record an adapter that throws as a fault instead of failing the pass", async () => {
      const broken: SourceAdapter = {
        id: "broken",
        fetchQuote: () => {
          throw new Error("contract violated");
        },
      };
      const r = unwrap(await reconcile([broken, adapter("a", 2400)], { now: NOW }));
      expect(r.chosenValue).toBe(2400);
      expect(r.rejected).toEqual([{ sourceId: "broken", reason: "adapter_fault", message: "contract violated" }]);
    });

    it("should pass the cancellation signal to every adapter", async () => {
      const seen: Array<AbortSignal | undefined> = [];
      const spy = (id: string): SourceAdapter => ({
        id,
        fetchQuote: async signal => {
          seen.push(signal);
          return ok({ sourceId: id, value: 2400, observedAt: NOW, rawPayload: null });
        },
      });
      const ac = new AbortController();
      await reconcile([spy("a"), spy("b")], { now: NOW, signal: ac.signal });
      expect(seen).toEqual([ac.signal, ac.signal]);
    });

    it("should run adapters concurrently", async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const slow = (id: string): SourceAdapter => ({
        id,
        fetchQuote: async () => {
          inFlight++;
          maxInFlight = Math.max(maxInFlight, inFlight);
          await new Promise(resolve => setTimeout(resolve, 10));
          inFlight--;
          return ok({ sourceId: id, value: 2400, observedAt: NOW, rawPayload: null });
        },
      });
      await reconcile([slow("a"), slow("b"), slow("c")], { now: NOW });
      expect(maxInFlight).toBe(3);
    });
  });
});
