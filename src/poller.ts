import { setTimeout as sleep } from "node:timers/promises";
import type { PriceHistory } from "./history/priceHistory";
import { logger } from "./logger";
import { fetchGoldSpot, type GoldSpotOptions, type GoldSpotPass } from "./market";
import { errorMessage } from "./market/errors";
import { DEFAULT_FORECAST_WINDOW, forecastNext, type ForecastOptions } from "./market/forecast";
import type { ReconciledPrice } from "./market/types";
import { BOT_ERROR_MESSAGE, NO_PRICE_MESSAGE, formatPriceMessage, type Notifier } from "./notify/discord";

export type CycleStatus = "ok" | "no_price" | "error" | "cancelled";

/** `window` is how many stored prices the estimator trains on */
export type PollerForecast = Omit<ForecastOptions, "smaPeriod"> & { window?: number };

export type PollerDeps = {
  spot: Omit<GoldSpotOptions, "previous" | "signal" | "now">;
  history: PriceHistory;
  notifier: Notifier;
  smaPeriod: number;
  forecast?: PollerForecast;
  fetchSpot?: (opt: GoldSpotOptions) => Promise<GoldSpotPass>;
};

/**
 * Owns the state carried between passes: the last reconciled price, used for
 * implausibility filtering, the change line in messages and the /latest route.
 */
export class GoldPoller {
  private last?: ReconciledPrice;

  constructor(private readonly deps: PollerDeps) {}

  get latest(): ReconciledPrice | undefined {
    return this.last;
  }

  async runCycle(signal?: AbortSignal): Promise<CycleStatus> {
    const { history, smaPeriod } = this.deps;
    const fetchSpot = this.deps.fetchSpot ?? fetchGoldSpot;
    const previous = this.last;
    try {
      const { result } = await fetchSpot({ ...this.deps.spot, previous, signal });
      if (signal?.aborted) return "cancelled";
      if (!result.ok) {
        logger.warn("No price fetched this cycle", { rejected: result.error.rejected.map(r => `${r.sourceId}:${r.reason}`) });
        await this.notify(NO_PRICE_MESSAGE);
        return "no_price";
      }

      const price = result.value;
      this.last = price;
      logger.info("Reconciled gold price", {
        price: price.chosenValue,
        source: price.chosenSource,
        candidates: price.candidates.length,
        spreadPct: Number(price.spreadPct.toFixed(3)),
      });

      const settings: PollerForecast = this.deps.forecast ?? {};
      const { window = DEFAULT_FORECAST_WINDOW, ...forecastOpts } = settings;
      const stored = await history.recentPrices(Math.max(window, smaPeriod));
      const prices = [...stored, price.chosenValue];
      const forecast = forecastNext(prices, { ...forecastOpts, smaPeriod });
      if (forecast) logger.info("Next price estimate", { ...forecast });

      await history.append(price, forecast?.predictedPrice);
      await this.notify(formatPriceMessage(price, {
        previous,
        recentPrices: prices.slice(-smaPeriod),
        smaPeriod,
        mismatchThresholdPct: this.deps.spot.mismatchThresholdPct,
        forecast,
      }));
      return "ok";
    } catch (e) {
      logger.error("Polling cycle failed", { error: errorMessage(e) });
      await this.notify(BOT_ERROR_MESSAGE);
      return "error";
    }
  }

  /** Runs cycles every `intervalMs` until the signal aborts. */
  async run(intervalMs: number, signal: AbortSignal) {
    logger.info("Poller started", { intervalMs, sources: this.deps.spot.sources });
    while (!signal.aborted) {
      await this.runCycle(signal);
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (e) {
        if (signal.aborted) break;
        throw e;
      }
    }
    logger.info("Poller stopped");
  }

  private async notify(text: string) {
    try {
      await this.deps.notifier.send(text);
    } catch (e) {
      logger.error("Failed to send notification", { error: errorMessage(e) });
    }
  }
}
