import { fetch } from "undici";
import { logger } from "../logger";
import { errorMessage } from "../market/errors";
import type { Forecast } from "../market/forecast";
import { changePct, sma, volatilityPct } from "../market/indicators";
import { DEFAULT_MISMATCH_THRESHOLD_PCT } from "../market/reconcile";
import type { ReconciledPrice } from "../market/types";

export const NO_PRICE_MESSAGE = "⚠️ Could not fetch gold price this cycle.";
export const BOT_ERROR_MESSAGE = "⚠️ Bot error occurred; check logs.";

const DISCORD_MAX_CONTENT = 2000;

export interface Notifier {
  send(text: string): Promise<void>;
}

export class NotifyError extends Error {
  readonly status?: number;
  constructor(message: string, opts?: { status?: number; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "NotifyError";
    this.status = opts?.status;
  }
}

export type MessageContext = {
  previous?: ReconciledPrice;
  /** oldest first, including the current price */
  recentPrices?: readonly number[];
  smaPeriod?: number;
  mismatchThresholdPct?: number;
  forecast?: Forecast;
};

const usd = (n: number) => `$${n.toFixed(2)}`;
const signed = (n: number, digits = 2) => `${n >= 0 ? "+" : ""}${n.toFixed(digits)}`;

export function formatPriceMessage(p: ReconciledPrice, ctx: MessageContext = {}): string {
  const period = ctx.smaPeriod ?? 5;
  const lines = [`🟡 Gold (XAU/USD): ${usd(p.chosenValue)} via ${p.chosenSource}`];

  if (ctx.previous) {
    const prev = ctx.previous.chosenValue;
    lines.push(`Change: ${signed(p.chosenValue - prev)} (${signed(changePct(prev, p.chosenValue), 3)}%) since last pass`);
  }

  const window = (ctx.recentPrices ?? []).slice(-period);
  const avg = sma(window, period);
  if (avg !== undefined && window.length >= 2) {
    const vol = volatilityPct(window);
    const volText = vol === undefined ? "" : ` | Volatility: ${vol.toFixed(3)}%`;
    lines.push(`SMA(${period}): ${usd(avg)} (gap ${signed(changePct(avg, p.chosenValue), 3)}%)${volText}`);
  }

  if (ctx.forecast) {
    const f = ctx.forecast;
    lines.push(`Predicted next: ${usd(f.predictedPrice)} (${signed(f.predictedReturn * 100, 3)}% via ${f.method})`);
  }

  lines.push(`Sources: ${p.candidates.length} ok, ${p.rejected.length} failed | Spread: ${p.spreadPct.toFixed(2)}%`);
  if (p.mismatch) {
    const threshold = ctx.mismatchThresholdPct ?? DEFAULT_MISMATCH_THRESHOLD_PCT;
    lines.push(`⚠️ Sources disagree: spread ${p.spreadPct.toFixed(2)}% exceeds ${threshold.toFixed(2)}%`);
  }
  return lines.join("\n");
}

export class DiscordNotifier implements Notifier {
  constructor(private readonly webhookUrl: string | undefined, private readonly timeoutMs = 10_000) {}

  async send(text: string) {
    if (!this.webhookUrl) {
      logger.warn("Discord webhook not configured; skipping send");
      return;
    }
    const ac = new AbortController();
    const to = setTimeout(() => ac.abort(), this.timeoutMs);
    try {
      const res = await fetch(this.webhookUrl, {
        method: "POST",
        signal: ac.signal,
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ content: text.slice(0, DISCORD_MAX_CONTENT) }),
      });
      if (!res.ok) {
        const detail = (await res.text()).slice(0, 200);
        throw new NotifyError(`discord webhook HTTP ${res.status}${detail ? `: ${detail}` : ""}`, { status: res.status });
      }
      await res.text();
    } catch (e) {
      if (e instanceof NotifyError) throw e;
      throw new NotifyError(`discord webhook failed: ${errorMessage(e)}`, { cause: e });
    } finally {
      clearTimeout(to);
    }
  }
}
