import { z } from "zod";
import { epochTime, numeric, parseWith, type ProviderDef } from "./schema";

const QuoteResponse = z.object({
  quoteResponse: z.object({
    result: z.array(z.object({
      symbol: z.string().optional(),
      currency: z.string().optional(),
      regularMarketPrice: numeric,
      regularMarketTime: epochTime,
    })).min(1),
  }),
});

/** COMEX front-month future (GC=F). Tracks spot closely but is not spot. */
export const yahooFutures: ProviderDef = {
  id: "yahoo-futures",
  request: url => ({ url }),
  parse: payload =>
    parseWith(QuoteResponse, payload, d => {
      const q = d.quoteResponse.result[0];
      if (q.currency && q.currency !== "USD") return { ok: false, error: `unexpected currency ${q.currency}` };
      return { ok: true, value: { value: q.regularMarketPrice, observedAt: q.regularMarketTime } };
    }),
};
