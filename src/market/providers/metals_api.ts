import { z } from "zod";
import { epochTime, numeric, parseWith, type ProviderDef } from "./schema";

const LatestResponse = z.object({
  success: z.boolean().optional(),
  timestamp: epochTime,
  rates: z.object({ XAU: numeric.optional(), USDXAU: numeric.optional() }),
});

// rates.XAU is ounces per dollar; USDXAU, when present, is already dollars per ounce
export const metalsApi: ProviderDef = {
  id: "metals-api",
  credential: "metalsApiKey",
  request: (url, key) => {
    const u = new URL(url);
    if (key) u.searchParams.set("access_key", key);
    return { url: u.toString() };
  },
  parse: payload =>
    parseWith(LatestResponse, payload, d => {
      if (d.success === false) return { ok: false, error: "success=false" };
      const { XAU, USDXAU } = d.rates;
      if (USDXAU !== undefined) return { ok: true, value: { value: USDXAU, observedAt: d.timestamp } };
      if (XAU === undefined) return { ok: false, error: "rates.XAU missing" };
      if (XAU <= 0) return { ok: false, error: `rates.XAU not positive: ${XAU}` };
      return { ok: true, value: { value: 1 / XAU, observedAt: d.timestamp } };
    }),
};
