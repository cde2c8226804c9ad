import { z } from "zod";
import { numeric, parseWith, type ProviderDef } from "./schema";

const ConvertResponse = z.object({
  success: z.boolean().optional(),
  result: numeric,
});

/** Currency converter: 1 XAU in USD. Carries no intraday timestamp. */
export const exchangeRateHost: ProviderDef = {
  id: "exchangerate-host",
  request: url => ({ url }),
  parse: payload =>
    parseWith(ConvertResponse, payload, d =>
      d.success === false ? { ok: false, error: "success=false" } : { ok: true, value: { value: d.result } }),
};
