import { z } from "zod";
import { epochTime, numeric, parseWith, type ProviderDef } from "./schema";

const GoldApiIoResponse = z.object({
  price: numeric,
  timestamp: epochTime,
  metal: z.string().optional(),
  currency: z.string().optional(),
});

export const goldApiIo: ProviderDef = {
  id: "goldapi-io",
  credential: "goldApiKey",
  request: (url, key) => ({ url, headers: key ? { "x-access-token": key } : undefined }),
  parse: payload =>
    parseWith(GoldApiIoResponse, payload, d => {
      if (d.currency && d.currency !== "USD") return { ok: false, error: `unexpected currency ${d.currency}` };
      return { ok: true, value: { value: d.price, observedAt: d.timestamp } };
    }),
};
