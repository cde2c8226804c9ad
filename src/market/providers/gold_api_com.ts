import { z } from "zod";
import { isoTime, numeric, parseWith, type ProviderDef } from "./schema";

// { "name": "Gold", "price": 2401.5, "symbol": "XAU", "updatedAt": "2024-05-01T12:00:00Z" }
const GoldApiComResponse = z.object({
  price: numeric,
  updatedAt: isoTime,
});

export const goldApiCom: ProviderDef = {
  id: "gold-api-com",
  request: url => ({ url }),
  parse: payload =>
    parseWith(GoldApiComResponse, payload, d => ({ ok: true, value: { value: d.price, observedAt: d.updatedAt } })),
};
