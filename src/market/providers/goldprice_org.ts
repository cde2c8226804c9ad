import { z } from "zod";
import { epochTime, numeric, parseWith, type ProviderDef } from "./schema";

const GoldPriceOrgResponse = z.object({
  ts: epochTime,
  items: z.array(z.object({ curr: z.string().optional(), xauPrice: numeric })).min(1),
});

export const goldPriceOrg: ProviderDef = {
  id: "goldprice-org",
  request: url => ({ url }),
  parse: payload =>
    parseWith(GoldPriceOrgResponse, payload, d => {
      const item = d.items.find(i => i.curr === "USD") ?? d.items[0];
      if (item.curr && item.curr !== "USD") return { ok: false, error: `unexpected currency ${item.curr}` };
      return { ok: true, value: { value: item.xauPrice, observedAt: d.ts } };
    }),
};
