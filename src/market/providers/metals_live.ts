import { z } from "zod";
import { epochTime, numeric, type ProviderDef } from "./schema";

// Seen shapes: [{ "gold": 2401.5, "timestamp": 1714564800000 }] and [{ "metal": "gold", "price": 2401.5 }]
const patterns = [
  z.object({ gold: numeric, timestamp: epochTime }).transform(d => ({ value: d.gold, observedAt: d.timestamp })),
  z.object({ metal: z.literal("gold"), price: numeric, timestamp: epochTime }).transform(d => ({ value: d.price, observedAt: d.timestamp })),
];

export const metalsLive: ProviderDef = {
  id: "metals-live",
  request: url => ({ url }),
  parse: payload => {
    if (!Array.isArray(payload) || !payload.length) return { ok: false, error: "expected a non-empty array" };
    for (const item of payload) {
      for (const schema of patterns) {
        const r = schema.safeParse(item);
        if (r.success) return { ok: true, value: r.data };
      }
    }
    return { ok: false, error: "no gold entry in response" };
  },
};
