import type { Request, Response } from "express";
import type { ReconciledPrice } from "../market/types";

export function createLatestHandler(getLatest: () => ReconciledPrice | undefined) {
  return function latestHandler(_req: Request, res: Response) {
    const latest = getLatest();
    if (!latest) return res.status(404).json({ error: "no_price_yet" });
    return res.json({
      price_usd: latest.chosenValue,
      source: latest.chosenSource,
      spread_pct: latest.spreadPct,
      mismatch: latest.mismatch,
      as_of: new Date(latest.passTimestamp).toISOString(),
      sources: latest.candidates.map(q => ({ name: q.sourceId, price: q.value, observed_at: new Date(q.observedAt).toISOString() })),
      rejected: latest.rejected,
    });
  };
}
