import type { Request, Response } from "express";
import { logger } from "../logger";
import { fetchGoldSpot, type GoldSpotOptions, type GoldSpotPass } from "../market";
import { errorMessage } from "../market/errors";
import { UnknownSourceError } from "../market/resolve";

export type ProbeDeps = {
  spot: Omit<GoldSpotOptions, "previous" | "signal" | "now">;
  fetchSpot?: (opt: GoldSpotOptions) => Promise<GoldSpotPass>;
};

/** GET /api/gold/probe?sources=a,b&primary=x: one live pass, nothing stored or sent. */
export function createProbeHandler(deps: ProbeDeps) {
  const fetchSpot = deps.fetchSpot ?? fetchGoldSpot;
  return async function probeHandler(req: Request, res: Response) {
    try {
      const sources = String(req.query.sources || "")
        .split(",")
        .map(s => s.trim())
        .filter(Boolean);
      const primary = String(req.query.primary || "").trim();
      const pass = await fetchSpot({
        ...deps.spot,
        sources: sources.length ? sources : deps.spot.sources,
        primarySource: primary || deps.spot.primarySource,
      });
      const resolved = { sources: pass.sources, primary: pass.primarySource ?? null };
      if (!pass.result.ok) {
        return res.status(503).json({ resolved, error: pass.result.error.code, rejected: pass.result.error.rejected });
      }
      return res.json({ resolved, result: pass.result.value });
    } catch (e) {
      if (e instanceof UnknownSourceError) return res.status(400).json({ error: e.message });
      logger.error("Gold probe error", { error: errorMessage(e) });
      return res.status(500).json({ error: errorMessage(e) });
    }
  };
}
