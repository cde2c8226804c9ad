import express from "express";
import type { ReconciledPrice } from "./market/types";
import { createLatestHandler } from "./routes/gold.latest";
import { createProbeHandler, type ProbeDeps } from "./routes/gold.probe";

export type AppDeps = ProbeDeps & { getLatest: () => ReconciledPrice | undefined };

export function createApp(deps: AppDeps) {
  const app = express();
  app.disable("x-powered-by");
  app.get("/api/health", (_req, res) => res.json({ ok: true }));
  app.get("/api/gold/latest", createLatestHandler(deps.getLatest));
  app.get("/api/gold/probe", createProbeHandler(deps));
  app.use((_req, res) => res.status(404).json({ error: "not_found" }));
  return app;
}
