import { reconcile } from "./reconcile";
import { resolveSourceId, resolveSources } from "./resolve";
import { buildSources, type SourceSettings } from "./sources";
import type { ReconcileOptions } from "./types";

export const DEFAULT_SOURCES = [
  "gold-api-com",
  "goldprice-org",
  "metals-live",
  "exchangerate-host",
  "yahoo-futures",
  "goldapi-io",
] as const;

export type GoldSpotOptions = SourceSettings &
  ReconcileOptions & {
    sources?: string | readonly string[];
    registryPath?: string;
  };

/** One reconciliation pass over the configured sources. Throws only on an unknown source name. */
export async function fetchGoldSpot(opt: GoldSpotOptions = {}) {
  const entries = resolveSources(opt.sources ?? DEFAULT_SOURCES, opt.registryPath);
  const primarySource = opt.primarySource ? resolveSourceId(opt.primarySource, opt.registryPath) : undefined;
  const adapters = buildSources(entries, opt);
  const result = await reconcile(adapters, { ...opt, primarySource });
  return { sources: adapters.map(a => a.id), primarySource, result };
}

export type GoldSpotPass = Awaited<ReturnType<typeof fetchGoldSpot>>;
