import { z } from "zod";
import { DEFAULT_SOURCES } from "./market";
import { DEFAULT_FORECAST_LAG, DEFAULT_FORECAST_MIN_SAMPLES, DEFAULT_FORECAST_WINDOW } from "./market/forecast";
import { PROVIDERS, type Credentials } from "./market/providers";
import { describeIssues } from "./market/providers/schema";
import { UnknownSourceError, resolveSourceId, resolveSources } from "./market/resolve";

// Blank values in .env files count as unset
const env = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(v => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);

const EnvSchema = z.object({
  DISCORD_WEBHOOK: env(z.string().trim().url().optional()),
  GOLD_API_KEY: env(z.string().trim().optional()),
  METALS_API_KEY: env(z.string().trim().optional()),
  UPDATE_INTERVAL: env(z.coerce.number().int().positive().default(300)),
  DATA_DIR: env(z.string().default("data")),
  SOURCES: env(z.string().default(DEFAULT_SOURCES.join(","))),
  PRIMARY_SOURCE: env(z.string().trim().optional()),
  MISMATCH_THRESHOLD_PCT: env(z.coerce.number().nonnegative().default(0.5)),
  MAX_QUOTE_AGE_MS: env(z.coerce.number().int().nonnegative().default(15 * 60 * 1000)),
  SOURCE_TIMEOUT_MS: env(z.coerce.number().int().positive().default(10_000)),
  QUOTE_CACHE_TTL_MS: env(z.coerce.number().int().nonnegative().default(0)),
  SMA_PERIOD: env(z.coerce.number().int().positive().default(5)),
  FORECAST_LAG: env(z.coerce.number().int().min(2).default(DEFAULT_FORECAST_LAG)),
  FORECAST_MIN_SAMPLES: env(z.coerce.number().int().positive().default(DEFAULT_FORECAST_MIN_SAMPLES)),
  FORECAST_WINDOW: env(z.coerce.number().int().positive().default(DEFAULT_FORECAST_WINDOW)),
  PORT: env(z.coerce.number().int().min(0).max(65535).default(3000)),
  LOG_LEVEL: env(z.enum(["debug", "info", "warn", "error"]).default("info")),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function resolveNames(e: z.output<typeof EnvSchema>, registryPath?: string) {
  const credentials: Credentials = { goldApiKey: e.GOLD_API_KEY, metalsApiKey: e.METALS_API_KEY };
  try {
    const sources = resolveSources(e.SOURCES, registryPath).map(s => s.id);
    if (!sources.length) throw new ConfigError("invalid configuration: SOURCES names no source");
    const usable = sources.filter(id => {
      const provider = PROVIDERS.get(id);
      return provider !== undefined && (!provider.credential || Boolean(credentials[provider.credential]));
    });
    if (!usable.length) throw new ConfigError(`invalid configuration: none of ${sources.join(", ")} can be queried (missing API keys?)`);
    const primarySource = e.PRIMARY_SOURCE === undefined ? undefined : resolveSourceId(e.PRIMARY_SOURCE, registryPath);
    return { sources, primarySource };
  } catch (err) {
    if (err instanceof UnknownSourceError) throw new ConfigError(`invalid configuration: unknown source "${err.input}"`);
    throw err;
  }
}

/** Validates the environment; source names are resolved against the registry. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env, registryPath?: string) {
  const r = EnvSchema.safeParse(source);
  if (!r.success) throw new ConfigError(`invalid configuration: ${describeIssues(r.error)}`);
  const e = r.data;
  const { sources, primarySource } = resolveNames(e, registryPath);
  return {
    discordWebhook: e.DISCORD_WEBHOOK,
    credentials: { goldApiKey: e.GOLD_API_KEY, metalsApiKey: e.METALS_API_KEY },
    updateIntervalMs: e.UPDATE_INTERVAL * 1000,
    dataDir: e.DATA_DIR,
    sources,
    primarySource,
    mismatchThresholdPct: e.MISMATCH_THRESHOLD_PCT,
    maxQuoteAgeMs: e.MAX_QUOTE_AGE_MS,
    sourceTimeoutMs: e.SOURCE_TIMEOUT_MS,
    quoteCacheTtlMs: e.QUOTE_CACHE_TTL_MS,
    smaPeriod: e.SMA_PERIOD,
    forecast: { lag: e.FORECAST_LAG, minSamples: e.FORECAST_MIN_SAMPLES, window: e.FORECAST_WINDOW },
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
