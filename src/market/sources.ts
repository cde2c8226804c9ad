import { logger } from "../logger";
import { FetchError, errorMessage } from "./errors";
import { DEFAULT_TIMEOUT_MS, fetchJson } from "./fetchJson";
import { PROVIDERS, type Credentials, type ProviderDef } from "./providers";
import type { SourceEntry } from "./resolve";
import { err, ok, type SourceAdapter } from "./types";

export type SourceSettings = {
  credentials?: Credentials;
  /** used when the registry entry has no timeout_ms of its own */
  timeoutMs?: number;
  cacheTtlMs?: number;
};

/** Wraps one provider into an adapter that reports every failure as a FetchError value. */
export function createSource(entry: SourceEntry, provider: ProviderDef, settings: SourceSettings = {}): SourceAdapter {
  const id = entry.id;
  const key = provider.credential ? settings.credentials?.[provider.credential] : undefined;
  const timeoutMs = entry.timeout_ms ?? settings.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  return {
    id,
    async fetchQuote(signal) {
      try {
        const req = provider.request(entry.url, key);
        const res = await fetchJson(req.url, { sourceId: id, headers: req.headers, timeoutMs, cacheTtlMs: settings.cacheTtlMs, signal });
        const parsed = provider.parse(res.body);
        if (!parsed.ok) return err(new FetchError(id, "bad_payload", parsed.error));
        return ok({
          sourceId: id,
          value: parsed.value.value,
          observedAt: parsed.value.observedAt ?? res.receivedAt,
          rawPayload: res.body,
        });
      } catch (e) {
        return err(e instanceof FetchError ? e : new FetchError(id, "adapter_fault", errorMessage(e), { cause: e }));
      }
    },
  };
}

/** Builds adapters for the resolved entries, skipping those whose credential is not configured. */
export function buildSources(entries: readonly SourceEntry[], settings: SourceSettings = {}): SourceAdapter[] {
  const adapters: SourceAdapter[] = [];
  for (const entry of entries) {
    const provider = PROVIDERS.get(entry.id);
    if (!provider) {
      logger.warn("No provider implementation for registry entry; skipping", { source: entry.id });
      continue;
    }
    if (provider.credential && !settings.credentials?.[provider.credential]) {
      logger.warn("Source needs a key that is not configured; skipping", { source: entry.id, credential: provider.credential });
      continue;
    }
    adapters.push(createSource(entry, provider, settings));
  }
  return adapters;
}
