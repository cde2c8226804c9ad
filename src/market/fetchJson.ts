import { fetch } from "undici";
import { FetchError, errorMessage } from "./errors";
import { deepFreeze } from "./types";

export const DEFAULT_TIMEOUT_MS = 10_000;
const USER_AGENT = "Mozilla/5.0 (compatible; gold-spot-reconciler/0.1)";

const CACHE = new Map<string, { body: unknown; receivedAt: number }>();

export type FetchJsonOptions = {
  sourceId: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** 0 (default) disables the response cache */
  cacheTtlMs?: number;
  signal?: AbortSignal;
};

export type JsonResponse = { body: unknown; receivedAt: number; cached: boolean };

export async function fetchJson(url: string, opts: FetchJsonOptions): Promise<JsonResponse> {
  const { sourceId, cacheTtlMs = 0, timeoutMs = DEFAULT_TIMEOUT_MS } = opts;
  const cached = CACHE.get(url);
  if (cacheTtlMs > 0 && cached && Date.now() - cached.receivedAt < cacheTtlMs) {
    return { ...cached, cached: true };
  }
  if (opts.signal?.aborted) throw new FetchError(sourceId, "aborted", "request cancelled");

  const ac = new AbortController();
  let timedOut = false;
  const to = setTimeout(() => { timedOut = true; ac.abort(); }, timeoutMs);
  const onAbort = () => ac.abort();
  opts.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const res = await fetch(url, {
      signal: ac.signal,
      headers: { "user-agent": USER_AGENT, "accept": "application/json", ...opts.headers },
    });
    const text = await res.text();
    if (!res.ok) {
      throw new FetchError(sourceId, "http_status", `HTTP ${res.status}${text ? `: ${text.slice(0, 120)}` : ""}`, { status: res.status });
    }
    let body: unknown;
    try {
      // frozen: cached bodies are shared by every pass that reads them
      body = deepFreeze(JSON.parse(text));
    } catch (e) {
      throw new FetchError(sourceId, "bad_payload", "response is not JSON", { cause: e });
    }
    const receivedAt = Date.now();
    if (cacheTtlMs > 0) CACHE.set(url, { body, receivedAt });
    return { body, receivedAt, cached: false };
  } catch (e) {
    if (e instanceof FetchError) throw e;
    if (timedOut) throw new FetchError(sourceId, "timeout", `timed out after ${timeoutMs}ms`, { cause: e });
    if (opts.signal?.aborted) throw new FetchError(sourceId, "aborted", "request cancelled", { cause: e });
    throw new FetchError(sourceId, "network", errorMessage(e), { cause: e });
  } finally {
    clearTimeout(to);
    opts.signal?.removeEventListener("abort", onAbort);
  }
}

export function clearResponseCache() {
  CACHE.clear();
}
