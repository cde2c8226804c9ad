import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const SourceEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  aliases: z.array(z.string()).default([]),
  url: z.string().url(),
  kind: z.enum(["spot", "futures", "fx"]),
  timeout_ms: z.number().int().positive().optional(),
});
const RegistrySchema = z.object({ sources: z.array(SourceEntrySchema).min(1) });

export type SourceEntry = z.infer<typeof SourceEntrySchema>;

const defaultRegistryPath = path.resolve(process.cwd(), "source_registry.json");
let REGISTRY: { path: string; entries: SourceEntry[] } | null = null;

export function loadRegistry(registryPath = defaultRegistryPath): SourceEntry[] {
  if (!REGISTRY || REGISTRY.path !== registryPath) {
    const parsed = RegistrySchema.parse(JSON.parse(fs.readFileSync(registryPath, "utf-8")));
    REGISTRY = { path: registryPath, entries: parsed.sources };
  }
  return REGISTRY.entries;
}

// Normalize source names: trim, lowercase, drop spaces, map underscores and unicode dashes to '-'
export const normalize = (s: string) =>
  s
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "")
    .replace(/[_\u2010\u2011\u2012\u2013\u2014\u2015\u2212\uFF0D]/g, "-");

export class UnknownSourceError extends Error {
  readonly code = "unknown_source";
  constructor(readonly input: string) {
    super(`unknown_source: ${input}`);
    this.name = "UnknownSourceError";
  }
}

function findEntry(reg: SourceEntry[], name: string) {
  return reg.find(x => [x.id, x.name, ...x.aliases].map(normalize).includes(name));
}

/** Maps names or aliases ("GoldAPI.io", "yahoo") to registry entries, in order, without duplicates. */
export function resolveSources(input: string | readonly string[], registryPath?: string): SourceEntry[] {
  const names = (typeof input === "string" ? input.split(",") : input).map(normalize).filter(Boolean);
  const reg = loadRegistry(registryPath);
  const out: SourceEntry[] = [];
  for (const name of names) {
    const item = findEntry(reg, name);
    if (!item) throw new UnknownSourceError(name);
    if (!out.includes(item)) out.push(item);
  }
  return out;
}

export function resolveSourceId(input: string, registryPath?: string): string {
  const name = normalize(input);
  const item = findEntry(loadRegistry(registryPath), name);
  if (!item) throw new UnknownSourceError(name);
  return item.id;
}
