import { z } from "zod";
import type { Result } from "../types";

export type ParsedPrice = { value: number; observedAt?: number };
export type ParseResult = Result<ParsedPrice, string>;

export type Credentials = { goldApiKey?: string; metalsApiKey?: string };

export interface ProviderDef {
  readonly id: string;
  /** credential the provider cannot be called without */
  readonly credential?: keyof Credentials;
  request(url: string, key?: string): { url: string; headers?: Record<string, string> };
  parse(payload: unknown): ParseResult;
}

/** JSON number, or a numeric string such as "2401.55" */
export const numeric = z.union([z.number(), z.string().trim().min(1).transform(Number)]).pipe(z.number());

/** Accepts epoch seconds or epoch ms. */
export const toEpochMs = (n: number) => (n < 1e12 ? n * 1000 : n);

export const epochTime = numeric.transform(toEpochMs).optional().catch(undefined);

export const isoTime = z
  .string()
  .transform(s => Date.parse(s))
  .pipe(z.number())
  .optional()
  .catch(undefined);

export function describeIssues(error: z.ZodError) {
  return error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/** Runs a zod schema over the payload and maps it to a price, or explains why it could not. */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  pick: (data: z.output<S>) => ParseResult,
): ParseResult {
  const r = schema.safeParse(payload);
  if (!r.success) return { ok: false, error: describeIssues(r.error) };
  return pick(r.data);
}
