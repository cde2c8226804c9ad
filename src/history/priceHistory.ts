import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../logger";
import type { ReconciledPrice } from "../market/types";

export const HISTORY_HEADER = "timestamp,price,source,spread_pct,mismatch,sources,predicted";
const LEGACY_COLUMNS = 6;

export type HistoryRow = {
  timestamp: string;
  price: number;
  source: string;
  spreadPct: number;
  mismatch: boolean;
  /** "id=value" pairs joined by ";" */
  sources: string;
  /** next price estimated during that pass, when there was one */
  predicted?: number;
};

// fs errors can come from another realm under jest, so no instanceof Error here
const isMissing = (e: unknown) => typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";

const trimNumber = (n: number, digits: number) => String(Number(n.toFixed(digits)));

export function toCsvLine(p: ReconciledPrice, predicted?: number): string {
  return [
    new Date(p.passTimestamp).toISOString(),
    trimNumber(p.chosenValue, 4),
    p.chosenSource,
    trimNumber(p.spreadPct, 4),
    String(p.mismatch),
    p.candidates.map(q => `${q.sourceId}=${trimNumber(q.value, 4)}`).join(";"),
    predicted === undefined ? "" : trimNumber(predicted, 4),
  ].join(",");
}

export function parseCsvLine(line: string): HistoryRow | null {
  const cols = line.split(",");
  // rows written before the predicted column have six fields
  if (cols.length !== LEGACY_COLUMNS && cols.length !== LEGACY_COLUMNS + 1) return null;
  const [timestamp, price, source, spread, mismatch, sources, predicted = ""] = cols;
  const row: HistoryRow = { timestamp, price: Number(price), source, spreadPct: Number(spread), mismatch: mismatch === "true", sources };
  if (!Number.isFinite(row.price) || row.price <= 0 || Number.isNaN(Date.parse(timestamp))) return null;
  if (predicted) {
    const value = Number(predicted);
    if (!Number.isFinite(value)) return null;
    row.predicted = value;
  }
  return row;
}

/** Append-only CSV log of reconciled prices. */
export class PriceHistory {
  constructor(readonly file: string) {}

  static inDir(dataDir: string) {
    return new PriceHistory(path.join(dataDir, "price_history.csv"));
  }

  async append(p: ReconciledPrice, predicted?: number) {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const header = !(await this.exists());
    await fs.appendFile(this.file, `${header ? `${HISTORY_HEADER}\n` : ""}${toCsvLine(p, predicted)}\n`, "utf-8");
  }

  /** Rows oldest first; the last `limit` when given. Malformed lines are skipped. */
  async load(limit?: number): Promise<HistoryRow[]> {
    let text: string;
    try {
      text = await fs.readFile(this.file, "utf-8");
    } catch (e) {
      if (isMissing(e)) return [];
      throw e;
    }
    const rows: HistoryRow[] = [];
    const lines = text.split(/\r?\n/).filter(Boolean);
    for (const line of lines.slice(lines[0]?.startsWith("timestamp,") ? 1 : 0)) {
      const row = parseCsvLine(line);
      if (row) rows.push(row);
      else logger.debug("Skipping malformed history line", { file: this.file, line });
    }
    return limit === undefined ? rows : rows.slice(-limit);
  }

  async recentPrices(limit: number): Promise<number[]> {
    return (await this.load(limit)).map(r => r.price);
  }

  private async exists() {
    try {
      await fs.access(this.file);
      return true;
    } catch (e) {
      if (isMissing(e)) return false;
      throw e;
    }
  }
}
