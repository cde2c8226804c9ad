import { sma, volatilityPct } from "./indicators";

export const DEFAULT_FORECAST_LAG = 10;
export const DEFAULT_FORECAST_MIN_SAMPLES = 30;
export const DEFAULT_FORECAST_WINDOW = 500;
const DEFAULT_RIDGE = 1e-3;
const EPS = 1e-12;

export type ForecastMethod = "least-squares" | "none";

export type Forecast = {
  /** expected (next / current) - 1 */
  predictedReturn: number;
  predictedPrice: number;
  method: ForecastMethod;
  /** training rows the model was fitted on */
  samples: number;
};

export type ForecastOptions = {
  /** prices per feature window, the current one included */
  lag?: number;
  smaPeriod?: number;
  /** fewer training rows than this and the forecast is a flat "none" */
  minSamples?: number;
  /** L2 penalty per training row */
  ridge?: number;
};

export type LinearModel = {
  intercept: number;
  weights: number[];
  mean: number[];
  scale: number[];
};

/**
 * Features of a price window ending at the current price: every earlier price
 * relative to the current one, the SMA gap and the relative volatility.
 */
export function featureRow(window: readonly number[], smaPeriod: number): number[] {
  const current = window[window.length - 1];
  const lags = window.slice(0, -1).map(p => p / current - 1);
  const avg = sma(window, smaPeriod) ?? current;
  const vol = (volatilityPct(window) ?? 0) / 100;
  return [...lags, avg / current - 1, vol];
}

/** Rows for every window that has a known next price; the target is the next return. */
export function trainingSet(prices: readonly number[], lag: number, smaPeriod: number) {
  const x: number[][] = [];
  const y: number[] = [];
  for (let i = lag - 1; i < prices.length - 1; i++) {
    x.push(featureRow(prices.slice(i - lag + 1, i + 1), smaPeriod));
    y.push(prices[i + 1] / prices[i] - 1);
  }
  return { x, y };
}

const mean = (xs: readonly number[]) => xs.reduce((s, v) => s + v, 0) / xs.length;

// Gauss-Jordan with partial pivoting; a column without a usable pivot gets weight 0
function solve(a: number[][], b: number[]): number[] {
  const n = b.length;
  const m = a.map((row, i) => [...row, b[i]]);
  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) if (Math.abs(m[r][col]) > Math.abs(m[pivot][col])) pivot = r;
    [m[col], m[pivot]] = [m[pivot], m[col]];
    if (Math.abs(m[col][col]) < EPS) continue;
    for (let r = 0; r < n; r++) {
      if (r === col) continue;
      const f = m[r][col] / m[col][col];
      for (let c = col; c <= n; c++) m[r][c] -= f * m[col][c];
    }
  }
  return m.map((row, i) => (Math.abs(row[i]) < EPS ? 0 : row[n] / row[i]));
}

/** Ridge regression on standardized features. Constant features are ignored. */
export function fitLinear(x: readonly number[][], y: readonly number[], ridge = DEFAULT_RIDGE): LinearModel {
  const n = x.length;
  const d = x[0]?.length ?? 0;
  const mu = Array.from({ length: d }, (_, j) => mean(x.map(r => r[j])));
  const scale = Array.from({ length: d }, (_, j) => {
    const sd = Math.sqrt(mean(x.map(r => (r[j] - mu[j]) ** 2)));
    return sd > EPS ? sd : 0;
  });
  const z = x.map(r => r.map((v, j) => (scale[j] ? (v - mu[j]) / scale[j] : 0)));
  const yMean = mean(y);

  const a = Array.from({ length: d }, (_, i) =>
    Array.from({ length: d }, (_, j) => z.reduce((s, r) => s + r[i] * r[j], 0) + (i === j ? ridge * n : 0)),
  );
  const b = Array.from({ length: d }, (_, i) => z.reduce((s, r, k) => s + r[i] * (y[k] - yMean), 0));
  return { intercept: yMean, weights: solve(a, b), mean: mu, scale };
}

export function predict(model: LinearModel, row: readonly number[]): number {
  return row.reduce(
    (s, v, j) => s + (model.scale[j] ? model.weights[j] * ((v - model.mean[j]) / model.scale[j]) : 0),
    model.intercept,
  );
}

/**
 * Estimates the next price from the price history (oldest first, current last).
 * Undefined until there is a full window; a flat "none" forecast until there
 * are `minSamples` training rows.
 */
export function forecastNext(prices: readonly number[], opts: ForecastOptions = {}): Forecast | undefined {
  const { lag = DEFAULT_FORECAST_LAG, smaPeriod = 5, minSamples = DEFAULT_FORECAST_MIN_SAMPLES, ridge } = opts;
  if (lag < 1 || prices.length < lag) return undefined;
  const current = prices[prices.length - 1];
  const { x, y } = trainingSet(prices, lag, smaPeriod);
  if (x.length < Math.max(1, minSamples)) {
    return { predictedReturn: 0, predictedPrice: current, method: "none", samples: x.length };
  }
  const r = predict(fitLinear(x, y, ridge), featureRow(prices.slice(-lag), smaPeriod));
  return { predictedReturn: r, predictedPrice: current * (1 + r), method: "least-squares", samples: x.length };
}
