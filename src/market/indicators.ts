/** Simple moving average of the last `period` values (all of them when fewer). */
export function sma(values: readonly number[], period: number): number | undefined {
  if (!values.length) return undefined;
  const window = values.slice(-Math.max(1, period));
  return window.reduce((s, v) => s + v, 0) / window.length;
}

/** Population standard deviation relative to the latest value, in percent. */
export function volatilityPct(values: readonly number[]): number | undefined {
  if (values.length < 2) return undefined;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / values.length;
  return (Math.sqrt(variance) / values[values.length - 1]) * 100;
}

export function changePct(from: number, to: number): number {
  return ((to - from) / from) * 100;
}
