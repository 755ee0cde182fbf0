export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function roundTo(n: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(n * factor) / factor;
}

/** Arithmetic mean; `fallback` for an empty list */
export function mean(values: readonly number[], fallback = 0): number {
  if (values.length === 0) return fallback;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
