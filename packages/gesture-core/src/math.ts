export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Earliest timestamp still inside a window ending at `now`, never below 0. */
export function windowStart(now: number, windowMs: number): number {
  return now > windowMs ? now - windowMs : 0;
}

export function mean(values: number[]): number {
  if (!values.length) return 0;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}
