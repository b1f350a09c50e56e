// ─── Interpolation ───────────────────────────────────────────────────────────

/**
 * Linear interpolation between (x0, y0) and (x1, y1), clamped to the end
 * values outside [x0, x1].
 */
export function lerp(x: number, x0: number, y0: number, x1: number, y1: number): number {
  if (x1 === x0) return y0;
  const t = (x - x0) / (x1 - x0);
  if (t <= 0) return y0;
  if (t >= 1) return y1;
  return y0 + t * (y1 - y0);
}

/**
 * Piecewise-linear lookup over ascending breakpoints, clamped at both ends.
 */
export function lerpTable(x: number, xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n === 0) return 0;
  const x0 = xs[0] ?? 0;
  const y0 = ys[0] ?? 0;
  if (n === 1 || x <= x0) return y0;

  for (let i = 1; i < n; i++) {
    const xa = xs[i - 1] ?? 0;
    const xb = xs[i] ?? 0;
    if (x <= xb) {
      return lerp(x, xa, ys[i - 1] ?? 0, xb, ys[i] ?? 0);
    }
  }
  return ys[n - 1] ?? 0;
}

// ─── Rounding ────────────────────────────────────────────────────────────────

/** Round every finite number inside a JSON-like value to `digits` significant figures. */
export function roundForReport<T>(value: T, digits: number = 6): T {
  return JSON.parse(
    JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "number" && Number.isFinite(v) && v !== 0 ? Number(v.toPrecision(digits)) : v,
    ),
  );
}
