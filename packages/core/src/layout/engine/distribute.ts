/**
 * Integer space division. All layout arithmetic goes through these helpers so
 * rounding is decided in one place: remainders always go to the earliest slots.
 */

function cells(total: number): number {
  return Number.isFinite(total) ? Math.max(0, Math.floor(total)) : 0;
}

/**
 * Split `total` into `count` equal shares; the `total mod count` leftover
 * cells go one each to the first slots.
 */
export function splitEvenly(total: number, count: number): number[] {
  const n = Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0;
  const out = new Array<number>(n).fill(0);
  if (n === 0) return out;
  const t = cells(total);
  const base = Math.floor(t / n);
  const rem = t - base * n;
  for (let i = 0; i < n; i++) out[i] = base + (i < rem ? 1 : 0);
  return out;
}

/**
 * Floor-proportional allocation of `total` by `weights`. Truncation loss is
 * not redistributed, so the result may sum to less than `total`.
 * Non-positive and non-finite weights receive nothing.
 */
export function allocateByWeight(total: number, weights: readonly number[]): number[] {
  const out = new Array<number>(weights.length).fill(0);
  const t = cells(total);
  if (t === 0) return out;

  let totalWeight = 0;
  for (const w of weights) {
    if (Number.isFinite(w) && w > 0) totalWeight += w;
  }
  if (totalWeight <= 0) return out;

  for (let i = 0; i < weights.length; i++) {
    const w = weights[i] ?? 0;
    if (!Number.isFinite(w) || w <= 0) continue;
    out[i] = Math.floor((t * w) / totalWeight);
  }
  return out;
}

/** Size of unit `unitIndex` when `extra` cells are split into `totalUnits` units. */
export function unitShare(extra: number, totalUnits: number, unitIndex: number): number {
  if (totalUnits <= 0) return 0;
  const e = cells(extra);
  const base = Math.floor(e / totalUnits);
  const rem = e - base * totalUnits;
  return base + (unitIndex < rem ? 1 : 0);
}
