import type { JustifyContent } from "../types.js";
import type { ClampRecorder } from "./clamps.js";
import { allocateByWeight, splitEvenly, unitShare } from "./distribute.js";

/** Sizing hints of one item after normalization; `basis < 0` means auto. */
export type FlexSizing = Readonly<{
  grow: number;
  shrink: number;
  basis: number;
}>;

/**
 * Starting main-axis size of each item.
 *
 * A positive basis is used as is and a zero basis is zero. Auto items get
 * `availableMain / itemCount` (every item counts, not only auto ones); the
 * `availableMain mod itemCount` leftover adds one cell to each of the first
 * auto items, so an all-auto list fills `availableMain` exactly.
 */
export function resolveBases(items: readonly FlexSizing[], availableMain: number): number[] {
  const n = items.length;
  const out = new Array<number>(n).fill(0);
  if (n === 0) return out;

  const autoShares = splitEvenly(availableMain, n);
  let autoSeen = 0;
  for (let i = 0; i < n; i++) {
    const it = items[i];
    if (!it) continue;
    if (it.basis < 0) {
      out[i] = autoShares[autoSeen] ?? 0;
      autoSeen++;
    } else {
      out[i] = it.basis;
    }
  }
  return out;
}

/** Add `remaining` cells by grow weight. Truncation loss is accepted. */
export function growSizes(
  sizes: readonly number[],
  items: readonly FlexSizing[],
  remaining: number,
): number[] {
  const extra = allocateByWeight(
    remaining,
    items.map((it) => it.grow),
  );
  return sizes.map((s, i) => s + (extra[i] ?? 0));
}

/**
 * Remove `overflow` cells by shrink weight.
 *
 * Each item first loses `⌊overflow · w / Σw⌋`; the cells lost to truncation
 * are then taken one at a time from the earliest shrinkable items. No item
 * goes below zero; an item whose share exceeded its size is recorded as a
 * `shrink-floor` clamp.
 */
export function shrinkSizes(
  sizes: readonly number[],
  items: readonly FlexSizing[],
  overflow: number,
  recorder: ClampRecorder,
): number[] {
  const out = [...sizes];
  const weights = items.map((it) => it.shrink);
  const reductions = allocateByWeight(overflow, weights);

  let removed = 0;
  for (let i = 0; i < out.length; i++) {
    const cur = out[i] ?? 0;
    const want = reductions[i] ?? 0;
    const take = Math.min(want, cur);
    if (want > cur) {
      recorder.record("shrink-floor", `item ${i} needed to shrink by ${want} but had ${cur} cells`);
    }
    out[i] = cur - take;
    removed += take;
  }

  let left = Math.max(0, Math.floor(overflow)) - removed;
  let progressed = true;
  while (left > 0 && progressed) {
    progressed = false;
    for (let i = 0; i < out.length && left > 0; i++) {
      const cur = out[i] ?? 0;
      if ((weights[i] ?? 0) <= 0 || cur <= 0) continue;
      out[i] = cur - 1;
      left--;
      progressed = true;
    }
  }
  return out;
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/**
 * Main-axis sizes for items already sorted by `order`: basis, then grow or
 * shrink against `availableMain`. Sizes are never negative.
 */
export function resolveMainSizes(
  items: readonly FlexSizing[],
  availableMain: number,
  recorder: ClampRecorder,
): number[] {
  const bases = resolveBases(items, availableMain);
  const remaining = availableMain - sum(bases);

  if (remaining > 0 && sum(items.map((it) => it.grow)) > 0) {
    return growSizes(bases, items, remaining);
  }
  if (remaining < 0 && sum(items.map((it) => it.shrink)) > 0) {
    return shrinkSizes(bases, items, -remaining, recorder);
  }
  return bases;
}

/** Blank cells before the first item. */
export function computeJustifyStartOffset(
  justify: JustifyContent,
  extra: number,
  itemCount: number,
): number {
  if (extra <= 0 || itemCount <= 0) return 0;
  if (justify === "end") return extra;
  if (justify === "center") return Math.floor(extra / 2);
  if (justify === "space-evenly") return unitShare(extra, itemCount + 1, 0);
  if (justify === "space-around") return unitShare(extra, itemCount * 2, 0);
  return 0;
}

/** Extra blank cells (on top of `gap`) between item `boundary` and `boundary + 1`. */
export function computeJustifyExtraGap(
  justify: JustifyContent,
  extra: number,
  itemCount: number,
  boundary: number,
): number {
  if (extra <= 0) return 0;
  if (itemCount <= 1) return 0;
  if (boundary < 0 || boundary >= itemCount - 1) return 0;

  if (justify === "space-between") {
    return unitShare(extra, itemCount - 1, boundary);
  }
  if (justify === "space-evenly") {
    return unitShare(extra, itemCount + 1, boundary + 1);
  }
  if (justify === "space-around") {
    const before = unitShare(extra, itemCount * 2, boundary * 2 + 1);
    const after = unitShare(extra, itemCount * 2, boundary * 2 + 2);
    return before + after;
  }
  return 0;
}
