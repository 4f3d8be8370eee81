/**
 * packages/core/src/layout/engine/clamps.ts — Recorded layout repairs.
 *
 * Why: Layout never fails. Whenever an input is repaired (a size raised to a
 * minimum, a negative weight zeroed, an item squeezed to nothing) the repair
 * is recorded so tests and dev-mode warnings can see it.
 */

export type LayoutClampKind =
  /** Container main size raised to the configured minimum. */
  | "container-min"
  /** Cross size raised to one cell. */
  | "cross-min"
  /** Padding, margin and gaps consumed more than the container has. */
  | "available-negative"
  /** A negative or fractional size/weight/index normalized. */
  | "input-normalized"
  /** Shrinking would have taken an item below zero cells. */
  | "shrink-floor"
  /** Item raised to the container's minimum item size. */
  | "min-item-size"
  /** Items do not fit and were cropped at the end of the main axis. */
  | "overflow"
  /** `wrap` / `wrap-reverse` requested; laid out as `no-wrap`. */
  | "wrap-unsupported"
  /** A grid write outside the matrix was ignored. */
  | "cell-ignored"
  /** A composite layout region was reduced to make the regions fit. */
  | "region-shrunk";

export type LayoutClamp = Readonly<{ kind: LayoutClampKind; detail: string }>;

export class ClampRecorder {
  private readonly entries: LayoutClamp[] = [];

  record(kind: LayoutClampKind, detail: string): void {
    this.entries.push(Object.freeze({ kind, detail }));
  }

  recordAll(clamps: readonly LayoutClamp[]): void {
    for (const c of clamps) this.entries.push(c);
  }

  list(): readonly LayoutClamp[] {
    return Object.freeze([...this.entries]);
  }
}

/**
 * Normalize a cell count to a non-negative integer, recording a clamp when
 * the value had to change.
 */
export function nonNegativeCells(value: number, name: string, recorder: ClampRecorder): number {
  if (!Number.isFinite(value)) {
    recorder.record("input-normalized", `${name}=${String(value)} treated as 0`);
    return 0;
  }
  const n = Math.floor(value);
  if (n < 0) {
    recorder.record("input-normalized", `${name}=${value} clamped to 0`);
    return 0;
  }
  if (n !== value) recorder.record("input-normalized", `${name}=${value} floored to ${n}`);
  return n;
}

/** Rendered output plus every repair made while producing it. */
export type LayoutReport = Readonly<{ output: string; clamps: readonly LayoutClamp[] }>;
