/**
 * packages/core/src/layout/responsive.ts — Terminal-size breakpoint helpers.
 *
 * Everything here is a pure function of the terminal size and the caller's
 * thresholds; there is no module-level viewport state.
 */

import { type BreakpointThresholds, DEFAULT_LAYOUT_CONFIG } from "../config.js";
import { measureTextCells, truncateToCells, truncateWithEllipsis } from "./textMeasure.js";

export type Breakpoint = "small" | "medium" | "large";

export type SpacingPair = Readonly<{ horizontal: number; vertical: number }>;

export type ResponsiveWidth = Readonly<{ width: number; breakpoint: Breakpoint }>;

const DEFAULT_THRESHOLDS = DEFAULT_LAYOUT_CONFIG.breakpoints;

function cells(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

/** `width < small` is small, `width <= medium` is medium, otherwise large. */
export function resolveBreakpoint(
  width: number,
  thresholds: BreakpointThresholds = DEFAULT_THRESHOLDS,
): Breakpoint {
  const w = Number.isFinite(width) ? width : 0;
  if (w < thresholds.small) return "small";
  if (w <= thresholds.medium) return "medium";
  return "large";
}

const WIDTH_INSET: Readonly<Record<Breakpoint, number>> = Object.freeze({
  small: 4,
  medium: 8,
  large: 12,
});

/** Usable content width: the terminal width minus a breakpoint-dependent inset. */
export function responsiveWidth(
  width: number,
  thresholds: BreakpointThresholds = DEFAULT_THRESHOLDS,
): ResponsiveWidth {
  const breakpoint = resolveBreakpoint(width, thresholds);
  return Object.freeze({ width: cells(width - WIDTH_INSET[breakpoint]), breakpoint });
}

const PADDING: Readonly<Record<Breakpoint, SpacingPair>> = Object.freeze({
  small: Object.freeze({ horizontal: 1, vertical: 0 }),
  medium: Object.freeze({ horizontal: 2, vertical: 1 }),
  large: Object.freeze({ horizontal: 3, vertical: 1 }),
});

const MARGIN: Readonly<Record<Breakpoint, SpacingPair>> = Object.freeze({
  small: Object.freeze({ horizontal: 0, vertical: 0 }),
  medium: Object.freeze({ horizontal: 1, vertical: 0 }),
  large: Object.freeze({ horizontal: 2, vertical: 1 }),
});

export function responsivePadding(
  width: number,
  thresholds: BreakpointThresholds = DEFAULT_THRESHOLDS,
): SpacingPair {
  return PADDING[resolveBreakpoint(width, thresholds)];
}

export function responsiveMargin(
  width: number,
  thresholds: BreakpointThresholds = DEFAULT_THRESHOLDS,
): SpacingPair {
  return MARGIN[resolveBreakpoint(width, thresholds)];
}

/** Content height for a terminal `height` rows tall: 2, 4 or 6 rows reserved. */
export function adaptiveHeight(height: number): number {
  const h = Number.isFinite(height) ? Math.floor(height) : 0;
  if (h < 24) return cells(h - 2);
  if (h < 40) return cells(h - 4);
  return cells(h - 6);
}

/**
 * Cut `text` to at most `maxCells` cells, ending in "..." when cut. Limits of
 * three cells or fewer get a hard cut with no ellipsis.
 *
 * @example
 * ```typescript
 * truncateText("session-list", 8) // "sessi..."
 * truncateText("session-list", 3) // "ses"
 * ```
 */
export function truncateText(text: string, maxCells: number): string {
  const max = cells(maxCells);
  if (measureTextCells(text) <= max) return text;
  if (max <= 3) return truncateToCells(text, max);
  return truncateWithEllipsis(text, max, "...");
}
