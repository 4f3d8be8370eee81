/**
 * packages/core/src/layout/recipes/dashboardLayout.ts — Header / main / footer.
 *
 * Header and footer are as tall as their text (newline count + 1), clamped
 * to the caller's bounds. The two gaps come off the height first. When the
 * three regions do not fit, the header gives up rows first, then the footer;
 * main always takes what is left.
 */

import { DEFAULT_LAYOUT_CONFIG } from "../../config.js";
import { ClampRecorder, type LayoutClamp, nonNegativeCells } from "../engine/clamps.js";
import { FlexContainer } from "../flexContainer.js";
import { resolveSpacingValue } from "../spacing-scale.js";
import { countLines } from "../textMeasure.js";
import type { RecipeOptions } from "./types.js";

export type DashboardOptions = RecipeOptions &
  Readonly<{
    minHeaderHeight?: number;
    maxHeaderHeight?: number;
    minFooterHeight?: number;
    maxFooterHeight?: number;
  }>;

export type DashboardGeometry = Readonly<{
  headerHeight: number;
  mainHeight: number;
  footerHeight: number;
  clamps: readonly LayoutClamp[];
}>;

function cells(n: number | undefined, fallback: number): number {
  if (n === undefined || !Number.isFinite(n)) return fallback;
  return Math.max(0, Math.floor(n));
}

function clampRegion(
  lines: number,
  min: number,
  max: number,
  name: string,
  recorder: ClampRecorder,
): number {
  const lo = Math.min(min, max);
  if (lines > max) {
    recorder.record("region-shrunk", `${name} ${lines} lines clamped to max ${max}`);
    return max;
  }
  if (lines < lo) return lo;
  return lines;
}

/**
 * Region heights for a dashboard `height` rows tall. The three regions plus
 * two `options.gap` rows sum to `height` whenever the gaps fit.
 */
export function dashboardGeometry(
  height: number,
  header: string,
  footer: string,
  options: DashboardOptions = {},
): DashboardGeometry {
  const recorder = new ClampRecorder();
  const gap = nonNegativeCells(resolveSpacingValue(options.gap), "gap", recorder);
  const outer = cells(height, 0);
  if (2 * gap > outer) {
    recorder.record("available-negative", `gaps ${2 * gap} exceed dashboard height ${outer}`);
  }
  const total = Math.max(0, outer - 2 * gap);

  let headerHeight = clampRegion(
    countLines(header),
    cells(options.minHeaderHeight, 0),
    cells(options.maxHeaderHeight, total),
    "header",
    recorder,
  );
  let footerHeight = clampRegion(
    countLines(footer),
    cells(options.minFooterHeight, 0),
    cells(options.maxFooterHeight, total),
    "footer",
    recorder,
  );

  let deficit = headerHeight + footerHeight - total;
  if (deficit > 0) {
    const fromHeader = Math.min(deficit, headerHeight);
    headerHeight -= fromHeader;
    deficit -= fromHeader;
    const fromFooter = Math.min(deficit, footerHeight);
    footerHeight -= fromFooter;
    recorder.record(
      "region-shrunk",
      `header and footer shrunk by ${fromHeader} and ${fromFooter} to fit height ${total}`,
    );
  }

  return Object.freeze({
    headerHeight,
    mainHeight: total - headerHeight - footerHeight,
    footerHeight,
    clamps: recorder.list(),
  });
}

export function dashboardLayout(
  width: number,
  height: number,
  header: string,
  main: string,
  footer: string,
  options: DashboardOptions = {},
): string {
  const config = options.config ?? DEFAULT_LAYOUT_CONFIG;
  const effectiveHeight = Math.max(cells(height, 0), config.minColumnHeight);
  const geometry = dashboardGeometry(effectiveHeight, header, footer, options);

  const fixed = { flexGrow: 0, flexShrink: 0 } as const;
  return new FlexContainer("column", width, effectiveHeight, config)
    .setGap(options.gap ?? 0)
    .addChild(header, { ...fixed, flexBasis: geometry.headerHeight })
    .addChild(main, { ...fixed, flexBasis: geometry.mainHeight })
    .addChild(footer, { ...fixed, flexBasis: geometry.footerHeight })
    .render();
}
