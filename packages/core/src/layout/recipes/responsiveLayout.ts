/**
 * packages/core/src/layout/recipes/responsiveLayout.ts — 1/2/3 column screen.
 *
 * Small terminals get one column, medium two, large three. Sections are dealt
 * round-robin into the columns, so section i lands in column `i mod columns`.
 * Each column is a stacked column container whose output becomes opaque leaf
 * content of the outer row.
 */

import { DEFAULT_LAYOUT_CONFIG } from "../../config.js";
import { FlexContainer } from "../flexContainer.js";
import { type Breakpoint, resolveBreakpoint } from "../responsive.js";
import type { RecipeOptions } from "./types.js";

const COLUMNS: Readonly<Record<Breakpoint, number>> = Object.freeze({
  small: 1,
  medium: 2,
  large: 3,
});

export function columnsForBreakpoint(breakpoint: Breakpoint): number {
  return COLUMNS[breakpoint];
}

/** Section lists per column, in column order. */
export function dealSections(sections: readonly string[], columns: number): string[][] {
  const out: string[][] = [];
  for (let c = 0; c < columns; c++) out.push([]);
  sections.forEach((section, i) => {
    out[i % columns]?.push(section);
  });
  return out;
}

export function responsiveLayout(
  width: number,
  height: number,
  sections: readonly string[],
  options: RecipeOptions = {},
): string {
  if (sections.length === 0) return "";
  const config = options.config ?? DEFAULT_LAYOUT_CONFIG;
  const gap = options.gap ?? 0;
  const breakpoint = resolveBreakpoint(width, config.breakpoints);
  const columns = dealSections(
    sections,
    Math.min(columnsForBreakpoint(breakpoint), sections.length),
  );

  // Column widths do not depend on content, so a probe row with the same
  // hints yields the sizes each column is rendered at.
  const probe = new FlexContainer("row", width, height, config).setGap(gap);
  for (let c = 0; c < columns.length; c++) probe.addChild("", { flexGrow: 1 });
  const geometry = probe.computeLayout();

  const row = new FlexContainer("row", width, height, config).setGap(gap);
  columns.forEach((column, c) => {
    const stack = new FlexContainer(
      "column",
      geometry.sizes[c] ?? 0,
      geometry.crossSize,
      config,
    ).setGap(gap);
    for (const section of column) stack.addChild(section, { flexGrow: 1 });
    row.addChild(stack.render(), { flexGrow: 1 });
  });
  return row.render();
}
