/**
 * packages/core/src/layout/recipes/sidebarLayout.ts — Main area plus sidebar.
 *
 * Side by side with a 2:1 main:sidebar grow ratio, or a fixed sidebar width
 * when one is given. Small terminals stack the sidebar under the main area
 * with the same ratio applied to the height.
 */

import { DEFAULT_LAYOUT_CONFIG } from "../../config.js";
import { FlexContainer } from "../flexContainer.js";
import { resolveBreakpoint } from "../responsive.js";
import type { RecipeOptions } from "./types.js";

export type SidebarLayoutOptions = RecipeOptions &
  Readonly<{
    /** Fixed sidebar width in cells. Ignored when stacked. */
    sidebarWidth?: number;
    /** Grow weights. Default `{ main: 2, sidebar: 1 }`. */
    ratio?: Readonly<{ main: number; sidebar: number }>;
  }>;

const DEFAULT_RATIO = Object.freeze({ main: 2, sidebar: 1 });

export function sidebarLayout(
  width: number,
  height: number,
  main: string,
  sidebar: string,
  options: SidebarLayoutOptions = {},
): string {
  const config = options.config ?? DEFAULT_LAYOUT_CONFIG;
  const ratio = options.ratio ?? DEFAULT_RATIO;
  const stacked = resolveBreakpoint(width, config.breakpoints) === "small";

  const container = new FlexContainer(stacked ? "column" : "row", width, height, config).setGap(
    options.gap ?? 0,
  );
  container.addChild(main, { flexGrow: ratio.main, flexBasis: 0 });

  const fixed = options.sidebarWidth;
  if (!stacked && fixed !== undefined && Number.isFinite(fixed) && fixed >= 0) {
    container.addChild(sidebar, { flexBasis: Math.floor(fixed), flexGrow: 0, flexShrink: 0 });
  } else {
    container.addChild(sidebar, { flexGrow: ratio.sidebar, flexBasis: 0 });
  }
  return container.render();
}
