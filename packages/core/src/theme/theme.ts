/**
 * packages/core/src/theme/theme.ts — Panel styles derived from a theme.
 */

import type { TextStyle } from "../widgets/style.js";
import type { Theme } from "./types.js";
export type { Theme, ThemeColors } from "./types.js";

/** Title line of a panel. Focus swaps the foreground to the primary color. */
export function panelHeaderStyle(theme: Theme, focused: boolean): TextStyle {
  return Object.freeze({
    fg: focused ? theme.colors.primary : theme.colors.secondary,
    bold: true,
  });
}

/** Panel border. Muted at rest, primary when focused. */
export function panelBorderStyle(theme: Theme, focused: boolean): TextStyle {
  return Object.freeze({ fg: focused ? theme.colors.primary : theme.colors.muted });
}
