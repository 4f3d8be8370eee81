/**
 * packages/core/src/theme/index.ts — Theme public exports.
 */

export { defaultTheme } from "./defaultTheme.js";
export {
  panelBorderStyle,
  panelHeaderStyle,
  type Theme,
  type ThemeColors,
} from "./theme.js";
export { createStyler, type ColorLevel, type Styler } from "./styler.js";
