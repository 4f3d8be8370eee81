/**
 * @cellflex/core
 *
 * Flexbox-style layout for terminal text: rendered strings in, an exact
 * width × height block out. Layout never throws; repairs are reported as
 * clamps next to the output.
 */

// =============================================================================
// Configuration, errors and diagnostics
// =============================================================================

export {
  type BreakpointThresholds,
  type LayoutConfig,
  type LayoutConfigInput,
  DEFAULT_LAYOUT_CONFIG,
  createLayoutConfig,
  normalizeBreakpointThresholds,
  readLayoutConfigFromEnv,
} from "./config.js";
export { CellflexError, type CellflexErrorCode } from "./errors.js";
export { type LayoutWarnContext, emitClampWarnings, warnLayoutIssue } from "./diagnostics.js";

// =============================================================================
// Layout
// =============================================================================

export {
  type Align,
  type AlignItems,
  type Axis,
  type FlexWrap,
  type JustifyContent,
  FLEX_BASIS_AUTO,
  isAlignItems,
  isFlexWrap,
  isJustifyContent,
} from "./layout/types.js";
export {
  type LayoutClamp,
  type LayoutClampKind,
  type LayoutReport,
  ClampRecorder,
} from "./layout/engine/clamps.js";
export { allocateByWeight, splitEvenly, unitShare } from "./layout/engine/distribute.js";
export {
  type FlexSizing,
  computeJustifyExtraGap,
  computeJustifyStartOffset,
  resolveBases,
  resolveMainSizes,
} from "./layout/engine/flex.js";
export {
  type FlexItem,
  type FlexItemHints,
  createFlexItem,
  sortByOrder,
} from "./layout/flexItem.js";
export { type FlexLayout, FlexContainer } from "./layout/flexContainer.js";
export { type GridTracks, GridContainer } from "./layout/gridContainer.js";
export { type PanelBox, Panel } from "./layout/panel.js";
export {
  type SpacingKey,
  type SpacingValue,
  SPACING_SCALE,
  isSpacingKey,
  resolveSpacingValue,
} from "./layout/spacing-scale.js";
export {
  type Breakpoint,
  type ResponsiveWidth,
  type SpacingPair,
  adaptiveHeight,
  resolveBreakpoint,
  responsiveMargin,
  responsivePadding,
  responsiveWidth,
  truncateText,
} from "./layout/responsive.js";
export * from "./layout/recipes/index.js";
export {
  countLines,
  measureLinesWidth,
  measureTextCells,
  splitLines,
  stripAnsi,
  truncateToCells,
  truncateWithEllipsis,
} from "./layout/textMeasure.js";

// =============================================================================
// Cell adapter
// =============================================================================

export { type BoxStyle, applyBox, boxChrome, boxLines } from "./renderer/applyBox.js";
export {
  type Block,
  blankBlock,
  blankLine,
  blockToString,
  fitBlock,
  fitLine,
  joinHorizontal,
  joinVertical,
  padBlock,
} from "./renderer/blocks.js";
export {
  type BorderGlyphSet,
  type BorderStyle,
  getBorderGlyphs,
  isBorderStyle,
} from "./renderer/boxGlyphs.js";

// =============================================================================
// Styling
// =============================================================================

export {
  type Rgb24,
  type TextStyle,
  isEmptyStyle,
  rgb,
  rgbB,
  rgbG,
  rgbR,
} from "./widgets/style.js";
export * from "./theme/index.js";
