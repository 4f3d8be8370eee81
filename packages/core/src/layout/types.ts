/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the vocabulary shared by the flex engine, the grid and the
 * composite recipes. All sizes are in terminal cell units.
 */

/** Main-axis direction of a flex container. */
export type Axis = "row" | "column";

/** Placement of a block inside a larger span (either axis). */
export type Align = "start" | "center" | "end";

/** Cross-axis alignment of items. `stretch` fills the whole cross span. */
export type AlignItems = Align | "stretch";

/** Main-axis distribution of leftover space. */
export type JustifyContent =
  | "start"
  | "end"
  | "center"
  | "space-between"
  | "space-around"
  | "space-evenly";

/** Only `no-wrap` is laid out; the other modes render as `no-wrap`. */
export type FlexWrap = "no-wrap" | "wrap" | "wrap-reverse";

/** Sentinel for `flexBasis`: divide the available space among items. */
export const FLEX_BASIS_AUTO = -1 as const;

export function isJustifyContent(value: unknown): value is JustifyContent {
  return (
    value === "start" ||
    value === "end" ||
    value === "center" ||
    value === "space-between" ||
    value === "space-around" ||
    value === "space-evenly"
  );
}

export function isAlignItems(value: unknown): value is AlignItems {
  return value === "start" || value === "center" || value === "end" || value === "stretch";
}

export function isFlexWrap(value: unknown): value is FlexWrap {
  return value === "no-wrap" || value === "wrap" || value === "wrap-reverse";
}
