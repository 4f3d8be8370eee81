/**
 * packages/core/src/layout/spacing-scale.ts — Named spacing scale.
 *
 * Why: Provides semantic spacing tokens for padding, margin and gap.
 * Values are in terminal cell units (1 cell = 1 character width/height).
 *
 * Scale rationale:
 *   - none: 0 - No spacing
 *   - xs: 1 - Minimal spacing (tight)
 *   - sm: 1 - Small spacing (compact elements)
 *   - md: 2 - Medium spacing (default)
 *   - lg: 3 - Large spacing (sections)
 *   - xl: 4 - Extra large spacing (major sections)
 */

/**
 * Named spacing scale keys.
 */
export type SpacingKey = "none" | "xs" | "sm" | "md" | "lg" | "xl";

export const SPACING_SCALE: Readonly<Record<SpacingKey, number>> = Object.freeze({
  none: 0,
  xs: 1,
  sm: 1,
  md: 2,
  lg: 3,
  xl: 4,
});

/**
 * Type for spacing values - either a number or a scale key.
 */
export type SpacingValue = number | SpacingKey;

export function isSpacingKey(value: unknown): value is SpacingKey {
  return (
    value === "none" ||
    value === "xs" ||
    value === "sm" ||
    value === "md" ||
    value === "lg" ||
    value === "xl"
  );
}

/**
 * Resolve a spacing value to a number of cells.
 *
 * @example
 * ```typescript
 * resolveSpacingValue("md")  // 2
 * resolveSpacingValue(5)     // 5
 * ```
 */
export function resolveSpacingValue(value: SpacingValue | undefined): number {
  if (value === undefined) return 0;
  if (typeof value === "number") return value;
  if (isSpacingKey(value)) return SPACING_SCALE[value];
  return 0;
}
