/**
 * packages/core/src/config.ts — Explicit layout configuration.
 *
 * Why: Every container receives its configuration from the caller instead of
 * reading module-level defaults, so two screens rendered side by side never
 * share hidden state. `createLayoutConfig` repairs bad values silently;
 * `readLayoutConfigFromEnv` is strict because a typo in an environment
 * variable should be visible.
 *
 * Environment variables:
 *   - CELLFLEX_COLOR_LEVEL: 0 (none), 1 (16), 2 (256), 3 (truecolor)
 *   - CELLFLEX_DEV: 1/true/yes/on enables dev-mode layout warnings
 *   - CELLFLEX_BREAKPOINT_SMALL: widths below this are "small" (default 80)
 *   - CELLFLEX_BREAKPOINT_MEDIUM: widths up to this are "medium" (default 120)
 *   - NO_COLOR: any non-empty value forces colour level 0 unless
 *     CELLFLEX_COLOR_LEVEL is set
 */

import { CellflexError } from "./errors.js";
import { defaultTheme } from "./theme/defaultTheme.js";
import type { ColorLevel } from "./theme/styler.js";
import type { Theme } from "./theme/types.js";

/**
 * `width < small` is small, `small <= width <= medium` is medium, anything
 * wider is large.
 */
export type BreakpointThresholds = Readonly<{
  small: number;
  medium: number;
}>;

export type LayoutConfig = Readonly<{
  colorLevel: ColorLevel;
  devMode: boolean;
  /** Row containers narrower than this are widened before layout. */
  minRowWidth: number;
  /** Column containers shorter than this are heightened before layout. */
  minColumnHeight: number;
  breakpoints: BreakpointThresholds;
  theme: Theme;
  /** Sink for dev-mode warnings. */
  warn: (message: string) => void;
}>;

export type LayoutConfigInput = Readonly<{
  colorLevel?: number;
  devMode?: boolean;
  minRowWidth?: number;
  minColumnHeight?: number;
  breakpoints?: Partial<BreakpointThresholds>;
  theme?: Theme;
  warn?: (message: string) => void;
}>;

const DEFAULT_BREAKPOINTS: BreakpointThresholds = Object.freeze({ small: 80, medium: 120 });

function defaultWarn(message: string): void {
  console.warn(message);
}

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = Object.freeze({
  colorLevel: 0,
  devMode: false,
  minRowWidth: 10,
  minColumnHeight: 3,
  breakpoints: DEFAULT_BREAKPOINTS,
  theme: defaultTheme,
  warn: defaultWarn,
});

function isColorLevel(value: unknown): value is ColorLevel {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

function normalizeCount(value: unknown, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  const n = Math.trunc(value);
  return n < 0 ? fallback : n;
}

function normalizeThreshold(value: unknown, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  const n = Math.trunc(value);
  return n <= 0 ? fallback : n;
}

export function normalizeBreakpointThresholds(
  value: Partial<BreakpointThresholds> | undefined,
): BreakpointThresholds {
  const small = normalizeThreshold(value?.small, DEFAULT_BREAKPOINTS.small);
  const medium = normalizeThreshold(value?.medium, DEFAULT_BREAKPOINTS.medium);
  return Object.freeze({
    small: Math.min(small, medium),
    medium: Math.max(small, medium),
  });
}

export function createLayoutConfig(input: LayoutConfigInput = {}): LayoutConfig {
  return Object.freeze({
    colorLevel: isColorLevel(input.colorLevel)
      ? input.colorLevel
      : DEFAULT_LAYOUT_CONFIG.colorLevel,
    devMode: input.devMode === true,
    minRowWidth: normalizeCount(input.minRowWidth, DEFAULT_LAYOUT_CONFIG.minRowWidth),
    minColumnHeight: normalizeCount(input.minColumnHeight, DEFAULT_LAYOUT_CONFIG.minColumnHeight),
    breakpoints: normalizeBreakpointThresholds(input.breakpoints),
    theme: input.theme ?? DEFAULT_LAYOUT_CONFIG.theme,
    warn: input.warn ?? DEFAULT_LAYOUT_CONFIG.warn,
  });
}

const ENV_COLOR_LEVEL = "CELLFLEX_COLOR_LEVEL" as const;
const ENV_DEV = "CELLFLEX_DEV" as const;
const ENV_BREAKPOINT_SMALL = "CELLFLEX_BREAKPOINT_SMALL" as const;
const ENV_BREAKPOINT_MEDIUM = "CELLFLEX_BREAKPOINT_MEDIUM" as const;

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function parseColorLevel(raw: string): ColorLevel {
  const n = Number(raw);
  if (!isColorLevel(n)) {
    throw new CellflexError(
      "CFLX_INVALID_CONFIG",
      `${ENV_COLOR_LEVEL} must be 0, 1, 2 or 3 (got "${raw}").`,
    );
  }
  return n;
}

function parseFlag(key: string, raw: string): boolean {
  const value = raw.toLowerCase();
  if (value === "1" || value === "true" || value === "yes" || value === "on") return true;
  if (value === "0" || value === "false" || value === "no" || value === "off") return false;
  throw new CellflexError(
    "CFLX_INVALID_CONFIG",
    `${key} must be one of 1/0, true/false, yes/no, on/off (got "${raw}").`,
  );
}

function parsePositiveInt(key: string, raw: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new CellflexError(
      "CFLX_INVALID_CONFIG",
      `${key} must be a positive integer (got "${raw}").`,
    );
  }
  return Number(raw);
}

/**
 * Build a config from environment variables layered over `base`.
 * Throws `CellflexError("CFLX_INVALID_CONFIG")` on malformed values.
 */
export function readLayoutConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  base: LayoutConfigInput = {},
): LayoutConfig {
  const colorRaw = readEnv(env, ENV_COLOR_LEVEL);
  const devRaw = readEnv(env, ENV_DEV);
  const smallRaw = readEnv(env, ENV_BREAKPOINT_SMALL);
  const mediumRaw = readEnv(env, ENV_BREAKPOINT_MEDIUM);

  let colorLevel = base.colorLevel;
  if (colorRaw !== undefined) colorLevel = parseColorLevel(colorRaw);
  else if (readEnv(env, "NO_COLOR") !== undefined) colorLevel = 0;

  const breakpoints: { small?: number; medium?: number } = { ...base.breakpoints };
  if (smallRaw !== undefined) breakpoints.small = parsePositiveInt(ENV_BREAKPOINT_SMALL, smallRaw);
  if (mediumRaw !== undefined) {
    breakpoints.medium = parsePositiveInt(ENV_BREAKPOINT_MEDIUM, mediumRaw);
  }
  const small = breakpoints.small ?? DEFAULT_BREAKPOINTS.small;
  const medium = breakpoints.medium ?? DEFAULT_BREAKPOINTS.medium;
  if (small > medium) {
    throw new CellflexError(
      "CFLX_INVALID_CONFIG",
      `${ENV_BREAKPOINT_SMALL}=${small} must not exceed ${ENV_BREAKPOINT_MEDIUM}=${medium}.`,
    );
  }

  return createLayoutConfig({
    ...base,
    colorLevel,
    devMode: devRaw !== undefined ? parseFlag(ENV_DEV, devRaw) : base.devMode,
    breakpoints,
  });
}
