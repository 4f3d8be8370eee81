/**
 * packages/core/src/theme/defaultTheme.ts — Default theme values.
 *
 * Why: Provides the baseline theme used when the caller does not supply one.
 * Kept separate from theme helpers to avoid accidental circular imports.
 */

import { rgb } from "../widgets/style.js";
import type { Theme } from "./types.js";

export const defaultTheme: Theme = Object.freeze({
  colors: Object.freeze({
    primary: rgb(255, 107, 53),
    secondary: rgb(107, 182, 255),
    success: rgb(46, 204, 113),
    danger: rgb(231, 76, 60),
    warning: rgb(243, 156, 18),
    info: rgb(93, 173, 226),
    muted: rgb(174, 182, 191),
    dim: rgb(73, 80, 87),
    bg: rgb(44, 62, 80),
    fg: rgb(255, 255, 255),
    border: rgb(174, 182, 191),
  }),
});
