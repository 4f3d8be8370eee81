/**
 * packages/core/src/renderer/boxGlyphs.ts — Border glyph sets.
 */

export type BorderStyle = "none" | "single" | "rounded" | "double" | "heavy";

export type BorderGlyphSet = Readonly<{
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}>;

const GLYPHS: Readonly<Record<Exclude<BorderStyle, "none">, BorderGlyphSet>> = Object.freeze({
  single: Object.freeze({
    topLeft: "┌",
    topRight: "┐",
    bottomLeft: "└",
    bottomRight: "┘",
    horizontal: "─",
    vertical: "│",
  }),
  rounded: Object.freeze({
    topLeft: "╭",
    topRight: "╮",
    bottomLeft: "╰",
    bottomRight: "╯",
    horizontal: "─",
    vertical: "│",
  }),
  double: Object.freeze({
    topLeft: "╔",
    topRight: "╗",
    bottomLeft: "╚",
    bottomRight: "╝",
    horizontal: "═",
    vertical: "║",
  }),
  heavy: Object.freeze({
    topLeft: "┏",
    topRight: "┓",
    bottomLeft: "┗",
    bottomRight: "┛",
    horizontal: "━",
    vertical: "┃",
  }),
});

export function isBorderStyle(v: unknown): v is BorderStyle {
  return v === "none" || v === "single" || v === "rounded" || v === "double" || v === "heavy";
}

/** Glyphs for a border style, or null for "none". */
export function getBorderGlyphs(style: BorderStyle): BorderGlyphSet | null {
  if (style === "none") return null;
  return GLYPHS[style];
}
