/**
 * packages/core/src/renderer/applyBox.ts — The cell adapter.
 *
 * Why: The layout engine decides sizes; this module is the one place that
 * turns "this content, this many cells" into actual text. It pads or crops
 * content to the inner area and then adds, from the inside out: padding,
 * border, margin. Width and height are OUTER sizes (margin included); a value
 * <= 0 means "as large as the content".
 */

import { measureLinesWidth, splitLines } from "../layout/textMeasure.js";
import type { Align } from "../layout/types.js";
import { type ColorLevel, type Styler, createStyler } from "../theme/styler.js";
import type { TextStyle } from "../widgets/style.js";
import { type Block, blockToString, fitBlock, padBlock } from "./blocks.js";
import { type BorderGlyphSet, type BorderStyle, getBorderGlyphs } from "./boxGlyphs.js";

export type BoxStyle = Readonly<{
  padding?: number;
  margin?: number;
  border?: BorderStyle;
  /** Colour of the border glyphs. */
  borderStyle?: TextStyle;
  /** Style applied to every content line. */
  text?: TextStyle;
  align?: Align;
  verticalAlign?: Align;
}>;

const plainStyler = createStyler(0);

function nonNegativeInt(v: number | undefined): number {
  if (v === undefined || !Number.isFinite(v)) return 0;
  return Math.max(0, Math.floor(v));
}

/** Cells consumed on each side by padding, border and margin. */
export function boxChrome(style: BoxStyle): number {
  const border = style.border !== undefined && style.border !== "none" ? 1 : 0;
  return nonNegativeInt(style.padding) + nonNegativeInt(style.margin) + border;
}

function frameBlock(
  lines: Block,
  innerWidth: number,
  glyphs: BorderGlyphSet,
  paint: (s: string) => string,
): string[] {
  const top = paint(`${glyphs.topLeft}${glyphs.horizontal.repeat(innerWidth)}${glyphs.topRight}`);
  const bottom = paint(
    `${glyphs.bottomLeft}${glyphs.horizontal.repeat(innerWidth)}${glyphs.bottomRight}`,
  );
  const side = paint(glyphs.vertical);
  const out: string[] = [top];
  for (const line of lines) out.push(`${side}${line}${side}`);
  out.push(bottom);
  return out;
}

/** Line-array form of {@link applyBox}, used while a layout is being assembled. */
export function boxLines(
  content: Block,
  width: number,
  height: number,
  style: BoxStyle,
  styler: Styler = plainStyler,
): string[] {
  const padding = nonNegativeInt(style.padding);
  const margin = nonNegativeInt(style.margin);
  const glyphs = getBorderGlyphs(style.border ?? "none");
  const chrome = 2 * boxChrome(style);
  const w = Number.isFinite(width) ? Math.floor(width) : 0;
  const h = Number.isFinite(height) ? Math.floor(height) : 0;

  const innerW = w > 0 ? Math.max(0, w - chrome) : measureLinesWidth(content);
  const innerH = h > 0 ? Math.max(0, h - chrome) : content.length;

  let lines = fitBlock(content, innerW, innerH, style.align, style.verticalAlign);
  if (style.text !== undefined) {
    const textStyle = style.text;
    lines = lines.map((line) => styler.paint(line, textStyle));
  }
  lines = padBlock(lines, padding, padding, padding, padding, innerW);
  let framedW = innerW + 2 * padding;
  if (glyphs !== null) {
    const paint = (s: string): string => styler.paint(s, style.borderStyle);
    lines = frameBlock(lines, framedW, glyphs, paint);
    framedW += 2;
  }
  lines = padBlock(lines, margin, margin, margin, margin, framedW);

  // Chrome wider than the requested size: crop back to the outer box.
  if (w > 0 || h > 0) {
    lines = fitBlock(lines, w > 0 ? w : innerW + chrome, h > 0 ? h : innerH + chrome);
  }
  return lines;
}

/**
 * Pad, crop and decorate `content` to exactly `width` × `height` cells.
 *
 * @example
 * ```typescript
 * applyBox("hi", 6, 3, { border: "single" });
 * // "┌────┐\n│hi  │\n└────┘"
 * ```
 */
export function applyBox(
  content: string,
  width: number,
  height: number,
  style: BoxStyle = {},
  colorLevel: ColorLevel = 0,
): string {
  const styler = colorLevel === 0 ? plainStyler : createStyler(colorLevel);
  return blockToString(boxLines(splitLines(content), width, height, style, styler));
}
