/**
 * packages/core/src/renderer/blocks.ts — Line-array block composition.
 *
 * Why: Blocks are handled as arrays of lines while a layout is assembled and
 * only joined into a string at the very end. That keeps a zero-width line
 * distinct from "no line at all", which a joined string cannot express.
 */

import { measureLinesWidth, measureTextCells, truncateToCells } from "../layout/textMeasure.js";
import type { Align } from "../layout/types.js";

export type Block = readonly string[];

function clampCells(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

export function blankLine(width: number): string {
  return " ".repeat(clampCells(width));
}

export function blankBlock(width: number, height: number): string[] {
  const h = clampCells(height);
  const line = blankLine(width);
  const out = new Array<string>(h);
  for (let i = 0; i < h; i++) out[i] = line;
  return out;
}

/** Pad or crop one line to exactly `width` cells. Cropping always keeps the start. */
export function fitLine(line: string, width: number, align: Align = "start"): string {
  const w = clampCells(width);
  const actual = measureTextCells(line);
  if (actual > w) return truncateToCells(line, w);
  const extra = w - actual;
  if (extra === 0) return line;
  if (align === "end") return `${blankLine(extra)}${line}`;
  if (align === "center") {
    const before = Math.floor(extra / 2);
    return `${blankLine(before)}${line}${blankLine(extra - before)}`;
  }
  return `${line}${blankLine(extra)}`;
}

/**
 * Pad or crop a block to exactly `width` × `height`. Extra lines are cropped
 * from the bottom; missing lines are added according to `vAlign`.
 */
export function fitBlock(
  lines: Block,
  width: number,
  height: number,
  hAlign: Align = "start",
  vAlign: Align = "start",
): string[] {
  const w = clampCells(width);
  const h = clampCells(height);
  const kept = lines.length > h ? lines.slice(0, h) : lines;
  const missing = h - kept.length;
  let before = 0;
  if (vAlign === "end") before = missing;
  else if (vAlign === "center") before = Math.floor(missing / 2);

  const out: string[] = [];
  for (let i = 0; i < before; i++) out.push(blankLine(w));
  for (const line of kept) out.push(fitLine(line, w, hAlign));
  while (out.length < h) out.push(blankLine(w));
  return out;
}

/**
 * Surround a block with `top`/`bottom` blank lines and `left`/`right` blank
 * columns. `innerWidth` defaults to the widest line; pass it when the block
 * may have no lines but still a width.
 */
export function padBlock(
  lines: Block,
  top: number,
  right: number,
  bottom: number,
  left: number,
  innerWidth: number = measureLinesWidth(lines),
): string[] {
  const t = clampCells(top);
  const r = clampCells(right);
  const b = clampCells(bottom);
  const l = clampCells(left);
  if (t === 0 && r === 0 && b === 0 && l === 0) return [...lines];
  const fullWidth = innerWidth + l + r;
  const out: string[] = [];
  for (let i = 0; i < t; i++) out.push(blankLine(fullWidth));
  for (const line of lines) {
    out.push(`${blankLine(l)}${fitLine(line, innerWidth)}${blankLine(r)}`);
  }
  for (let i = 0; i < b; i++) out.push(blankLine(fullWidth));
  return out;
}

/** Place blocks side by side. Shorter blocks are padded per `align`. */
export function joinHorizontal(blocks: readonly Block[], align: Align = "start"): string[] {
  if (blocks.length === 0) return [];
  let height = 0;
  for (const b of blocks) if (b.length > height) height = b.length;

  const fitted = blocks.map((b) => fitBlock(b, measureLinesWidth(b), height, "start", align));
  const out: string[] = [];
  for (let row = 0; row < height; row++) {
    let line = "";
    for (const b of fitted) line += b[row] ?? "";
    out.push(line);
  }
  return out;
}

/** Stack blocks top to bottom. Narrower lines are padded per `align`. */
export function joinVertical(blocks: readonly Block[], align: Align = "start"): string[] {
  let width = 0;
  for (const b of blocks) {
    const w = measureLinesWidth(b);
    if (w > width) width = w;
  }
  const out: string[] = [];
  for (const b of blocks) {
    for (const line of b) out.push(fitLine(line, width, align));
  }
  return out;
}

/** Join a block into its string form. */
export function blockToString(lines: Block): string {
  return lines.join("\n");
}
