/**
 * packages/core/src/layout/textMeasure.ts — Display-width text measurement.
 *
 * Why: Every geometry decision is made in terminal cells, not UTF-16 code
 * units. Content arrives already styled, so escape sequences must measure as
 * zero cells and survive cropping.
 *
 * Width rules (delegated to string-width):
 *   - ASCII printable: 1 cell
 *   - CJK and other East Asian wide glyphs: 2 cells
 *   - Emoji sequences: 2 cells
 *   - Combining marks, control characters and ANSI escapes: 0 cells
 */

import stringWidth from "string-width";

/** CSI sequences (colours, cursor movement) and OSC sequences (hyperlinks). */
// biome-ignore lint/suspicious/noControlCharactersInRegex: escape sequences start with ESC
const ANSI_PATTERN = /\x1b\[[0-?]*[ -/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g;

const SGR_RESET = "\x1b[0m";

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

export type LineToken = Readonly<{ kind: "escape" | "grapheme"; text: string }>;

/** Width of a single line in cells. Callers split blocks on "\n" first. */
export function measureTextCells(text: string): number {
  if (text.length === 0) return 0;
  return stringWidth(text);
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/**
 * Split a block into lines. The empty string is a block of zero lines, so an
 * empty header or cell takes no vertical space.
 */
export function splitLines(block: string): string[] {
  if (block.length === 0) return [];
  return block.replace(/\r\n/g, "\n").split("\n");
}

/** Number of lines in a block: newline count + 1, or 0 for "". */
export function countLines(block: string): number {
  if (block.length === 0) return 0;
  let n = 1;
  for (let i = 0; i < block.length; i++) {
    if (block.charCodeAt(i) === 10) n++;
  }
  return n;
}

export function measureLinesWidth(lines: readonly string[]): number {
  let w = 0;
  for (const line of lines) {
    const lw = measureTextCells(line);
    if (lw > w) w = lw;
  }
  return w;
}

/** Escape sequences and graphemes of one line, in order. */
export function* tokenizeLine(line: string): Generator<LineToken> {
  const pattern = new RegExp(ANSI_PATTERN);
  let cursor = 0;
  for (let m = pattern.exec(line); m !== null; m = pattern.exec(line)) {
    if (m.index > cursor) {
      for (const seg of graphemeSegmenter.segment(line.slice(cursor, m.index))) {
        yield { kind: "grapheme", text: seg.segment };
      }
    }
    yield { kind: "escape", text: m[0] };
    cursor = m.index + m[0].length;
  }
  if (cursor < line.length) {
    for (const seg of graphemeSegmenter.segment(line.slice(cursor))) {
      yield { kind: "grapheme", text: seg.segment };
    }
  }
}

/**
 * Crop a line to at most `width` cells.
 *
 * A wide glyph that would straddle the limit is dropped and replaced by a
 * space, so the result is exactly `width` cells whenever the input was wider.
 * Escape sequences before the cut are kept and a reset is appended after them.
 */
export function truncateToCells(line: string, width: number): string {
  const max = Number.isFinite(width) ? Math.max(0, Math.floor(width)) : 0;
  if (measureTextCells(line) <= max) return line;

  let out = "";
  let used = 0;
  let styled = false;
  for (const token of tokenizeLine(line)) {
    if (token.kind === "escape") {
      out += token.text;
      styled = true;
      continue;
    }
    const w = stringWidth(token.text);
    if (used + w > max) break;
    out += token.text;
    used += w;
  }
  if (used < max) out += " ".repeat(max - used);
  return styled ? `${out}${SGR_RESET}` : out;
}

/** Crop with a trailing ellipsis when the text does not fit. */
export function truncateWithEllipsis(text: string, width: number, ellipsis = "…"): string {
  const max = Number.isFinite(width) ? Math.max(0, Math.floor(width)) : 0;
  if (measureTextCells(text) <= max) return text;
  const ellipsisWidth = measureTextCells(ellipsis);
  if (max <= ellipsisWidth) return truncateToCells(ellipsis, max);
  return `${truncateToCells(text, max - ellipsisWidth)}${ellipsis}`;
}
