/**
 * packages/core/src/theme/styler.ts — TextStyle to SGR escape rendering.
 *
 * Why: Geometry code only ever sees plain strings. Colour is applied last, per
 * line, so a styled block can still be split on "\n" and measured by the cell
 * adapter without escape state leaking across lines.
 */

import { Chalk, type ChalkInstance } from "chalk";
import { type TextStyle, isEmptyStyle, rgbB, rgbG, rgbR } from "../widgets/style.js";

/** 0 = no colour, 1 = 16 colours, 2 = 256 colours, 3 = truecolor. */
export type ColorLevel = 0 | 1 | 2 | 3;

export type Styler = Readonly<{
  level: ColorLevel;
  paint: (text: string, style: TextStyle | undefined) => string;
  paintBlock: (block: string, style: TextStyle | undefined) => string;
}>;

function chainFor(base: ChalkInstance, style: TextStyle): ChalkInstance {
  let c = base;
  if (style.fg !== undefined) c = c.rgb(rgbR(style.fg), rgbG(style.fg), rgbB(style.fg));
  if (style.bg !== undefined) c = c.bgRgb(rgbR(style.bg), rgbG(style.bg), rgbB(style.bg));
  if (style.bold === true) c = c.bold;
  if (style.dim === true) c = c.dim;
  if (style.italic === true) c = c.italic;
  if (style.underline === true) c = c.underline;
  if (style.inverse === true) c = c.inverse;
  if (style.strikethrough === true) c = c.strikethrough;
  return c;
}

export function createStyler(level: ColorLevel): Styler {
  const base = new Chalk({ level });

  const paint = (text: string, style: TextStyle | undefined): string => {
    if (level === 0 || style === undefined || isEmptyStyle(style)) return text;
    return chainFor(base, style)(text);
  };

  const paintBlock = (block: string, style: TextStyle | undefined): string => {
    if (level === 0 || style === undefined || isEmptyStyle(style)) return block;
    const chain = chainFor(base, style);
    return block
      .split("\n")
      .map((line) => chain(line))
      .join("\n");
  };

  return Object.freeze({ level, paint, paintBlock });
}
