/**
 * packages/core/src/layout/panel.ts — Titled, bordered box around content.
 *
 * Composition order, inside out: title line, content, padding, rounded
 * border, margin. Width and height are outer sizes; values <= 0 mean
 * "as large as the content".
 */

import { type LayoutConfig, DEFAULT_LAYOUT_CONFIG } from "../config.js";
import { boxLines } from "../renderer/applyBox.js";
import { blockToString } from "../renderer/blocks.js";
import { panelBorderStyle, panelHeaderStyle } from "../theme/theme.js";
import { createStyler } from "../theme/styler.js";
import { type SpacingValue, resolveSpacingValue } from "./spacing-scale.js";
import { splitLines } from "./textMeasure.js";

export type PanelBox = Readonly<{
  width: number;
  height: number;
  padding?: SpacingValue;
  margin?: SpacingValue;
}>;

export class Panel {
  private focused = false;

  constructor(
    private readonly box: PanelBox,
    private title: string,
    private content: string,
    private readonly border: boolean,
    private readonly config: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
  ) {}

  setTitle(title: string): this {
    this.title = title;
    return this;
  }

  setContent(content: string): this {
    this.content = content;
    return this;
  }

  setFocused(focused: boolean): this {
    this.focused = focused;
    return this;
  }

  get isFocused(): boolean {
    return this.focused;
  }

  render(): string {
    const styler = createStyler(this.config.colorLevel);
    const theme = this.config.theme;

    const lines: string[] = [];
    if (this.title !== "") {
      lines.push(styler.paint(this.title, panelHeaderStyle(theme, this.focused)));
    }
    lines.push(...splitLines(this.content));

    const framed = boxLines(
      lines,
      this.box.width,
      this.box.height,
      {
        padding: resolveSpacingValue(this.box.padding),
        margin: resolveSpacingValue(this.box.margin),
        border: this.border ? "rounded" : "none",
        borderStyle: panelBorderStyle(theme, this.focused),
      },
      styler,
    );
    return blockToString(framed);
  }
}
