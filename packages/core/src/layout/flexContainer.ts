/**
 * packages/core/src/layout/flexContainer.ts — Single-line flex container.
 *
 * Why: Turns a list of rendered blocks plus sizing hints into one positioned
 * block. The pipeline per render is:
 *   1. clamp the main size to the configured minimum
 *   2. reserve padding, margin and gaps
 *   3. stable-sort items by `order`
 *   4. resolve bases, then grow or shrink (engine/flex.ts)
 *   5. apply the minimum item size (row only)
 *   6. fit each item into its main size × cross span per alignment
 *   7. distribute leftover space per `justifyContent`
 *   8. wrap in padding and margin
 *
 * Containers are built, rendered and dropped; nothing is cached between
 * renders.
 */

import { type LayoutConfig, DEFAULT_LAYOUT_CONFIG } from "../config.js";
import { emitClampWarnings } from "../diagnostics.js";
import {
  type Block,
  blankBlock,
  blockToString,
  fitBlock,
  joinHorizontal,
  joinVertical,
  padBlock,
} from "../renderer/blocks.js";
import {
  ClampRecorder,
  type LayoutClamp,
  type LayoutReport,
  nonNegativeCells,
} from "./engine/clamps.js";
import {
  computeJustifyExtraGap,
  computeJustifyStartOffset,
  resolveMainSizes,
} from "./engine/flex.js";
import {
  type FlexItem,
  type FlexItemHints,
  createFlexItem,
  sortByOrder,
  toFlexSizing,
} from "./flexItem.js";
import { type SpacingValue, resolveSpacingValue } from "./spacing-scale.js";
import { measureLinesWidth, splitLines } from "./textMeasure.js";
import {
  type AlignItems,
  type Axis,
  type FlexWrap,
  type JustifyContent,
  isAlignItems,
  isFlexWrap,
  isJustifyContent,
} from "./types.js";

/** Geometry of one render pass, before any text is produced. */
export type FlexLayout = Readonly<{
  direction: Axis;
  /** Outer size after minimum clamps. */
  width: number;
  height: number;
  /** Main size inside padding and margin. */
  innerMain: number;
  /** Cross size inside padding and margin. */
  crossSize: number;
  padding: number;
  margin: number;
  /** `innerMain` minus the gaps; what bases, grow and shrink work against. */
  availableMain: number;
  /** Items in render order. */
  items: readonly FlexItem[];
  /** Resolved main size per item, in render order. */
  sizes: readonly number[];
  /** Blank cells before the first item. */
  leading: number;
  /** Blank cells between item i and i + 1 (gap plus justify share). */
  gaps: readonly number[];
  /** Blank cells after the last item. */
  trailing: number;
  clamps: readonly LayoutClamp[];
}>;

function finiteInt(value: number): number {
  return Number.isFinite(value) ? Math.floor(value) : 0;
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export class FlexContainer {
  private readonly items: FlexItem[] = [];
  private justifyContent: JustifyContent = "start";
  private alignItems: AlignItems = "stretch";
  private flexWrap: FlexWrap = "no-wrap";
  private padding: SpacingValue = 0;
  private margin: SpacingValue = 0;
  private gap: SpacingValue = 0;
  private minItemSize = 0;
  private readonly warnedLayoutIssues = new Set<string>();

  constructor(
    readonly direction: Axis,
    private readonly width: number,
    private readonly height: number,
    private readonly config: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
  ) {}

  setJustifyContent(value: JustifyContent): this {
    this.justifyContent = isJustifyContent(value) ? value : "start";
    return this;
  }

  setAlignItems(value: AlignItems): this {
    this.alignItems = isAlignItems(value) ? value : "stretch";
    return this;
  }

  /** Accepted for every mode; only `no-wrap` is laid out. */
  setFlexWrap(value: FlexWrap): this {
    this.flexWrap = isFlexWrap(value) ? value : "no-wrap";
    return this;
  }

  setPadding(value: SpacingValue): this {
    this.padding = value;
    return this;
  }

  setMargin(value: SpacingValue): this {
    this.margin = value;
    return this;
  }

  setGap(value: SpacingValue): this {
    this.gap = value;
    return this;
  }

  /** Floor for every resolved item size. Row direction only. */
  setMinItemSize(value: number): this {
    this.minItemSize = value;
    return this;
  }

  addItem(item: FlexItem): this {
    this.items.push(Object.freeze({ ...item }));
    return this;
  }

  addChild(content: string, hints?: FlexItemHints): this {
    return this.addItem(createFlexItem(content, hints));
  }

  get itemCount(): number {
    return this.items.length;
  }

  computeLayout(): FlexLayout {
    const recorder = new ClampRecorder();
    const isRow = this.direction === "row";
    const n = this.items.length;

    const padding = nonNegativeCells(resolveSpacingValue(this.padding), "padding", recorder);
    const margin = nonNegativeCells(resolveSpacingValue(this.margin), "margin", recorder);
    const gap = nonNegativeCells(resolveSpacingValue(this.gap), "gap", recorder);
    const minItemSize = nonNegativeCells(this.minItemSize, "minItemSize", recorder);

    let main = finiteInt(isRow ? this.width : this.height);
    let cross = finiteInt(isRow ? this.height : this.width);
    const minMain = isRow ? this.config.minRowWidth : this.config.minColumnHeight;
    if (main < minMain) {
      recorder.record(
        "container-min",
        `${isRow ? "width" : "height"} ${main} raised to minimum ${minMain}`,
      );
      main = minMain;
    }
    if (cross < 1) {
      recorder.record("cross-min", `${isRow ? "height" : "width"} ${cross} raised to 1`);
      cross = 1;
    }
    if (this.flexWrap !== "no-wrap") {
      recorder.record("wrap-unsupported", `flexWrap=${this.flexWrap} laid out as no-wrap`);
    }

    const chrome = 2 * padding + 2 * margin;
    if (chrome > main || chrome > cross) {
      recorder.record(
        "available-negative",
        `padding ${padding} + margin ${margin} exceed the ${main}x${cross} box`,
      );
    }
    const innerMain = Math.max(0, main - chrome);
    const crossSize = Math.max(0, cross - chrome);

    const gapTotal = gap * Math.max(0, n - 1);
    if (n > 0 && gapTotal > innerMain) {
      recorder.record("available-negative", `gaps ${gapTotal} exceed main size ${innerMain}`);
    }
    const availableMain = Math.max(0, innerMain - gapTotal);

    const items = sortByOrder(this.items);
    const sizing = items.map((item, i) => toFlexSizing(item, i, recorder));
    let sizes = resolveMainSizes(sizing, availableMain, recorder);

    if (isRow && minItemSize > 0) {
      sizes = sizes.map((size, i) => {
        if (size >= minItemSize) return size;
        recorder.record("min-item-size", `item ${i} raised from ${size} to ${minItemSize}`);
        return minItemSize;
      });
    }

    const used = sum(sizes) + gapTotal;
    const extra = Math.max(0, innerMain - used);
    if (n > 0 && used > innerMain) {
      recorder.record("overflow", `items need ${used} cells, ${innerMain} available`);
    }

    const leading = computeJustifyStartOffset(this.justifyContent, extra, n);
    const gaps: number[] = [];
    for (let b = 0; b < n - 1; b++) {
      gaps.push(gap + computeJustifyExtraGap(this.justifyContent, extra, n, b));
    }
    const trailing = extra - leading - (sum(gaps) - gapTotal);

    return Object.freeze({
      direction: this.direction,
      width: isRow ? main : cross,
      height: isRow ? cross : main,
      innerMain,
      crossSize,
      padding,
      margin,
      availableMain,
      items,
      sizes: Object.freeze(sizes),
      leading,
      gaps: Object.freeze(gaps),
      trailing,
      clamps: recorder.list(),
    });
  }

  private itemBlock(item: FlexItem, size: number, crossSize: number): string[] {
    const lines = splitLines(item.content);
    const align = item.alignSelf ?? this.alignItems;
    if (this.direction === "row") {
      return fitBlock(lines, size, crossSize, "start", align === "stretch" ? "start" : align);
    }
    if (align === "stretch") return fitBlock(lines, crossSize, size);
    const naturalWidth = Math.min(measureLinesWidth(lines), crossSize);
    return fitBlock(fitBlock(lines, naturalWidth, size), crossSize, size, align);
  }

  renderWithReport(): LayoutReport {
    if (this.items.length === 0) return Object.freeze({ output: "", clamps: Object.freeze([]) });

    const layout = this.computeLayout();
    const isRow = this.direction === "row";
    const cross = layout.crossSize;
    const blank = (len: number): string[] =>
      isRow ? blankBlock(len, cross) : blankBlock(cross, len);

    const blocks: Block[] = [];
    if (layout.leading > 0) blocks.push(blank(layout.leading));
    for (let i = 0; i < layout.items.length; i++) {
      const item = layout.items[i];
      if (!item) continue;
      blocks.push(this.itemBlock(item, layout.sizes[i] ?? 0, cross));
      const g = layout.gaps[i] ?? 0;
      if (g > 0) blocks.push(blank(g));
    }
    if (layout.trailing > 0) blocks.push(blank(layout.trailing));

    const joined = isRow ? joinHorizontal(blocks) : joinVertical(blocks);
    const innerW = isRow ? layout.innerMain : cross;
    const innerH = isRow ? cross : layout.innerMain;
    const inner = fitBlock(joined, innerW, innerH);

    const { padding, margin } = layout;
    const padded = padBlock(inner, padding, padding, padding, padding, innerW);
    const framed = padBlock(padded, margin, margin, margin, margin, innerW + 2 * padding);
    const out = fitBlock(framed, layout.width, layout.height);

    emitClampWarnings(
      {
        devMode: this.config.devMode,
        warnedLayoutIssues: this.warnedLayoutIssues,
        warn: this.config.warn,
      },
      `flex:${this.direction}`,
      layout.clamps,
    );
    return Object.freeze({ output: blockToString(out), clamps: layout.clamps });
  }

  render(): string {
    return this.renderWithReport().output;
  }
}
