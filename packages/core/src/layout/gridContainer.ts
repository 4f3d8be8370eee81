/**
 * packages/core/src/layout/gridContainer.ts — Fixed rows × columns grid.
 *
 * Why: Dashboards often want a uniform matrix of cards rather than a flex
 * line. Every column gets `⌊availableWidth / columns⌋` cells and the
 * remainder goes one cell each to the first columns; rows work the same way.
 *
 * The matrix size is fixed at construction. Writes outside it are ignored.
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
import { splitEvenly } from "./engine/distribute.js";
import { type SpacingValue, resolveSpacingValue } from "./spacing-scale.js";
import { splitLines } from "./textMeasure.js";

export type GridTracks = Readonly<{
  columnWidths: readonly number[];
  rowHeights: readonly number[];
  padding: number;
  margin: number;
  gap: number;
  clamps: readonly LayoutClamp[];
}>;

function matrixDimension(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

export class GridContainer {
  readonly rows: number;
  readonly columns: number;
  private readonly cells: string[][];
  private padding: SpacingValue = 0;
  private margin: SpacingValue = 0;
  private gap: SpacingValue = 0;
  private readonly ignoredWrites: LayoutClamp[] = [];
  private readonly warnedLayoutIssues = new Set<string>();

  constructor(
    rows: number,
    columns: number,
    private readonly width: number,
    private readonly height: number,
    private readonly config: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
  ) {
    this.rows = matrixDimension(rows);
    this.columns = matrixDimension(columns);
    this.cells = [];
    for (let r = 0; r < this.rows; r++) {
      this.cells.push(new Array<string>(this.columns).fill(""));
    }
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

  /** Write one cell. Indices outside the matrix are ignored. */
  setCell(row: number, col: number, content: string): this {
    const inRange =
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      col >= 0 &&
      row < this.rows &&
      col < this.columns;
    const target = inRange ? this.cells[row] : undefined;
    if (target === undefined) {
      const ignored: LayoutClamp = {
        kind: "cell-ignored",
        detail: `setCell(${row}, ${col}) outside ${this.rows}x${this.columns}`,
      };
      this.ignoredWrites.push(Object.freeze(ignored));
      return this;
    }
    target[col] = content;
    return this;
  }

  getCell(row: number, col: number): string | undefined {
    return this.cells[row]?.[col];
  }

  computeTracks(): GridTracks {
    const recorder = new ClampRecorder();
    recorder.recordAll(this.ignoredWrites);

    const padding = nonNegativeCells(resolveSpacingValue(this.padding), "padding", recorder);
    const margin = nonNegativeCells(resolveSpacingValue(this.margin), "margin", recorder);
    const gap = nonNegativeCells(resolveSpacingValue(this.gap), "gap", recorder);
    const width = nonNegativeCells(this.width, "width", recorder);
    const height = nonNegativeCells(this.height, "height", recorder);

    const chrome = 2 * padding + 2 * margin;
    const availableW = width - chrome - gap * Math.max(0, this.columns - 1);
    const availableH = height - chrome - gap * Math.max(0, this.rows - 1);
    if (this.rows > 0 && this.columns > 0 && (availableW < 0 || availableH < 0)) {
      recorder.record(
        "available-negative",
        `padding, margin and gaps exceed the ${width}x${height} grid`,
      );
    }

    return Object.freeze({
      columnWidths: Object.freeze(splitEvenly(Math.max(0, availableW), this.columns)),
      rowHeights: Object.freeze(splitEvenly(Math.max(0, availableH), this.rows)),
      padding,
      margin,
      gap,
      clamps: recorder.list(),
    });
  }

  renderWithReport(): LayoutReport {
    const tracks = this.computeTracks();
    if (this.rows === 0 || this.columns === 0) {
      return Object.freeze({ output: "", clamps: tracks.clamps });
    }

    const rowBlocks: Block[] = [];
    for (let r = 0; r < this.rows; r++) {
      const h = tracks.rowHeights[r] ?? 0;
      const cellBlocks: Block[] = [];
      for (let c = 0; c < this.columns; c++) {
        const w = tracks.columnWidths[c] ?? 0;
        cellBlocks.push(fitBlock(splitLines(this.getCell(r, c) ?? ""), w, h));
        if (c < this.columns - 1 && tracks.gap > 0) cellBlocks.push(blankBlock(tracks.gap, h));
      }
      rowBlocks.push(joinHorizontal(cellBlocks));
    }

    const gridW =
      tracks.columnWidths.reduce((a, b) => a + b, 0) + tracks.gap * (this.columns - 1);
    const stacked: Block[] = [];
    for (let r = 0; r < rowBlocks.length; r++) {
      stacked.push(rowBlocks[r] ?? []);
      if (r < rowBlocks.length - 1 && tracks.gap > 0) stacked.push(blankBlock(gridW, tracks.gap));
    }
    const inner = joinVertical(stacked);

    const { padding, margin } = tracks;
    const padded = padBlock(inner, padding, padding, padding, padding, gridW);
    const framed = padBlock(padded, margin, margin, margin, margin, gridW + 2 * padding);

    emitClampWarnings(
      {
        devMode: this.config.devMode,
        warnedLayoutIssues: this.warnedLayoutIssues,
        warn: this.config.warn,
      },
      `grid:${this.rows}x${this.columns}`,
      tracks.clamps,
    );
    return Object.freeze({ output: blockToString(framed), clamps: tracks.clamps });
  }

  render(): string {
    return this.renderWithReport().output;
  }
}
