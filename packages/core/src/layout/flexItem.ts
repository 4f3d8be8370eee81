/**
 * packages/core/src/layout/flexItem.ts — Flex item descriptor.
 *
 * A FlexItem is a value: already-rendered content plus sizing hints. The
 * container copies items on `addItem`, so mutating the caller's object later
 * does not affect a layout.
 */

import type { ClampRecorder } from "./engine/clamps.js";
import type { FlexSizing } from "./engine/flex.js";
import { type AlignItems, FLEX_BASIS_AUTO } from "./types.js";

export type FlexItem = Readonly<{
  /** Rendered, possibly multi-line text. */
  content: string;
  /** Weight for positive leftover space. Default 0. */
  flexGrow: number;
  /** Weight for negative leftover space. Default 1; 0 opts out of shrinking. */
  flexShrink: number;
  /** Starting main-axis size; -1 (any negative) means auto. */
  flexBasis: number;
  /** Overrides the container's `alignItems` for this item. */
  alignSelf?: AlignItems;
  /** Items are laid out by ascending `order`, ties in insertion order. */
  order: number;
}>;

export type FlexItemHints = Partial<Omit<FlexItem, "content">>;

export function createFlexItem(content: string, hints: FlexItemHints = {}): FlexItem {
  const item: FlexItem = {
    content,
    flexGrow: hints.flexGrow ?? 0,
    flexShrink: hints.flexShrink ?? 1,
    flexBasis: hints.flexBasis ?? FLEX_BASIS_AUTO,
    order: hints.order ?? 0,
    ...(hints.alignSelf !== undefined ? { alignSelf: hints.alignSelf } : {}),
  };
  return Object.freeze(item);
}

function weight(value: number, name: string, index: number, recorder: ClampRecorder): number {
  if (!Number.isFinite(value) || value < 0) {
    recorder.record("input-normalized", `item ${index} ${name}=${String(value)} treated as 0`);
    return 0;
  }
  const n = Math.floor(value);
  if (n !== value) recorder.record("input-normalized", `item ${index} ${name}=${value} floored`);
  return n;
}

/** Sizing hints as the engine consumes them: non-negative integer weights. */
export function toFlexSizing(item: FlexItem, index: number, recorder: ClampRecorder): FlexSizing {
  const basis = Number.isFinite(item.flexBasis) ? Math.floor(item.flexBasis) : FLEX_BASIS_AUTO;
  return {
    grow: weight(item.flexGrow, "flexGrow", index, recorder),
    shrink: weight(item.flexShrink, "flexShrink", index, recorder),
    basis: basis < 0 ? FLEX_BASIS_AUTO : basis,
  };
}

/** Stable ascending sort by `order`. */
export function sortByOrder(items: readonly FlexItem[]): FlexItem[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => {
      const ao = Number.isFinite(a.item.order) ? a.item.order : 0;
      const bo = Number.isFinite(b.item.order) ? b.item.order : 0;
      if (ao !== bo) return ao - bo;
      return a.index - b.index;
    })
    .map((x) => x.item);
}
