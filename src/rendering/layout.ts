/**
 * chatport - Stack Layout
 * Lays items out top to bottom and computes the aggregate content bounds
 *
 * Every item is measured on every pass. There is no windowing: off-screen
 * items still report their size, so content height is always exact.
 */

import type { KeyedEntry, LayoutRecord, Limits, Rect, Size } from "../types";
import { ZERO_RECT, rectWithSize, translateRect, unionRect } from "../geometry/rect";

// =============================================================================
// Types
// =============================================================================

/** Reports an item's size given its retained state and the width limits */
export type MeasureFn<T, K, S> = (
  item: T,
  state: S,
  limits: Limits,
  key: K,
) => Size;

/** Item ready for layout: the frame's item plus its retained state */
export interface LayoutInput<T, K, S> extends KeyedEntry<S, K> {
  item: T;
}

export interface StackLayout<K> {
  table: LayoutRecord<K>[];
  contentBounds: Rect;
}

// =============================================================================
// Limits
// =============================================================================

/**
 * Loosened limits for a column of the given width: any width up to the
 * column, any height.
 */
export const columnLimits = (maxWidth: number): Limits => ({
  minWidth: 0,
  maxWidth: Math.max(0, maxWidth),
  maxHeight: Number.POSITIVE_INFINITY,
});

const sanitize = (value: number, max: number): number => {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(value, max);
};

// =============================================================================
// Layout
// =============================================================================

/**
 * Stack items vertically.
 *
 * Each item is placed at the running content height; the content bounds are
 * the union of all item rectangles (width of the widest item, height of the
 * sum of item heights).
 */
export const layoutStack = <T, K, S>(
  inputs: readonly LayoutInput<T, K, S>[],
  maxWidth: number,
  measure: MeasureFn<T, K, S>,
): StackLayout<K> => {
  const limits = columnLimits(maxWidth);
  const table: LayoutRecord<K>[] = [];
  let contentBounds: Rect = { ...ZERO_RECT };

  for (const input of inputs) {
    const size = measure(input.item, input.state, limits, input.key);
    const bounds = translateRect(
      rectWithSize({
        width: sanitize(size.width, limits.maxWidth),
        height: sanitize(size.height, limits.maxHeight),
      }),
      0,
      contentBounds.height,
    );
    contentBounds = unionRect(contentBounds, bounds);
    table.push({ bounds, key: input.key });
  }

  return { table, contentBounds };
};

/** Sum of item heights in a layout table */
export const totalHeight = <K>(table: readonly LayoutRecord<K>[]): number => {
  let sum = 0;
  for (const record of table) sum += record.bounds.height;
  return sum;
};
