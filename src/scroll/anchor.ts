/**
 * chatport - Anchor Tracker
 * Keeps the reading position stable across layout passes
 *
 * Once per layout pass the translation is re-derived from the old and new
 * layout tables:
 * - at the bottom last frame → stick to the new bottom (follow mode)
 * - otherwise → keep the item under the top edge visually stationary
 *
 * Proximity to the bottom decides between the two; there is no mode flag.
 */

import type { LayoutRecord, Rect, ScrollAnimation } from "../types";
import { EDGE_EPSILON } from "../constants";
import { shiftAnimation, clampAnimation } from "./animator";

// =============================================================================
// Edges
// =============================================================================

/** Largest valid translation for the given geometry */
export const maxTranslation = (bounds: Rect, contentBounds: Rect): number =>
  Math.max(0, contentBounds.height - bounds.height);

export const clampTranslation = (
  translation: number,
  bounds: Rect,
  contentBounds: Rect,
): number => {
  const max = maxTranslation(bounds, contentBounds);
  if (!(translation > 0)) return 0;
  return translation > max ? max : translation;
};

/** Whether the viewport's bottom edge meets the content's bottom edge */
export const isAtBottom = (
  translation: number,
  bounds: Rect,
  contentBounds: Rect,
  epsilon = EDGE_EPSILON,
): boolean =>
  Math.abs(translation + bounds.height - contentBounds.height) < epsilon;

export const isAtTop = (translation: number, epsilon = EDGE_EPSILON): boolean =>
  Math.abs(translation) < epsilon;

// =============================================================================
// Anchor Lookup
// =============================================================================

/**
 * Index of the first record whose vertical span contains `translation`,
 * or -1 when none does (empty table, or every record has zero height).
 */
export const findAnchorIndex = <K>(
  table: readonly LayoutRecord<K>[],
  translation: number,
): number =>
  table.findIndex(
    ({ bounds }) =>
      bounds.y <= translation && translation < bounds.y + bounds.height,
  );

/**
 * Vertical distance the anchor moved between two layout tables.
 *
 * The anchor is found by key in `next`; if its key is gone it falls back to
 * the same index. Returns 0 when there is nothing to anchor to.
 */
export const anchorDelta = <K>(
  previous: readonly LayoutRecord<K>[],
  next: readonly LayoutRecord<K>[],
  translation: number,
): number => {
  const index = findAnchorIndex(previous, translation);
  const anchor = previous[index];
  if (index < 0 || !anchor) return 0;

  const moved =
    next.find((record) => record.key === anchor.key) ?? next[index];
  if (!moved) return 0;

  return moved.bounds.y - anchor.bounds.y;
};

// =============================================================================
// Re-anchoring
// =============================================================================

export interface AnchorFrame<K> {
  translation: number;
  animation: ScrollAnimation | null;
  bounds: Rect;
  contentBounds: Rect;
  table: readonly LayoutRecord<K>[];
}

export interface AnchorResult {
  translation: number;
  animation: ScrollAnimation | null;
}

/**
 * Compute the translation after a layout pass.
 *
 * `previous` is the state the last pass left behind, `next` carries the new
 * geometry (its translation and animation are ignored).
 */
export const reanchor = <K>(
  previous: AnchorFrame<K>,
  next: Omit<AnchorFrame<K>, "translation" | "animation">,
  epsilon = EDGE_EPSILON,
): AnchorResult => {
  let translation = previous.translation;
  let animation = previous.animation;

  if (
    isAtBottom(translation, previous.bounds, previous.contentBounds, epsilon)
  ) {
    translation = next.contentBounds.height - next.bounds.height;
  } else {
    const delta = anchorDelta(previous.table, next.table, translation);
    if (delta !== 0) {
      translation += delta;
      if (animation) animation = shiftAnimation(animation, delta);
    }
  }

  const max = maxTranslation(next.bounds, next.contentBounds);
  return {
    translation: clampTranslation(translation, next.bounds, next.contentBounds),
    animation: animation ? clampAnimation(animation, max) : null,
  };
};
