/**
 * chatport - Viewport Notifications
 * Edge checks for `scroll` payloads
 */

import type { ScrollViewportEvent } from "../types";
import { EDGE_EPSILON } from "../constants";
import { isAtBottom, isAtTop } from "../scroll/anchor";

export const isViewportAtTop = (
  event: ScrollViewportEvent,
  epsilon = EDGE_EPSILON,
): boolean => isAtTop(event.translation, epsilon);

export const isViewportAtBottom = (
  event: ScrollViewportEvent,
  epsilon = EDGE_EPSILON,
): boolean =>
  isAtBottom(event.translation, event.bounds, event.contentBounds, epsilon);

/** Fraction of the scrollable range covered so far (0-1) */
export const scrollFraction = (event: ScrollViewportEvent): number => {
  const max = event.contentBounds.height - event.bounds.height;
  if (max <= 0) return 0;
  return Math.min(1, Math.max(0, event.translation / max));
};
