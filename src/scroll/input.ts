/**
 * chatport - Input Translator
 * Maps raw viewport-local input to scroll deltas
 */

import type { ScrollInput } from "../types";
import { LINE_HEIGHT } from "../constants";

export interface InputContext {
  /** Pointer is over the viewport (wheel input is ignored otherwise) */
  pointerInside: boolean;

  /** Height of the visible area, used for page keys */
  viewportHeight: number;

  /** Flip the sign of every delta */
  naturalScrolling: boolean;

  /** Already handled by a child; nothing is claimed */
  captured?: boolean;

  /** Distance of one wheel line (default: 80) */
  lineHeight?: number;
}

/**
 * Translate one input event into a scroll delta, or `null` when the viewport
 * does not act on it. Positive deltas move towards the end of the content.
 */
export const translateInput = (
  input: ScrollInput,
  context: InputContext,
): number | null => {
  if (context.captured) return null;

  const delta = rawDelta(input, context);
  if (delta === null) return null;

  return context.naturalScrolling ? -delta : delta;
};

const rawDelta = (input: ScrollInput, context: InputContext): number | null => {
  switch (input.type) {
    case "wheel":
      if (!context.pointerInside) return null;
      return input.deltaMode === "line"
        ? -input.deltaY * (context.lineHeight ?? LINE_HEIGHT)
        : -input.deltaY;

    case "keydown":
      if (input.key === "PageDown") return context.viewportHeight;
      if (input.key === "PageUp") return -context.viewportHeight;
      return null;
  }
};
