/**
 * chatport - Scroll Animator
 * Time-based interpolation of the scroll offset across redraw frames
 *
 * All functions are pure step functions: they take the current animation and
 * return the next one, so any per-frame hook (requestAnimationFrame, a timer,
 * a render loop) can drive them.
 */

import type { ScrollAnimation } from "../types";
import { ANIMATION_RATE } from "../constants";

// =============================================================================
// Starting
// =============================================================================

/**
 * Add a scroll delta.
 *
 * While an animation is in flight the new one starts from the current
 * translation and heads for the old target plus `delta`, so rapid wheel ticks
 * compose instead of restarting from scratch.
 */
export const pushDelta = (
  animation: ScrollAnimation | null,
  translation: number,
  delta: number,
): ScrollAnimation => ({
  start: translation,
  target: (animation ? animation.target : translation) + delta,
  progress: 0,
});

// =============================================================================
// Stepping
// =============================================================================

export interface AnimationStep {
  animation: ScrollAnimation | null;
  translation: number;
}

/**
 * Advance an animation by `elapsedSeconds`.
 *
 * Progress grows by `elapsedSeconds * rate` and is clamped to [0, 1]. The
 * translation is the linear interpolation between start and target, exactly
 * the target once progress reaches 1, at which point the animation ends.
 * Callers clamp the returned translation to the valid range.
 */
export const advanceAnimation = (
  animation: ScrollAnimation,
  elapsedSeconds: number,
  rate = ANIMATION_RATE,
): AnimationStep => {
  const step = Math.max(0, elapsedSeconds) * rate;
  const progress = Math.min(1, Math.max(0, animation.progress + step));

  if (progress >= 1) {
    return { animation: null, translation: animation.target };
  }

  return {
    animation: { ...animation, progress },
    translation: lerp(animation.start, animation.target, progress),
  };
};

export const lerp = (start: number, target: number, progress: number): number =>
  start + progress * (target - start);

// =============================================================================
// Adjusting
// =============================================================================

/** Move both ends of an animation by `delta` */
export const shiftAnimation = (
  animation: ScrollAnimation,
  delta: number,
): ScrollAnimation => ({
  ...animation,
  start: animation.start + delta,
  target: animation.target + delta,
});

/** Keep both ends of an animation inside [0, max] */
export const clampAnimation = (
  animation: ScrollAnimation,
  max: number,
): ScrollAnimation => {
  const upper = Math.max(0, max);
  const clamp = (value: number): number =>
    Math.min(upper, Math.max(0, value));
  return {
    ...animation,
    start: clamp(animation.start),
    target: clamp(animation.target),
  };
};
