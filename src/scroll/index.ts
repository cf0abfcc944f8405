/**
 * chatport - Scroll Domain
 * Anchor tracking, smooth-scroll animation and input translation
 */

export {
  maxTranslation,
  clampTranslation,
  isAtBottom,
  isAtTop,
  findAnchorIndex,
  anchorDelta,
  reanchor,
  type AnchorFrame,
  type AnchorResult,
} from "./anchor";

export {
  pushDelta,
  advanceAnimation,
  shiftAnimation,
  clampAnimation,
  lerp,
  type AnimationStep,
} from "./animator";

export { translateInput, type InputContext } from "./input";
