/**
 * chatport - Viewport Domain
 * Frame driver, identity registry and notification helpers
 */

export {
  createScrollViewport,
  type ScrollViewport,
  type ScrollViewportConfig,
  type UpdateOptions,
  type UpdateResult,
  type FrameInput,
  type FrameResult,
} from "./viewport";

export {
  createViewportRegistry,
  uniqueViewportId,
  type ViewportRegistry,
  type OperationTarget,
} from "./registry";

export { isViewportAtTop, isViewportAtBottom, scrollFraction } from "./notify";
