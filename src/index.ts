/**
 * chatport - Anchored scroll viewport for live chat transcripts
 *
 * Keeps the reader's place while messages stream in and images resize
 * finished lines, and follows the newest message when the reader is at the
 * bottom.
 *
 * @packageDocumentation
 */

// Viewport
export {
  createScrollViewport,
  createViewportRegistry,
  uniqueViewportId,
  isViewportAtTop,
  isViewportAtBottom,
  scrollFraction,
  type ScrollViewport,
  type ScrollViewportConfig,
  type UpdateOptions,
  type UpdateResult,
  type FrameInput,
  type FrameResult,
  type ViewportRegistry,
  type OperationTarget,
} from "./viewport";

// Building blocks
export * from "./state";
export * from "./rendering";
export * from "./scroll";
export * from "./geometry";
export { createEmitter, type Emitter } from "./events";

// Browser host
export * from "./dom";

// Chat
export * from "./chat";

// Constants
export {
  EDGE_EPSILON,
  ANIMATION_RATE,
  LINE_HEIGHT,
  DEFAULT_CLASS_PREFIX,
  DEFAULT_MAX_MESSAGES,
  DEFAULT_SETTINGS_KEY,
} from "./constants";

// Core Types
export type {
  Point,
  Size,
  Rect,
  Limits,
  ViewportEntry,
  KeyedEntry,
  LayoutRecord,
  LayoutTable,
  ScrollAnimation,
  WheelInput,
  KeyInput,
  RedrawInput,
  ScrollInput,
  ViewportEvent,
  ScrollToIndexOperation,
  SnapToOperation,
  ScrollToOperation,
  ScrollByOperation,
  ScrollOperation,
  ScrollViewportEvent,
  ViewportEvents,
  ViewportId,
  EventMap,
  EventHandler,
  Unsubscribe,
} from "./types";
