/**
 * chatport - Core Types
 * Geometry, layout records, viewport events and operations
 */

// =============================================================================
// Event Map Base Type
// =============================================================================

/** Base event map with index signature */
export type EventMap = Record<string, unknown>;

/** Event handler */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Geometry
// =============================================================================

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Axis-aligned rectangle, origin at the top-left corner */
export interface Rect extends Point, Size {}

/** Constraints an item is measured against */
export interface Limits {
  minWidth: number;
  maxWidth: number;
  maxHeight: number;
}

// =============================================================================
// Items
// =============================================================================

/**
 * One entry of the per-frame item list.
 *
 * `key` must stay stable across frames for the same logical item and be
 * unique within a frame. Keys are compared with `Map` semantics (SameValueZero),
 * so numbers, strings, symbols and object identities all work.
 */
export interface ViewportEntry<T, K> {
  item: T;
  key: K;
}

/** Retained state paired with the key it belongs to */
export interface KeyedEntry<S, K> {
  key: K;
  state: S;
}

/** Bounds of one item after the current layout pass */
export interface LayoutRecord<K> {
  bounds: Rect;
  key: K;
}

/** Ordered layout records of every item, rebuilt each frame */
export type LayoutTable<K> = readonly LayoutRecord<K>[];

// =============================================================================
// Animation
// =============================================================================

/** An in-flight smooth scroll. `null` means no animation. */
export interface ScrollAnimation {
  start: number;
  target: number;
  /** Interpolation progress in [0, 1] */
  progress: number;
}

// =============================================================================
// Input
// =============================================================================

/**
 * Wheel input.
 * `deltaY` follows the line/pixel-delta convention where positive values
 * scroll towards the top of the content.
 */
export interface WheelInput {
  type: "wheel";
  deltaMode: "line" | "pixel";
  deltaY: number;
}

/** Key press; only `PageUp` and `PageDown` are acted on */
export interface KeyInput {
  type: "keydown";
  key: string;
}

/** Redraw tick carrying the frame timestamp in milliseconds */
export interface RedrawInput {
  type: "redraw";
  time: number;
}

export type ScrollInput = WheelInput | KeyInput;

export type ViewportEvent = ScrollInput | RedrawInput;

// =============================================================================
// Operations
// =============================================================================

/** Jump so the item at `index` sits at the top of the viewport */
export interface ScrollToIndexOperation {
  type: "scrollToIndex";
  index: number;
}

/** Jump to a fraction (0-1) of the content height */
export interface SnapToOperation {
  type: "snapTo";
  fraction: number;
}

/** Jump to an absolute offset */
export interface ScrollToOperation {
  type: "scrollTo";
  offset: number;
}

/** Move by a delta relative to the current offset */
export interface ScrollByOperation {
  type: "scrollBy";
  delta: number;
}

export type ScrollOperation =
  | ScrollToIndexOperation
  | SnapToOperation
  | ScrollToOperation
  | ScrollByOperation;

// =============================================================================
// Notifications
// =============================================================================

/** Payload of the `scroll` notification */
export interface ScrollViewportEvent {
  translation: number;
  bounds: Rect;
  contentBounds: Rect;
}

/** Events emitted by a viewport */
export interface ViewportEvents extends EventMap {
  scroll: ScrollViewportEvent;
}

// =============================================================================
// Identity
// =============================================================================

/** Identity a viewport is addressed by from outside the view tree */
export type ViewportId = string | symbol;
