/**
 * chatport - Scroll Viewport
 * Frame-driven vertical viewport over a keyed, variable-height item list
 *
 * Each frame the host runs three steps on the same thread:
 *
 *   layout(entries, bounds)   keyed diff → stack layout → anchor tracking
 *   update(event)             input → animation, redraw tick → interpolation
 *   commit()                  queued operations → `scroll` notification
 *
 * `frame()` runs all three in order. The viewport state is owned here; the
 * only outside influence is input passed to `update` and operations queued
 * through `operate` (directly or via a registry).
 */

import type {
  LayoutRecord,
  Point,
  Rect,
  ScrollAnimation,
  ScrollInput,
  ScrollOperation,
  ScrollViewportEvent,
  ViewportEntry,
  ViewportEvent,
  ViewportEvents,
  ViewportId,
  EventHandler,
  Unsubscribe,
} from "../types";
import { ANIMATION_RATE, EDGE_EPSILON, LINE_HEIGHT } from "../constants";
import { ZERO_RECT, cloneRect, containsPoint, intersects } from "../geometry/rect";
import { createEmitter } from "../events/emitter";
import { createKeyedStore } from "../state/keyed";
import { layoutStack, totalHeight, type MeasureFn } from "../rendering/layout";
import { clampTranslation, isAtBottom, isAtTop, reanchor } from "../scroll/anchor";
import { advanceAnimation, pushDelta } from "../scroll/animator";
import { translateInput } from "../scroll/input";
import type { ViewportRegistry } from "./registry";

// =============================================================================
// Types
// =============================================================================

export interface ScrollViewportConfig<T, K, S> {
  /** Build retained state for a new key */
  create: (item: T, key: K) => S;

  /** Re-sync retained state with this frame's item */
  sync?: (state: S, item: T, key: K) => void;

  /** Release retained state of a removed key */
  dispose?: (state: S, key: K) => void;

  /** Report an item's size */
  measure: MeasureFn<T, K, S>;

  /** Identity used to register with `registry` */
  id?: ViewportId;

  /** Registry the viewport joins while alive (requires `id`) */
  registry?: ViewportRegistry;

  /** Flip scroll direction; a getter is read on every input event */
  naturalScrolling?: boolean | (() => boolean);

  /** Animation progress per second (default: 30) */
  animationRate?: number;

  /** Distance of one wheel line (default: 80) */
  lineHeight?: number;

  /** Edge tolerance for top/bottom checks (default: 0.01) */
  epsilon?: number;

  /** Clock in milliseconds (default: performance.now) */
  now?: () => number;
}

export interface UpdateOptions {
  /** Pointer position in the coordinate space of `bounds`, if known */
  cursor?: Point | null;

  /**
   * Region currently on screen, in the coordinate space of `bounds`;
   * `null` when the viewport is entirely off screen. Defaults to the
   * viewport bounds.
   */
  visible?: Rect | null;

  /** A child already handled the event */
  captured?: boolean;
}

export interface UpdateResult {
  /** The viewport acted on the event */
  captured: boolean;

  /** Another redraw tick is needed */
  redraw: boolean;
}

export interface FrameInput<T, K> {
  entries: readonly ViewportEntry<T, K>[];
  bounds: Rect;
  /** Frame timestamp in milliseconds */
  time: number;
  inputs?: readonly ScrollInput[];
  cursor?: Point | null;
  visible?: Rect | null;
}

export interface FrameResult {
  redraw: boolean;
  /** The frame emitted a `scroll` notification */
  scrolled: boolean;
}

export interface ScrollViewport<T, K, S> {
  readonly id: ViewportId | undefined;

  layout: (
    entries: readonly ViewportEntry<T, K>[],
    bounds: Rect,
  ) => readonly LayoutRecord<K>[];
  update: (event: ViewportEvent, options?: UpdateOptions) => UpdateResult;
  operate: (operation: ScrollOperation) => void;
  commit: () => boolean;
  frame: (input: FrameInput<T, K>) => FrameResult;

  getTranslation: () => number;
  getBounds: () => Rect;
  getContentBounds: () => Rect;
  getLayoutTable: () => readonly LayoutRecord<K>[];
  getAnimation: () => ScrollAnimation | null;
  getState: (key: K) => S | undefined;
  getSnapshot: () => ScrollViewportEvent;
  isAnimating: () => boolean;
  isAtTop: () => boolean;
  isAtBottom: () => boolean;

  on: <E extends keyof ViewportEvents>(
    event: E,
    handler: EventHandler<ViewportEvents[E]>,
  ) => Unsubscribe;

  destroy: () => void;
}

/** Mutable per-instance state, never shared */
interface ViewportState<K> {
  bounds: Rect;
  contentBounds: Rect;
  table: LayoutRecord<K>[];
  translation: number;
  animation: ScrollAnimation | null;
  lastFrameTime: number;
  dirtyScrolled: boolean;
  /** Translation as of the last commit */
  committed: number;
}

// =============================================================================
// Config Resolution
// =============================================================================

const validateConfig = <T, K, S>(config: ScrollViewportConfig<T, K, S>): void => {
  if (typeof config.create !== "function") {
    throw new Error("[chatport] create is required");
  }
  if (typeof config.measure !== "function") {
    throw new Error("[chatport] measure is required");
  }
  if (
    config.animationRate !== undefined &&
    !(Number.isFinite(config.animationRate) && config.animationRate > 0)
  ) {
    throw new Error("[chatport] animationRate must be a positive number");
  }
  if (
    config.epsilon !== undefined &&
    !(Number.isFinite(config.epsilon) && config.epsilon >= 0)
  ) {
    throw new Error("[chatport] epsilon must be a non-negative number");
  }
  if (config.registry && config.id === undefined) {
    throw new Error("[chatport] id is required when a registry is given");
  }
};

// =============================================================================
// Viewport Factory
// =============================================================================

export const createScrollViewport = <T, K, S>(
  config: ScrollViewportConfig<T, K, S>,
): ScrollViewport<T, K, S> => {
  validateConfig(config);

  const {
    id,
    registry,
    measure,
    naturalScrolling = false,
    animationRate = ANIMATION_RATE,
    lineHeight = LINE_HEIGHT,
    epsilon = EDGE_EPSILON,
    now = () => performance.now(),
  } = config;

  const emitter = createEmitter<ViewportEvents>();
  const store = createKeyedStore<T, K, S>({
    create: config.create,
    sync: config.sync,
    dispose: config.dispose,
  });

  const state: ViewportState<K> = {
    bounds: { ...ZERO_RECT },
    contentBounds: { ...ZERO_RECT },
    table: [],
    translation: 0,
    animation: null,
    lastFrameTime: now(),
    dirtyScrolled: false,
    committed: 0,
  };

  const pending: ScrollOperation[] = [];
  let destroyed = false;

  const readNaturalScrolling = (): boolean =>
    typeof naturalScrolling === "function"
      ? naturalScrolling()
      : naturalScrolling;

  const setTranslation = (value: number): void => {
    const next = clampTranslation(value, state.bounds, state.contentBounds);
    if (next !== state.translation) {
      state.translation = next;
      state.dirtyScrolled = true;
    }
  };

  /** Direct jump: no animation, immediate, clamped */
  const jumpTo = (value: number): void => {
    state.animation = null;
    setTranslation(value);
  };

  const isShown = (visible?: Rect | null): boolean =>
    visible !== null && intersects(state.bounds, visible ?? state.bounds);

  // ===========================================================================
  // Layout Pass
  // ===========================================================================

  const layout = (
    entries: readonly ViewportEntry<T, K>[],
    bounds: Rect,
  ): readonly LayoutRecord<K>[] => {
    const retained = store.reconcile(entries);
    const inputs = entries.map((entry, i) => ({
      item: entry.item,
      key: entry.key,
      state: retained[i].state,
    }));

    const next = layoutStack(inputs, bounds.width, measure);
    const nextBounds = cloneRect(bounds);

    const anchored = reanchor(
      state,
      { bounds: nextBounds, contentBounds: next.contentBounds, table: next.table },
      epsilon,
    );

    state.table = next.table;
    state.contentBounds = next.contentBounds;
    state.bounds = nextBounds;
    state.animation = anchored.animation;
    setTranslation(anchored.translation);

    return state.table;
  };

  // ===========================================================================
  // Event Pass
  // ===========================================================================

  const tick = (time: number, visible?: Rect | null): boolean => {
    const elapsedSeconds = (time - state.lastFrameTime) / 1000;
    state.lastFrameTime = time;

    if (!state.animation) return false;

    const step = advanceAnimation(state.animation, elapsedSeconds, animationRate);
    state.animation = step.animation;
    setTranslation(step.translation);

    return state.animation !== null && isShown(visible);
  };

  const update = (
    event: ViewportEvent,
    options: UpdateOptions = {},
  ): UpdateResult => {
    if (event.type === "redraw") {
      return { captured: false, redraw: tick(event.time, options.visible) };
    }

    const delta = translateInput(event, {
      pointerInside: options.cursor
        ? containsPoint(state.bounds, options.cursor)
        : false,
      viewportHeight: state.bounds.height,
      naturalScrolling: readNaturalScrolling(),
      captured: options.captured,
      lineHeight,
    });

    if (delta === null) return { captured: false, redraw: false };

    state.animation = pushDelta(state.animation, state.translation, delta);
    state.lastFrameTime = now();

    return { captured: true, redraw: isShown(options.visible) };
  };

  // ===========================================================================
  // Operations
  // ===========================================================================

  const apply = (operation: ScrollOperation): void => {
    switch (operation.type) {
      case "scrollToIndex": {
        const { index } = operation;
        if (!Number.isInteger(index) || index < 0) return;
        const record = state.table[index];
        if (!record) return;
        jumpTo(record.bounds.y);
        return;
      }

      case "snapTo": {
        if (Number.isNaN(operation.fraction)) return;
        const fraction = Math.min(1, Math.max(0, operation.fraction));
        jumpTo(state.contentBounds.height * fraction);
        return;
      }

      case "scrollTo": {
        if (Number.isNaN(operation.offset)) return;
        jumpTo(Math.max(0, Math.min(operation.offset, totalHeight(state.table))));
        return;
      }

      case "scrollBy": {
        if (!Number.isFinite(operation.delta)) return;
        jumpTo(state.translation + operation.delta);
        return;
      }
    }
  };

  const operate = (operation: ScrollOperation): void => {
    if (destroyed) return;
    pending.push(operation);
  };

  // ===========================================================================
  // Commit / Notifier
  // ===========================================================================

  const getSnapshot = (): ScrollViewportEvent => ({
    translation: state.translation,
    bounds: cloneRect(state.bounds),
    contentBounds: cloneRect(state.contentBounds),
  });

  /** Apply queued operations and notify; `true` when `scroll` was emitted */
  const commit = (): boolean => {
    const queued = pending.splice(0, pending.length);
    for (const operation of queued) apply(operation);

    const changed = state.dirtyScrolled && state.translation !== state.committed;
    state.dirtyScrolled = false;
    state.committed = state.translation;

    if (changed) emitter.emit("scroll", getSnapshot());
    return changed;
  };

  const frame = (input: FrameInput<T, K>): FrameResult => {
    layout(input.entries, input.bounds);

    let redraw = false;
    for (const event of input.inputs ?? []) {
      const result = update(event, { cursor: input.cursor, visible: input.visible });
      redraw = redraw || result.redraw;
    }

    const ticked = update(
      { type: "redraw", time: input.time },
      { visible: input.visible },
    );
    redraw = redraw || ticked.redraw;

    const scrolled = commit();
    // a queued jump cancels the animation the redraw was requested for
    return { redraw: redraw && state.animation !== null, scrolled };
  };

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  const destroy = (): void => {
    if (destroyed) return;
    destroyed = true;
    pending.length = 0;
    store.clear();
    emitter.clear();
    if (registry && id !== undefined) registry.unregister(id, viewport);
  };

  const viewport: ScrollViewport<T, K, S> = {
    id,
    layout,
    update,
    operate,
    commit,
    frame,
    getTranslation: () => state.translation,
    getBounds: () => cloneRect(state.bounds),
    getContentBounds: () => cloneRect(state.contentBounds),
    getLayoutTable: () => state.table,
    getAnimation: () => (state.animation ? { ...state.animation } : null),
    getState: (key) => store.get(key),
    getSnapshot,
    isAnimating: () => state.animation !== null,
    isAtTop: () => isAtTop(state.translation, epsilon),
    isAtBottom: () =>
      isAtBottom(state.translation, state.bounds, state.contentBounds, epsilon),
    on: (event, handler) => emitter.on(event, handler),
    destroy,
  };

  if (registry && id !== undefined) registry.register(id, viewport);

  return viewport;
};
