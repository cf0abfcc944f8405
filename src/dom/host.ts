/**
 * chatport/dom - DOM Viewport Host
 * Drives a scroll viewport from browser input and animation frames
 *
 * Every item keeps one element for as long as its key is present, so images
 * inside a message keep decoding (and GIFs keep playing) while the list grows
 * around them. Items are absolutely positioned at their layout offset and the
 * content element is translated by the scroll offset.
 */

import type {
  EventHandler,
  Point,
  Rect,
  ScrollOperation,
  Size,
  Unsubscribe,
  ViewportEntry,
  ViewportEvents,
  ViewportId,
} from "../types";
import { DEFAULT_CLASS_PREFIX } from "../constants";
import {
  createScrollViewport,
  type ScrollViewport,
} from "../viewport/viewport";
import type { ViewportRegistry } from "../viewport/registry";
import {
  applyTemplate,
  createDOMStructure,
  resolveContainer,
  type DOMStructure,
} from "./structure";

// =============================================================================
// Types
// =============================================================================

/** Retained state of one rendered item */
export interface ItemView {
  element: HTMLElement;
}

/** The parts of an `IntersectionObserverEntry` the host reads */
export interface VisibilityEntry {
  isIntersecting: boolean;
  intersectionRect: Rect;
  boundingClientRect: Rect;
}

export interface DomViewportConfig<T, K> {
  /** Container element or selector */
  container: HTMLElement | string;

  /** Render a new item; called once per key */
  template: (item: T, key: K) => string | HTMLElement;

  /** Refresh an existing item's element when the frame's item changed */
  update?: (element: HTMLElement, item: T, key: K) => void;

  /** Item height (default: bounding box height) */
  measure?: (element: HTMLElement) => number;

  /** Visible size (default: viewport element client size) */
  size?: () => Size;

  /** Identity for `registry` lookups */
  id?: ViewportId;

  /** Registry this viewport joins while mounted (requires `id`) */
  registry?: ViewportRegistry;

  /** Flip scroll direction; a getter is read on every input event */
  naturalScrolling?: boolean | (() => boolean);

  /** CSS class prefix (default: 'chatport') */
  classPrefix?: string;

  /** Accessible label of the log region */
  ariaLabel?: string;

  animationRate?: number;
  lineHeight?: number;
  epsilon?: number;
}

export interface DomViewport<T, K> {
  readonly viewport: ScrollViewport<T, K, ItemView>;
  readonly dom: DOMStructure;

  /** Replace the item list and schedule a frame */
  setItems: (entries: readonly ViewportEntry<T, K>[]) => void;

  /** Schedule a frame (e.g. after an item's content changed size) */
  invalidate: () => void;

  /** Run any scheduled frame now */
  flush: (time?: number) => void;

  scrollToIndex: (index: number) => void;
  snapTo: (fraction: number) => void;
  scrollToBottom: () => void;
  scrollTo: (offset: number) => void;
  scrollBy: (delta: number) => void;

  on: <E extends keyof ViewportEvents>(
    event: E,
    handler: EventHandler<ViewportEvents[E]>,
  ) => Unsubscribe;

  destroy: () => void;
}

// =============================================================================
// Helpers
// =============================================================================

const DOM_DELTA_LINE = 1;
const DOM_DELTA_PAGE = 2;

const defaultMeasure = (element: HTMLElement): number =>
  element.getBoundingClientRect().height;

// =============================================================================
// Host Factory
// =============================================================================

export const createDomViewport = <T, K>(
  config: DomViewportConfig<T, K>,
): DomViewport<T, K> => {
  if (typeof config.template !== "function") {
    throw new Error("[chatport/dom] template is required");
  }
  if (config.registry && config.id === undefined) {
    throw new Error("[chatport/dom] id is required when a registry is given");
  }

  const {
    id,
    registry,
    update,
    measure = defaultMeasure,
    classPrefix = DEFAULT_CLASS_PREFIX,
  } = config;

  const container = resolveContainer(config.container);
  const dom = createDOMStructure(container, classPrefix, config.ariaLabel);
  const itemClass = `${classPrefix}-item`;

  let entries: readonly ViewportEntry<T, K>[] = [];
  let frameId: number | null = null;
  let destroyed = false;
  // unknown until the first intersection report: treated as fully shown
  let visible: Rect | null | undefined;

  const resizeObserver =
    typeof ResizeObserver !== "undefined"
      ? new ResizeObserver(() => schedule())
      : null;

  // ── Item state ──────────────────────────────────────────────────

  const createView = (item: T, key: K): ItemView => {
    const element = document.createElement("div");
    element.className = itemClass;
    element.setAttribute("role", "listitem");
    element.style.position = "absolute";
    element.style.top = "0";
    element.style.left = "0";
    element.style.width = "100%";
    applyTemplate(element, config.template(item, key));
    // attached before layout so it can be measured; paint fixes the order
    dom.content.appendChild(element);
    resizeObserver?.observe(element);
    return { element };
  };

  const disposeView = (view: ItemView): void => {
    resizeObserver?.unobserve(view.element);
    view.element.remove();
  };

  const viewport = createScrollViewport<T, K, ItemView>({
    create: createView,
    sync: update ? (view, item, key) => update(view.element, item, key) : undefined,
    dispose: disposeView,
    measure: (_item, view, limits) => ({
      width: limits.maxWidth,
      height: measure(view.element),
    }),
    naturalScrolling: config.naturalScrolling,
    animationRate: config.animationRate,
    lineHeight: config.lineHeight,
    epsilon: config.epsilon,
  });

  // ── Frames ──────────────────────────────────────────────────────

  const readBounds = (): Rect => {
    const size = config.size
      ? config.size()
      : { width: dom.viewport.clientWidth, height: dom.viewport.clientHeight };
    return { x: 0, y: 0, width: size.width, height: size.height };
  };

  const paint = (): void => {
    const table = viewport.getLayoutTable();
    const contentBounds = viewport.getContentBounds();

    dom.content.style.height = `${contentBounds.height}px`;
    dom.content.style.transform = `translateY(${-viewport.getTranslation()}px)`;

    // keep document order equal to layout order for assistive technology
    let cursor = dom.content.firstElementChild;
    for (const record of table) {
      const view = viewport.getState(record.key);
      if (!view) continue;
      view.element.style.transform = `translateY(${record.bounds.y}px)`;
      if (cursor && view.element === cursor) {
        cursor = cursor.nextElementSibling;
      } else {
        dom.content.insertBefore(view.element, cursor);
      }
    }
  };

  const runFrame = (time: number): void => {
    frameId = null;
    if (destroyed) return;

    viewport.layout(entries, readBounds());
    const { redraw } = viewport.update({ type: "redraw", time }, { visible });
    viewport.commit();
    paint();

    if (redraw && viewport.isAnimating()) schedule();
  };

  function schedule(): void {
    if (destroyed || frameId !== null) return;
    frameId = requestAnimationFrame(runFrame);
  }

  const flush = (time = performance.now()): void => {
    if (frameId !== null) {
      cancelAnimationFrame(frameId);
      frameId = null;
    }
    runFrame(time);
  };

  // ── Visibility ──────────────────────────────────────────────────

  const handleVisibility = (reports: readonly VisibilityEntry[]): void => {
    const latest = reports[reports.length - 1];
    if (!latest) return;

    const { intersectionRect: shown, boundingClientRect: box } = latest;
    visible = latest.isIntersecting
      ? { x: shown.x - box.x, y: shown.y - box.y, width: shown.width, height: shown.height }
      : null;
    // resumes an animation that stalled while hidden
    schedule();
  };

  const intersectionObserver =
    typeof IntersectionObserver !== "undefined"
      ? new IntersectionObserver((reports) => handleVisibility(reports))
      : null;
  intersectionObserver?.observe(dom.viewport);

  // ── Input ───────────────────────────────────────────────────────

  const localPoint = (event: MouseEvent): Point => {
    const rect = dom.viewport.getBoundingClientRect();
    return { x: event.clientX - rect.left, y: event.clientY - rect.top };
  };

  const handleWheel = (event: WheelEvent): void => {
    if (event.deltaY === 0) return;

    // browser wheel deltas point down the page; the viewport expects up
    const result =
      event.deltaMode === DOM_DELTA_LINE
        ? viewport.update(
            { type: "wheel", deltaMode: "line", deltaY: -event.deltaY },
            { cursor: localPoint(event), captured: event.defaultPrevented },
          )
        : viewport.update(
            {
              type: "wheel",
              deltaMode: "pixel",
              deltaY:
                event.deltaMode === DOM_DELTA_PAGE
                  ? -event.deltaY * viewport.getBounds().height
                  : -event.deltaY,
            },
            { cursor: localPoint(event), captured: event.defaultPrevented },
          );

    if (result.captured) {
      event.preventDefault();
      schedule();
    }
  };

  const handleKeydown = (event: KeyboardEvent): void => {
    const result = viewport.update(
      { type: "keydown", key: event.key },
      { captured: event.defaultPrevented },
    );
    if (result.captured) {
      event.preventDefault();
      schedule();
    }
  };

  dom.viewport.addEventListener("wheel", handleWheel, { passive: false });
  dom.root.addEventListener("keydown", handleKeydown);
  resizeObserver?.observe(dom.viewport);

  // ── Operations ──────────────────────────────────────────────────

  const dispatch = (operation: ScrollOperation): void => {
    viewport.operate(operation);
    schedule();
  };

  const target = { operate: dispatch };
  if (registry && id !== undefined) registry.register(id, target);

  // ── Lifecycle ───────────────────────────────────────────────────

  const destroy = (): void => {
    if (destroyed) return;
    destroyed = true;

    if (frameId !== null) {
      cancelAnimationFrame(frameId);
      frameId = null;
    }
    resizeObserver?.disconnect();
    intersectionObserver?.disconnect();
    dom.viewport.removeEventListener("wheel", handleWheel);
    dom.root.removeEventListener("keydown", handleKeydown);
    if (registry && id !== undefined) registry.unregister(id, target);

    viewport.destroy();
    dom.root.remove();
  };

  return {
    viewport,
    dom,
    setItems: (next) => {
      entries = next;
      schedule();
    },
    invalidate: schedule,
    flush,
    scrollToIndex: (index) => dispatch({ type: "scrollToIndex", index }),
    snapTo: (fraction) => dispatch({ type: "snapTo", fraction }),
    scrollToBottom: () => dispatch({ type: "snapTo", fraction: 1 }),
    scrollTo: (offset) => dispatch({ type: "scrollTo", offset }),
    scrollBy: (delta) => dispatch({ type: "scrollBy", delta }),
    on: (event, handler) => viewport.on(event, handler),
    destroy,
  };
};
