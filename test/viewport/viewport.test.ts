/**
 * chatport - Scroll Viewport Tests
 * Frame pipeline: layout, anchoring, input, animation, operations, notifications
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  createScrollViewport,
  createViewportRegistry,
  type ScrollViewportConfig,
} from "../../src/viewport";
import type { Rect, ScrollViewportEvent, ViewportEntry } from "../../src/types";

// =============================================================================
// Fixtures
// =============================================================================

interface Row {
  id: string;
  height: number;
}

interface RowState {
  createdFor: string;
}

const rect = (width: number, height: number): Rect => ({ x: 0, y: 0, width, height });

/** Rows of the given heights keyed a, b, c, ... */
const rows = (...heights: number[]): ViewportEntry<Row, string>[] =>
  heights.map((height, i) => {
    const id = String.fromCharCode(97 + i);
    return { item: { id, height }, key: id };
  });

const keyed = (...pairs: [string, number][]): ViewportEntry<Row, string>[] =>
  pairs.map(([id, height]) => ({ item: { id, height }, key: id }));

let clock = 0;

const setup = (overrides: Partial<ScrollViewportConfig<Row, string, RowState>> = {}) =>
  createScrollViewport<Row, string, RowState>({
    create: (item) => ({ createdFor: item.id }),
    measure: (item, _state, limits) => ({ width: limits.maxWidth, height: item.height }),
    now: () => clock,
    ...overrides,
  });

const inside = { x: 10, y: 10 };
const lineUp = { type: "wheel", deltaMode: "line", deltaY: 1 } as const;

beforeEach(() => {
  clock = 0;
});

// =============================================================================
// Layout and anchoring
// =============================================================================

describe("layout", () => {
  it("should stack items and start at the bottom", () => {
    const viewport = setup();
    const table = viewport.layout(rows(40, 40, 40), rect(100, 100));

    expect(table.map((r) => r.bounds.y)).toEqual([0, 40, 80]);
    expect(viewport.getContentBounds().height).toBe(120);
    expect(viewport.getTranslation()).toBe(20);
    expect(viewport.isAtBottom()).toBe(true);
  });

  it("should stay at the bottom when a message is appended", () => {
    const viewport = setup();
    viewport.layout(rows(40, 40, 40), rect(100, 100));
    viewport.layout(rows(40, 40, 40, 40), rect(100, 100));

    expect(viewport.getTranslation()).toBe(60);
  });

  it("should keep the anchor item in place when an item is inserted above it", () => {
    const viewport = setup();
    viewport.layout(keyed(["a", 50], ["b", 50], ["c", 50]), rect(100, 60));
    viewport.operate({ type: "scrollTo", offset: 50 });
    viewport.commit();
    expect(viewport.getTranslation()).toBe(50);

    viewport.layout(keyed(["a", 50], ["new", 50], ["b", 50], ["c", 50]), rect(100, 60));

    expect(viewport.getTranslation()).toBe(100);
  });

  it("should keep the anchor in place when items above it are removed", () => {
    const viewport = setup();
    viewport.layout(keyed(["a", 50], ["b", 50], ["c", 50]), rect(100, 60));
    viewport.operate({ type: "scrollTo", offset: 70 });
    viewport.commit();

    viewport.layout(keyed(["b", 50], ["c", 50]), rect(100, 60));

    // 20px into b before and after
    expect(viewport.getTranslation()).toBe(20);
  });

  it("should pin to zero when content fits in the viewport", () => {
    const viewport = setup();
    viewport.layout(rows(10, 10), rect(100, 100));

    expect(viewport.getTranslation()).toBe(0);
    expect(viewport.isAtTop()).toBe(true);
  });

  it("should re-clamp when content shrinks below the translation", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100, 100), rect(100, 100));
    viewport.operate({ type: "scrollTo", offset: 150 });
    viewport.commit();

    viewport.layout(rows(50, 50), rect(100, 100));

    expect(viewport.getTranslation()).toBe(0);
  });

  it("should reuse retained state across frames and dispose removed keys", () => {
    const dispose = vi.fn();
    const viewport = setup({ dispose });
    viewport.layout(rows(10, 10, 10), rect(100, 100));
    const stateOfB = viewport.getState("b");

    viewport.layout(keyed(["c", 10], ["b", 10]), rect(100, 100));

    expect(viewport.getState("b")).toBe(stateOfB);
    expect(dispose).toHaveBeenCalledWith({ createdFor: "a" }, "a");
  });

  it("should measure against the viewport width", () => {
    const measure = vi.fn<ScrollViewportConfig<Row, string, RowState>["measure"]>((item: Row) => ({ width: 50, height: item.height }));
    const viewport = setup({ measure });
    viewport.layout(rows(10), rect(320, 100));

    expect(measure.mock.calls[0]?.[2]).toEqual({
      minWidth: 0,
      maxWidth: 320,
      maxHeight: Number.POSITIVE_INFINITY,
    });
  });
});

// =============================================================================
// Input and animation
// =============================================================================

describe("input", () => {
  it("should start an animation from a wheel over the viewport", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100, 100, 100), rect(100, 100));

    const result = viewport.update(lineUp, { cursor: inside });

    expect(result).toEqual({ captured: true, redraw: true });
    expect(viewport.getAnimation()).toEqual({ start: 400, target: 320, progress: 0 });
    // translation only moves on redraw ticks
    expect(viewport.getTranslation()).toBe(400);
  });

  it("should ignore the wheel when the cursor is outside or unknown", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100), rect(100, 100));

    expect(viewport.update(lineUp, { cursor: { x: 500, y: 500 } })).toEqual({
      captured: false,
      redraw: false,
    });
    expect(viewport.update(lineUp)).toEqual({ captured: false, redraw: false });
    expect(viewport.isAnimating()).toBe(false);
  });

  it("should page with keys regardless of the cursor", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100), rect(100, 100));

    viewport.update({ type: "keydown", key: "PageUp" });

    expect(viewport.getAnimation()).toEqual({ start: 200, target: 100, progress: 0 });
  });

  it("should leave events a child captured alone", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100), rect(100, 100));

    const result = viewport.update(lineUp, { cursor: inside, captured: true });

    expect(result.captured).toBe(false);
    expect(viewport.isAnimating()).toBe(false);
  });

  it("should read natural scrolling on every event", () => {
    let natural = false;
    const viewport = setup({ naturalScrolling: () => natural });
    viewport.layout(rows(100, 100, 100), rect(100, 100));
    viewport.operate({ type: "scrollTo", offset: 100 });
    viewport.commit();

    natural = true;
    viewport.update(lineUp, { cursor: inside });

    expect(viewport.getAnimation()?.target).toBe(180);
  });

  it("should compose wheel deltas while animating", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100, 100, 100), rect(100, 100));

    viewport.update(lineUp, { cursor: inside });
    viewport.update(lineUp, { cursor: inside });

    expect(viewport.getAnimation()).toEqual({ start: 400, target: 240, progress: 0 });
  });

  it("should interpolate on redraw ticks and land exactly on the target", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100, 100, 100), rect(100, 100));
    viewport.update(lineUp, { cursor: inside });

    const mid = viewport.update({ type: "redraw", time: 10 });
    expect(mid).toEqual({ captured: false, redraw: true });
    expect(viewport.getTranslation()).toBeCloseTo(376, 6);

    const end = viewport.update({ type: "redraw", time: 1000 });
    expect(end.redraw).toBe(false);
    expect(viewport.getTranslation()).toBe(320);
    expect(viewport.isAnimating()).toBe(false);
  });

  it("should not ask for redraws while off screen", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100, 100, 100), rect(100, 100));
    viewport.update(lineUp, { cursor: inside });

    const offscreen = { x: 0, y: 1000, width: 100, height: 100 };
    const result = viewport.update({ type: "redraw", time: 10 }, { visible: offscreen });

    expect(result.redraw).toBe(false);
    expect(viewport.isAnimating()).toBe(true);
  });

  it("should not ask for redraws while entirely hidden", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100, 100, 100), rect(100, 100));
    viewport.update(lineUp, { cursor: inside });

    const result = viewport.update({ type: "redraw", time: 10 }, { visible: null });

    expect(result.redraw).toBe(false);
    expect(viewport.getTranslation()).toBeCloseTo(376, 6);
    expect(viewport.isAnimating()).toBe(true);
  });

  it("should clamp the animation at the content edges", () => {
    const viewport = setup();
    viewport.layout(rows(100, 100), rect(100, 100));
    viewport.operate({ type: "scrollTo", offset: 0 });
    viewport.commit();

    viewport.update({ type: "keydown", key: "PageDown" });
    viewport.update({ type: "keydown", key: "PageDown" });
    expect(viewport.getAnimation()?.target).toBe(200);
    viewport.update({ type: "redraw", time: 1000 });

    expect(viewport.getTranslation()).toBe(100);
  });
});

// =============================================================================
// Operations
// =============================================================================

describe("operations", () => {
  const tall = () => {
    const viewport = setup();
    viewport.layout(rows(100, 100, 100, 100, 100), rect(100, 100));
    return viewport;
  };

  it("should apply queued operations only at commit", () => {
    const viewport = tall();
    viewport.operate({ type: "scrollToIndex", index: 1 });

    expect(viewport.getTranslation()).toBe(400);
    viewport.commit();
    expect(viewport.getTranslation()).toBe(100);
  });

  it("should apply queued operations in order", () => {
    const viewport = tall();
    viewport.operate({ type: "scrollTo", offset: 50 });
    viewport.operate({ type: "scrollBy", delta: 30 });
    viewport.commit();

    expect(viewport.getTranslation()).toBe(80);
  });

  it("should cancel an in-flight animation when jumping to an item", () => {
    const viewport = tall();
    viewport.update(lineUp, { cursor: inside });
    expect(viewport.isAnimating()).toBe(true);

    viewport.operate({ type: "scrollToIndex", index: 0 });
    viewport.commit();

    expect(viewport.isAnimating()).toBe(false);
    expect(viewport.getTranslation()).toBe(0);
  });

  it("should ignore out-of-range and fractional indices", () => {
    const viewport = tall();
    viewport.update(lineUp, { cursor: inside });

    viewport.operate({ type: "scrollToIndex", index: 99 });
    viewport.operate({ type: "scrollToIndex", index: -1 });
    viewport.operate({ type: "scrollToIndex", index: 1.5 });
    viewport.commit();

    expect(viewport.getTranslation()).toBe(400);
    expect(viewport.isAnimating()).toBe(true);
  });

  it("should snap to a fraction of the content height", () => {
    const viewport = tall();
    viewport.operate({ type: "snapTo", fraction: 0.5 });
    viewport.commit();
    expect(viewport.getTranslation()).toBe(250);

    viewport.operate({ type: "snapTo", fraction: 0 });
    viewport.commit();
    expect(viewport.getTranslation()).toBe(0);
  });

  it("should clamp snapping to the end", () => {
    const viewport = tall();
    viewport.operate({ type: "snapTo", fraction: 0 });
    viewport.operate({ type: "snapTo", fraction: 7 });
    viewport.commit();

    expect(viewport.getTranslation()).toBe(400);
    expect(viewport.isAtBottom()).toBe(true);
  });

  it("should clamp absolute and relative scrolls", () => {
    const viewport = tall();
    viewport.operate({ type: "scrollTo", offset: 1e9 });
    viewport.commit();
    expect(viewport.getTranslation()).toBe(400);

    viewport.operate({ type: "scrollBy", delta: -1e9 });
    viewport.commit();
    expect(viewport.getTranslation()).toBe(0);
  });

  it("should ignore non-numeric operations", () => {
    const viewport = tall();
    viewport.operate({ type: "snapTo", fraction: Number.NaN });
    viewport.operate({ type: "scrollTo", offset: Number.NaN });
    viewport.operate({ type: "scrollBy", delta: Number.POSITIVE_INFINITY });
    viewport.commit();

    expect(viewport.getTranslation()).toBe(400);
  });

  it("should join and leave a registry", () => {
    const registry = createViewportRegistry();
    const viewport = setup({ id: "chat", registry });
    viewport.layout(rows(100, 100, 100), rect(100, 100));

    expect(registry.scrollToIndex("chat", 0)).toBe(true);
    viewport.commit();
    expect(viewport.getTranslation()).toBe(0);

    viewport.destroy();
    expect(registry.has("chat")).toBe(false);
  });

  it("should drop operations after destroy", () => {
    const viewport = tall();
    viewport.destroy();
    viewport.operate({ type: "scrollTo", offset: 0 });
    viewport.commit();

    expect(viewport.getTranslation()).toBe(400);
  });
});

// =============================================================================
// Notifications
// =============================================================================

describe("scroll notification", () => {
  it("should fire once per commit that moved the translation", () => {
    const viewport = setup();
    const events: ScrollViewportEvent[] = [];
    viewport.on("scroll", (event) => events.push(event));

    viewport.layout(rows(40, 40, 40), rect(100, 100));
    expect(viewport.commit()).toBe(true);

    expect(events).toEqual([
      {
        translation: 20,
        bounds: { x: 0, y: 0, width: 100, height: 100 },
        contentBounds: { x: 0, y: 0, width: 100, height: 120 },
      },
    ]);
  });

  it("should stay silent when nothing moved", () => {
    const viewport = setup();
    const handler = vi.fn();
    viewport.layout(rows(40, 40, 40), rect(100, 100));
    viewport.commit();
    viewport.on("scroll", handler);

    viewport.operate({ type: "scrollBy", delta: 0 });
    viewport.layout(rows(40, 40, 40), rect(100, 100));

    expect(viewport.commit()).toBe(false);
    expect(handler).not.toHaveBeenCalled();
  });

  it("should stay silent when the translation returned to its committed value", () => {
    const viewport = setup();
    const handler = vi.fn();
    viewport.layout(rows(40, 40, 40), rect(100, 100));
    viewport.commit();
    viewport.on("scroll", handler);

    viewport.operate({ type: "scrollTo", offset: 0 });
    viewport.operate({ type: "scrollTo", offset: 20 });

    expect(viewport.commit()).toBe(false);
    expect(handler).not.toHaveBeenCalled();
  });

  it("should unsubscribe", () => {
    const viewport = setup();
    const handler = vi.fn();
    const off = viewport.on("scroll", handler);
    off();

    viewport.layout(rows(40, 40, 40), rect(100, 100));
    viewport.commit();

    expect(handler).not.toHaveBeenCalled();
  });
});

// =============================================================================
// frame()
// =============================================================================

describe("frame", () => {
  it("should lay out, notify and settle on the first frame", () => {
    const viewport = setup();

    const result = viewport.frame({ entries: rows(100, 100, 100), bounds: rect(100, 100), time: 0 });

    expect(result).toEqual({ redraw: false, scrolled: true });
    expect(viewport.getTranslation()).toBe(200);
  });

  it("should run input then a redraw tick in one frame", () => {
    const viewport = setup();
    const entries = rows(100, 100, 100, 100, 100);
    viewport.frame({ entries, bounds: rect(100, 100), time: 0 });

    const result = viewport.frame({
      entries,
      bounds: rect(100, 100),
      time: 10,
      inputs: [lineUp],
      cursor: inside,
    });

    expect(result).toEqual({ redraw: true, scrolled: true });
    expect(viewport.getTranslation()).toBeCloseTo(376, 6);
  });

  it("should not request a redraw for an animation a queued jump cancelled", () => {
    const viewport = setup();
    const entries = rows(100, 100, 100, 100, 100);
    viewport.frame({ entries, bounds: rect(100, 100), time: 0 });
    viewport.operate({ type: "scrollToIndex", index: 0 });

    const result = viewport.frame({
      entries,
      bounds: rect(100, 100),
      time: 10,
      inputs: [lineUp],
      cursor: inside,
    });

    expect(result.redraw).toBe(false);
    expect(viewport.getTranslation()).toBe(0);
  });
});

// =============================================================================
// Config
// =============================================================================

describe("config validation", () => {
  it("should reject a non-positive animation rate", () => {
    expect(() => setup({ animationRate: 0 })).toThrow(
      "[chatport] animationRate must be a positive number",
    );
  });

  it("should reject a negative epsilon", () => {
    expect(() => setup({ epsilon: -1 })).toThrow(
      "[chatport] epsilon must be a non-negative number",
    );
  });

  it("should require an id alongside a registry", () => {
    expect(() => setup({ registry: createViewportRegistry() })).toThrow(
      "[chatport] id is required when a registry is given",
    );
  });
});
