/**
 * chatport - Rectangle Helper Tests
 */

import { describe, it, expect } from "vitest";
import {
  ZERO_RECT,
  unionRect,
  translateRect,
  intersects,
  containsPoint,
  rectWithSize,
} from "../../src/geometry";

describe("unionRect", () => {
  it("should grow the zero rect to cover a rect below it", () => {
    expect(unionRect(ZERO_RECT, { x: 0, y: 40, width: 300, height: 20 })).toEqual({
      x: 0,
      y: 0,
      width: 300,
      height: 60,
    });
  });

  it("should take the widest extent", () => {
    const a = { x: 0, y: 0, width: 100, height: 10 };
    const b = { x: 0, y: 10, width: 250, height: 10 };
    expect(unionRect(a, b)).toEqual({ x: 0, y: 0, width: 250, height: 20 });
  });
});

describe("translateRect", () => {
  it("should move without resizing", () => {
    expect(translateRect({ x: 1, y: 2, width: 3, height: 4 }, 10, 20)).toEqual({
      x: 11,
      y: 22,
      width: 3,
      height: 4,
    });
  });
});

describe("intersects", () => {
  const viewport = { x: 0, y: 0, width: 100, height: 100 };

  it("should detect overlap", () => {
    expect(intersects(viewport, { x: 50, y: 50, width: 100, height: 100 })).toBe(true);
  });

  it("should reject disjoint rects", () => {
    expect(intersects(viewport, { x: 0, y: 200, width: 100, height: 100 })).toBe(false);
  });
});

describe("containsPoint", () => {
  const rect = rectWithSize({ width: 100, height: 50 });

  it("should include the top-left corner", () => {
    expect(containsPoint(rect, { x: 0, y: 0 })).toBe(true);
  });

  it("should exclude the bottom edge", () => {
    expect(containsPoint(rect, { x: 10, y: 50 })).toBe(false);
  });
});
