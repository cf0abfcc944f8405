/**
 * chatport - Rectangle Helpers
 * Small pure functions over Rect / Size / Point
 */

import type { Point, Rect, Size } from "../types";

/** Empty rectangle at the origin */
export const ZERO_RECT: Readonly<Rect> = Object.freeze({
  x: 0,
  y: 0,
  width: 0,
  height: 0,
});

export const rectWithSize = (size: Size): Rect => ({
  x: 0,
  y: 0,
  width: size.width,
  height: size.height,
});

/** Smallest rectangle containing both */
export const unionRect = (a: Rect, b: Rect): Rect => {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  const right = Math.max(a.x + a.width, b.x + b.width);
  const bottom = Math.max(a.y + a.height, b.y + b.height);
  return { x, y, width: right - x, height: bottom - y };
};

export const translateRect = (rect: Rect, dx: number, dy: number): Rect => ({
  x: rect.x + dx,
  y: rect.y + dy,
  width: rect.width,
  height: rect.height,
});

/** Overlap test; touching edges count as intersecting */
export const intersects = (a: Rect, b: Rect): boolean =>
  a.x <= b.x + b.width &&
  b.x <= a.x + a.width &&
  a.y <= b.y + b.height &&
  b.y <= a.y + a.height;

export const containsPoint = (rect: Rect, point: Point): boolean =>
  point.x >= rect.x &&
  point.x < rect.x + rect.width &&
  point.y >= rect.y &&
  point.y < rect.y + rect.height;

export const cloneRect = (rect: Rect): Rect => ({
  x: rect.x,
  y: rect.y,
  width: rect.width,
  height: rect.height,
});
