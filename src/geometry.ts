import type { Point, Rect } from "./types";

export const UNIT_RECT: Readonly<Rect> = Object.freeze({ left: 0, top: 0, right: 1, bottom: 1 });

export interface SegmentHit {
  closest: Point;
  t: number;
  distanceSq: number;
}

export function rectWidth(rect: Rect): number {
  return rect.right - rect.left;
}

export function rectHeight(rect: Rect): number {
  return rect.bottom - rect.top;
}

export function rectCenter(rect: Rect): Point {
  return { x: (rect.left + rect.right) / 2, y: (rect.top + rect.bottom) / 2 };
}

export function isFiniteRect(rect: Rect): boolean {
  return (
    Number.isFinite(rect.left) &&
    Number.isFinite(rect.top) &&
    Number.isFinite(rect.right) &&
    Number.isFinite(rect.bottom)
  );
}

/** Returns the rectangle as is, or the unit rectangle when it is not finite or inverted. */
export function normalizeRect(rect: Rect): Rect {
  if (!isFiniteRect(rect) || rect.right < rect.left || rect.bottom < rect.top) {
    return { ...UNIT_RECT };
  }
  return rect;
}

export function unionRect(a: Rect, b: Rect): Rect {
  return {
    left: Math.min(a.left, b.left),
    top: Math.min(a.top, b.top),
    right: Math.max(a.right, b.right),
    bottom: Math.max(a.bottom, b.bottom)
  };
}

export function inflateRect(rect: Rect, delta: number): Rect {
  return {
    left: rect.left - delta,
    top: rect.top - delta,
    right: rect.right + delta,
    bottom: rect.bottom + delta
  };
}

export function rectsOverlap(a: Rect, b: Rect): boolean {
  return !(a.right < b.left || a.left > b.right || a.bottom < b.top || a.top > b.bottom);
}

export function rectFromCenter(center: Point, width: number, height: number): Rect {
  return {
    left: center.x - width / 2,
    top: center.y - height / 2,
    right: center.x + width / 2,
    bottom: center.y + height / 2
  };
}

export function rectFromCorners(a: Point, b: Point): Rect {
  return {
    left: Math.min(a.x, b.x),
    top: Math.min(a.y, b.y),
    right: Math.max(a.x, b.x),
    bottom: Math.max(a.y, b.y)
  };
}

export function boundsOfPoints(points: readonly Point[]): Rect | null {
  if (points.length === 0) {
    return null;
  }
  let left = points[0].x;
  let top = points[0].y;
  let right = points[0].x;
  let bottom = points[0].y;
  for (let i = 1; i < points.length; i += 1) {
    const point = points[i];
    if (point.x < left) left = point.x;
    if (point.y < top) top = point.y;
    if (point.x > right) right = point.x;
    if (point.y > bottom) bottom = point.y;
  }
  return { left, top, right, bottom };
}

export function boundsOfLines(lines: readonly (readonly Point[])[]): Rect | null {
  let bounds: Rect | null = null;
  for (const line of lines) {
    const lineBounds = boundsOfPoints(line);
    if (lineBounds) {
      bounds = bounds ? unionRect(bounds, lineBounds) : lineBounds;
    }
  }
  return bounds;
}

/** Scalar projection of `point` onto segment a→b, clamped to [0, 1]. Zero-length segments give 0. */
export function segmentProjectionFactor(point: Point, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSq = dx * dx + dy * dy;
  if (lengthSq <= 0) {
    return 0;
  }
  const t = ((point.x - a.x) * dx + (point.y - a.y) * dy) / lengthSq;
  return clamp(t, 0, 1);
}

export function closestPointOnSegment(point: Point, a: Point, b: Point): SegmentHit {
  const t = segmentProjectionFactor(point, a, b);
  const closest = lerpPoint(a, b, t);
  const ex = point.x - closest.x;
  const ey = point.y - closest.y;
  return { closest, t, distanceSq: ex * ex + ey * ey };
}

export function distanceToRect(point: Point, rect: Rect): number {
  const dx = point.x < rect.left ? rect.left - point.x : point.x > rect.right ? point.x - rect.right : 0;
  const dy = point.y < rect.top ? rect.top - point.y : point.y > rect.bottom ? point.y - rect.bottom : 0;
  return Math.sqrt(dx * dx + dy * dy);
}

export function lerpPoint(a: Point, b: Point, t: number): Point {
  return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
}

export function addPoints(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtractPoints(a: Point, b: Point): Point {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}
