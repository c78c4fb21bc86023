import { describe, it, expect } from "vitest";
import {
  UNIT_RECT,
  boundsOfLines,
  closestPointOnSegment,
  distanceToRect,
  normalizeRect,
  rectsOverlap,
  segmentProjectionFactor,
  unionRect
} from "../geometry";

const a = { left: 0, top: 0, right: 10, bottom: 5 };
const b = { left: -4, top: 2, right: 3, bottom: 9 };
const c = { left: 20, top: -7, right: 22, bottom: 1 };

describe("rectangles", () => {
  it("unions commutatively and associatively", () => {
    expect(unionRect(a, b)).toEqual(unionRect(b, a));
    expect(unionRect(unionRect(a, b), c)).toEqual(unionRect(a, unionRect(b, c)));
    expect(unionRect(a, b)).toEqual({ left: -4, top: 0, right: 10, bottom: 9 });
  });

  it("unions a rectangle with itself to itself", () => {
    expect(unionRect(a, a)).toEqual(a);
  });

  it("rejects overlap only when one rectangle is wholly to one side", () => {
    expect(rectsOverlap(a, b)).toBe(true);
    expect(rectsOverlap(a, c)).toBe(false);
    expect(rectsOverlap(a, { left: 10, top: 5, right: 12, bottom: 8 })).toBe(true);
  });

  it("replaces non-finite or inverted rectangles with the unit rectangle", () => {
    expect(normalizeRect({ left: 0, top: 0, right: Number.POSITIVE_INFINITY, bottom: 1 })).toEqual(UNIT_RECT);
    expect(normalizeRect({ left: 5, top: 0, right: 1, bottom: 1 })).toEqual(UNIT_RECT);
    expect(normalizeRect(a)).toBe(a);
  });

  it("returns null bounds for lines without points", () => {
    expect(boundsOfLines([[], []])).toBeNull();
    expect(boundsOfLines([[{ x: 1, y: 2 }], [{ x: -1, y: 5 }]])).toEqual({ left: -1, top: 2, right: 1, bottom: 5 });
  });

  it("measures zero distance inside a rectangle", () => {
    expect(distanceToRect({ x: 3, y: 3 }, a)).toBe(0);
    expect(distanceToRect({ x: 13, y: 9 }, a)).toBe(5);
  });
});

describe("segments", () => {
  it("clamps the projection factor to [0, 1]", () => {
    const start = { x: 0, y: 0 };
    const end = { x: 10, y: 0 };
    expect(segmentProjectionFactor({ x: -5, y: 3 }, start, end)).toBe(0);
    expect(segmentProjectionFactor({ x: 25, y: -3 }, start, end)).toBe(1);
    expect(segmentProjectionFactor({ x: 4, y: 8 }, start, end)).toBeCloseTo(0.4, 12);
  });

  it("treats zero-length segments as their start point", () => {
    const hit = closestPointOnSegment({ x: 3, y: 4 }, { x: 0, y: 0 }, { x: 0, y: 0 });
    expect(hit.t).toBe(0);
    expect(hit.distanceSq).toBe(25);
  });

  it("reports zero distance at an endpoint", () => {
    const hit = closestPointOnSegment({ x: 10, y: 0 }, { x: 0, y: 0 }, { x: 10, y: 0 });
    expect(hit.distanceSq).toBe(0);
    expect(hit.closest).toEqual({ x: 10, y: 0 });
  });
});
