import type { Point } from "./types";

/**
 * Transverse Mercator forward transform for the unified planar grid that the
 * bundled contour datasets were baked in. Imported tracks must go through this
 * exact formula or they will not line up with the contours.
 */
export const GRID = {
  semiMajorAxis: 6378137.0,
  flattening: 1 / 298.257222101,
  scaleFactor: 0.9996,
  originLatDeg: 38.0,
  originLonDeg: 127.5,
  falseEasting: 1_000_000.0,
  falseNorthing: 2_000_000.0
} as const;

const DEG_TO_RAD = Math.PI / 180;

const A = GRID.semiMajorAxis;
const K0 = GRID.scaleFactor;
const E2 = 2 * GRID.flattening - GRID.flattening * GRID.flattening;
const EP2 = E2 / (1 - E2);
const LAT0 = GRID.originLatDeg * DEG_TO_RAD;
const LON0 = GRID.originLonDeg * DEG_TO_RAD;
const M0 = meridionalArc(LAT0);

/** Meridian arc length from the equator to `phi` (radians), series to e⁶. */
export function meridionalArc(phi: number): number {
  const e4 = E2 * E2;
  const e6 = e4 * E2;
  return (
    A *
    ((1 - E2 / 4 - (3 * e4) / 64 - (5 * e6) / 256) * phi -
      ((3 * E2) / 8 + (3 * e4) / 32 + (45 * e6) / 1024) * Math.sin(2 * phi) +
      ((15 * e4) / 256 + (45 * e6) / 1024) * Math.sin(4 * phi) -
      ((35 * e6) / 3072) * Math.sin(6 * phi))
  );
}

/**
 * Projects longitude/latitude in degrees to grid easting (x) and northing (y).
 * NaN or out-of-range input is not checked and yields NaN output.
 */
export function projectLonLat(lonDeg: number, latDeg: number): Point {
  const phi = latDeg * DEG_TO_RAD;
  const lambda = lonDeg * DEG_TO_RAD;
  const sinPhi = Math.sin(phi);
  const cosPhi = Math.cos(phi);
  const tanPhi = Math.tan(phi);

  const n = A / Math.sqrt(1 - E2 * sinPhi * sinPhi);
  const t = tanPhi * tanPhi;
  const c = EP2 * cosPhi * cosPhi;
  const a = cosPhi * (lambda - LON0);
  const m = meridionalArc(phi);

  const x =
    GRID.falseEasting +
    K0 *
      n *
      (a +
        ((1 - t + c) * Math.pow(a, 3)) / 6 +
        ((5 - 18 * t + t * t + 72 * c - 58 * EP2) * Math.pow(a, 5)) / 120);
  const y =
    GRID.falseNorthing +
    K0 *
      (m -
        M0 +
        n *
          tanPhi *
          ((a * a) / 2 +
            ((5 - t + 9 * c + 4 * c * c) * Math.pow(a, 4)) / 24 +
            ((61 - 58 * t + t * t + 600 * c - 330 * EP2) * Math.pow(a, 6)) / 720));
  return { x, y };
}

export function projectLine(lonLat: readonly { lon: number; lat: number }[]): Point[] {
  return lonLat.map((point) => projectLonLat(point.lon, point.lat));
}
