import { DEFAULT_RENDER } from "./settings";
import type { ContourLine } from "./types";

const INTERVAL_THRESHOLDS: ReadonlyArray<{ below: number; interval: number }> = [
  { below: 1.1, interval: 100 },
  { below: 2.0, interval: 40 },
  { below: 3.6, interval: 20 },
  { below: 6.0, interval: 10 }
];

/** Fragments shorter than this are skipped once the interval reaches `FRAGMENT_FILTER_INTERVAL`. */
const MIN_FRAGMENT_POINTS = 3;
const FRAGMENT_FILTER_INTERVAL = 20;
const INDEX_CONTOUR_INTERVAL = 40;
const ZERO_CONTOUR_MAX_INTERVAL = 20;

/** Contours are drawn as if one notch more zoomed in than tracks. */
export function contourRenderScale(viewScale: number, factor = DEFAULT_RENDER.contourScaleFactor): number {
  const safeScale = viewScale > 0 ? viewScale : 1;
  return safeScale * factor;
}

/** Coarsest elevation step to draw at this render scale; 0 means every line. */
export function intervalForScale(renderScale: number): number {
  for (const threshold of INTERVAL_THRESHOLDS) {
    if (renderScale < threshold.below) {
      return threshold.interval;
    }
  }
  return 0;
}

export function shouldDrawContour(contour: Pick<ContourLine, "elevation" | "isMajor">, interval: number): boolean {
  if (interval <= 0) {
    return true;
  }
  const elevation = Math.abs(contour.elevation);
  if (elevation === 0) {
    return contour.isMajor || interval <= ZERO_CONTOUR_MAX_INTERVAL;
  }
  if (elevation % interval === 0) {
    return true;
  }
  // Index contours stay visible when zoomed out even off the interval grid.
  return interval >= INDEX_CONTOUR_INTERVAL && contour.isMajor;
}

/** `shouldDrawContour` plus the short-fragment filter applied when zoomed out. */
export function isContourVisibleAt(contour: ContourLine, interval: number): boolean {
  if (!shouldDrawContour(contour, interval)) {
    return false;
  }
  return !(interval >= FRAGMENT_FILTER_INTERVAL && contour.points.length < MIN_FRAGMENT_POINTS);
}

export interface LegendIntervals {
  majorInterval: number;
  minorInterval: number;
}

export const DEFAULT_LEGEND_INTERVALS: LegendIntervals = { majorInterval: 100, minorInterval: 20 };

/** Infers the dataset's major and minor contour spacing from its elevations. */
export function legendIntervals(lines: readonly Pick<ContourLine, "elevation" | "isMajor">[]): LegendIntervals {
  if (lines.length === 0) {
    return { ...DEFAULT_LEGEND_INTERVALS };
  }
  const major = distinctAbsElevations(lines.filter((line) => line.isMajor));
  const minor = distinctAbsElevations(lines.filter((line) => !line.isMajor));
  const all = distinctAbsElevations(lines);

  const majorInterval = minPositiveStep(major) ?? 100;
  const minorFromMinor = minPositiveStep(minor);
  const minorFromAll = minPositiveStep(all);

  let minorInterval: number;
  if (minorFromMinor !== null) {
    minorInterval = minorFromMinor;
  } else if (minorFromAll !== null && minorFromAll < majorInterval) {
    minorInterval = minorFromAll;
  } else {
    minorInterval = majorInterval >= 100 ? 20 : 10;
  }
  return { majorInterval, minorInterval };
}

function distinctAbsElevations(lines: readonly Pick<ContourLine, "elevation">[]): number[] {
  return Array.from(new Set(lines.map((line) => Math.abs(line.elevation)))).sort((a, b) => a - b);
}

function minPositiveStep(sorted: number[]): number | null {
  if (sorted.length < 2) {
    return null;
  }
  let best = Number.POSITIVE_INFINITY;
  for (let i = 1; i < sorted.length; i += 1) {
    const diff = sorted[i] - sorted[i - 1];
    if (diff > 0 && diff < best) {
      best = diff;
    }
  }
  return Number.isFinite(best) ? best : null;
}
