import { DEFAULT_VIEWPORT, type ViewportSettings } from "./settings";
import { clamp, normalizeRect, rectCenter, rectFromCorners, rectHeight, rectWidth } from "./geometry";
import type { Point, Rect, Size } from "./types";

/** Pan/zoom applied on top of the base fit: screen = scene * scale + translate. */
export interface ViewTransform {
  scale: number;
  translateX: number;
  translateY: number;
}

export const IDENTITY_TRANSFORM: Readonly<ViewTransform> = Object.freeze({
  scale: 1,
  translateX: 0,
  translateY: 0
});

/**
 * Maps world coordinates (Y up) to scene pixels (Y down) for one canvas size.
 * The world rectangle is scaled to fit and then zoomed by the baseline factor,
 * so the default view opens closer than the full extent.
 */
export class ViewportProjector {
  readonly world: Rect;
  readonly canvas: Size;
  readonly scale: number;
  readonly leftPad: number;
  readonly topPad: number;

  constructor(world: Rect, canvas: Size, settings: Partial<ViewportSettings> = {}) {
    const baseline = settings.baselineZoomFactor ?? DEFAULT_VIEWPORT.baselineZoomFactor;
    const safeWorld = normalizeRect(world);
    const width = rectWidth(safeWorld) > 0 ? rectWidth(safeWorld) : 1;
    const height = rectHeight(safeWorld) > 0 ? rectHeight(safeWorld) : 1;
    this.world = safeWorld;
    this.canvas = canvas;
    const fitted = Math.min(canvas.width / width, canvas.height / height) * baseline;
    this.scale = Number.isFinite(fitted) && fitted > 0 ? fitted : 1;
    this.leftPad = (canvas.width - width * this.scale) / 2;
    this.topPad = (canvas.height - height * this.scale) / 2;
  }

  toCanvas(point: Point): Point {
    return {
      x: this.leftPad + (point.x - this.world.left) * this.scale,
      y: this.topPad + (this.world.bottom - point.y) * this.scale
    };
  }

  toWorld(point: Point): Point {
    return {
      x: this.world.left + (point.x - this.leftPad) / this.scale,
      y: this.world.bottom - (point.y - this.topPad) / this.scale
    };
  }

  /** Converts a canvas-pixel length into world units at this projector's scale. */
  pixelsToWorld(pixels: number): number {
    return pixels / Math.max(this.scale, 0.0001);
  }
}

/** Undoes the pan/zoom transform: screen (widget-local) point to scene point. */
export function toScene(transform: ViewTransform, local: Point): Point {
  return {
    x: (local.x - transform.translateX) / transform.scale,
    y: (local.y - transform.translateY) / transform.scale
  };
}

export function toScreen(transform: ViewTransform, scene: Point): Point {
  return {
    x: scene.x * transform.scale + transform.translateX,
    y: scene.y * transform.scale + transform.translateY
  };
}

/** Zooms around a screen point so the scene point under it stays put. */
export function zoomAt(
  transform: ViewTransform,
  focal: Point,
  factor: number,
  settings: Partial<ViewportSettings> = {}
): ViewTransform {
  const minScale = settings.minScale ?? DEFAULT_VIEWPORT.minScale;
  const maxScale = settings.maxScale ?? DEFAULT_VIEWPORT.maxScale;
  const nextScale = clamp(transform.scale * factor, minScale, maxScale);
  if (Math.abs(nextScale - transform.scale) < 1e-4) {
    return transform;
  }
  const sceneFocal = toScene(transform, focal);
  return {
    scale: nextScale,
    translateX: focal.x - sceneFocal.x * nextScale,
    translateY: focal.y - sceneFocal.y * nextScale
  };
}

export function panBy(transform: ViewTransform, dx: number, dy: number): ViewTransform {
  return {
    scale: transform.scale,
    translateX: transform.translateX + dx,
    translateY: transform.translateY + dy
  };
}

/**
 * Builds the transform that centres `target` (world) in the viewport. Without
 * a measured viewport or a target, returns the identity transform.
 */
export function fitToBounds(
  projector: ViewportProjector | null,
  target: Rect | null,
  viewport: Size | null,
  settings: Partial<ViewportSettings> = {}
): ViewTransform {
  if (!projector || !target || !viewport || viewport.width <= 0 || viewport.height <= 0) {
    return { ...IDENTITY_TRANSFORM };
  }
  const fitRatio = settings.fitRatio ?? DEFAULT_VIEWPORT.fitRatio;
  const minScale = settings.minScale ?? DEFAULT_VIEWPORT.minScale;
  const maxScale = settings.maxScale ?? DEFAULT_VIEWPORT.maxScale;

  const a = projector.toCanvas({ x: target.left, y: target.top });
  const b = projector.toCanvas({ x: target.right, y: target.bottom });
  const targetRect = rectFromCorners(a, b);

  const fitScaleX = (viewport.width * fitRatio) / Math.max(rectWidth(targetRect), 1);
  const fitScaleY = (viewport.height * fitRatio) / Math.max(rectHeight(targetRect), 1);
  const scale = clamp(Math.min(fitScaleX, fitScaleY), minScale, maxScale);

  const center = rectCenter(targetRect);
  return {
    scale,
    translateX: viewport.width / 2 - center.x * scale,
    translateY: viewport.height / 2 - center.y * scale
  };
}
