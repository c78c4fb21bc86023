import { DEFAULT_LAYER_STYLE, DEFAULT_NOTE_LABEL, DEFAULT_RENDER, type RenderSettings } from "./settings";
import { clamp } from "./geometry";
import { contourRenderScale, intervalForScale, isContourVisibleAt } from "./contourLod";
import { approximateTextMeasurer, buildNoteLabelLayout, type TextMeasurer, type TextStyle } from "./noteLabels";
import type { ViewportProjector } from "./viewport";
import type { ContourLine, LayerStyle, Point, TrackLayer } from "./types";
import type { LayerStoreState } from "./layerStore";

export interface StrokeStyle {
  color: string;
  /** 0-255 */
  alpha: number;
  width: number;
  cap: "butt" | "round";
  join: "bevel" | "round";
}

export interface FillStyle {
  color: string;
  alpha: number;
}

export type DrawOp =
  | { kind: "polyline"; points: Point[]; stroke: StrokeStyle }
  | { kind: "circle"; center: Point; radius: number; fill?: FillStyle; stroke?: StrokeStyle }
  | { kind: "line"; from: Point; to: Point; stroke: StrokeStyle }
  | { kind: "text"; text: string; origin: Point; style: TextStyle; fill: FillStyle };

export interface SceneInput {
  layers: Pick<LayerStoreState, "base" | "contourLayers" | "tracks">;
  projector: ViewportProjector;
  /** Gesture scale of the current pan/zoom transform. */
  viewScale: number;
  fontFamily: string;
  measurer?: TextMeasurer;
  settings?: Partial<RenderSettings>;
}

const LAYER_WIDTH_RANGE = { min: 0.3, max: 6 };
const MINOR_WIDTH_FACTOR = 0.08;
const MAJOR_WIDTH_FACTOR = 0.14;
const MINOR_ALPHA_FACTOR = 0.75;
const END_MARKER_BASE_RADIUS = 1.4;
const NOTE_MARKER_BASE_RADIUS = 1.8;
const NOTE_MARKER_PADDING = 0.6;
const NOTE_MARKER_FILL_ALPHA = 235;
const NOTE_MARKER_STROKE_ALPHA = 220;
const LEADER_BASE_WIDTH = 0.35;
const LEADER_WIDTH_RANGE = { min: 0.3, max: 1 };
const LEADER_ALPHA = 145;

const BASE_STYLE: LayerStyle = {
  color: DEFAULT_LAYER_STYLE.contourColor,
  strokeWidth: DEFAULT_LAYER_STYLE.contourWidth,
  opacity: DEFAULT_LAYER_STYLE.contourOpacity
};

/**
 * Ordered draw operations for one frame, in scene pixels: contours (minor
 * before major, per layer), then each visible track with its end markers and
 * notes. Pure; reads nothing but its input.
 */
export function buildScene(input: SceneInput): DrawOp[] {
  const settings: RenderSettings = { ...DEFAULT_RENDER, ...input.settings };
  const safeScale = input.viewScale > 0 ? input.viewScale : 1;
  const renderScale = contourRenderScale(safeScale, settings.contourScaleFactor);
  const interval = intervalForScale(renderScale);
  const ops: DrawOp[] = [];

  const { base, contourLayers, tracks } = input.layers;
  if (base.lines.length > 0) {
    pushContours(ops, base.lines, BASE_STYLE, interval, renderScale, input.projector, settings);
  }
  for (const layer of contourLayers) {
    if (layer.visible) {
      pushContours(ops, layer.lines, layer, interval, renderScale, input.projector, settings);
    }
  }
  for (const track of tracks) {
    if (track.visible) {
      pushTrack(ops, track, safeScale, input, settings);
    }
  }
  return ops;
}

function pushContours(
  ops: DrawOp[],
  lines: readonly ContourLine[],
  style: LayerStyle,
  interval: number,
  renderScale: number,
  projector: ViewportProjector,
  settings: RenderSettings
): void {
  const layerWidth = clamp(style.strokeWidth, LAYER_WIDTH_RANGE.min, LAYER_WIDTH_RANGE.max);
  const opacity = clamp(style.opacity, 0, 1);
  const contourStroke = (base: number): number =>
    clamp(base / renderScale, settings.contourStroke.min, settings.contourStroke.max);

  const minor: StrokeStyle = {
    color: style.color,
    alpha: toAlpha(opacity * MINOR_ALPHA_FACTOR),
    width: contourStroke(MINOR_WIDTH_FACTOR * layerWidth),
    cap: "butt",
    join: "bevel"
  };
  const major: StrokeStyle = {
    ...minor,
    alpha: toAlpha(opacity),
    width: contourStroke(MAJOR_WIDTH_FACTOR * layerWidth)
  };

  const visible = lines.filter((line) => isContourVisibleAt(line, interval));
  for (const pass of [false, true]) {
    for (const line of visible) {
      if (line.isMajor === pass) {
        ops.push({
          kind: "polyline",
          points: line.points.map((point) => projector.toCanvas(point)),
          stroke: pass ? major : minor
        });
      }
    }
  }
}

function pushTrack(
  ops: DrawOp[],
  track: TrackLayer,
  scale: number,
  input: SceneInput,
  settings: RenderSettings
): void {
  const { projector } = input;
  const trackStroke = (base: number): number =>
    clamp(base / scale, settings.trackStroke.min, settings.trackStroke.max);
  const markerRadius = (base: number): number =>
    clamp(base / scale, settings.markerRadius.min, settings.markerRadius.max);

  const stroke: StrokeStyle = {
    color: track.color,
    alpha: toAlpha(clamp(track.opacity, 0, 1)),
    width: trackStroke(track.strokeWidth),
    cap: "round",
    join: "round"
  };
  for (const line of track.polylines) {
    ops.push({ kind: "polyline", points: line.map((point) => projector.toCanvas(point)), stroke });
  }

  const first = track.polylines[0];
  const last = track.polylines[track.polylines.length - 1];
  if (first && first.length > 0 && last.length > 0) {
    const radius = markerRadius(END_MARKER_BASE_RADIUS);
    ops.push({
      kind: "circle",
      center: projector.toCanvas(first[0]),
      radius,
      fill: { color: settings.startMarkerColor, alpha: 255 }
    });
    ops.push({
      kind: "circle",
      center: projector.toCanvas(last[last.length - 1]),
      radius,
      fill: { color: settings.endMarkerColor, alpha: 255 }
    });
  }

  const leaderWidth = clamp(trackStroke(LEADER_BASE_WIDTH), LEADER_WIDTH_RANGE.min, LEADER_WIDTH_RANGE.max);
  for (const note of track.notes) {
    if (!note.visible) {
      continue;
    }
    const center = projector.toCanvas(note.anchorPoint);
    const radius = markerRadius(NOTE_MARKER_BASE_RADIUS) + NOTE_MARKER_PADDING;
    ops.push({
      kind: "circle",
      center,
      radius,
      fill: { color: "#ffffff", alpha: NOTE_MARKER_FILL_ALPHA },
      stroke: { color: track.color, alpha: NOTE_MARKER_STROKE_ALPHA, width: 1, cap: "butt", join: "bevel" }
    });
    const layout = buildNoteLabelLayout(note, projector, input.fontFamily, input.measurer ?? approximateTextMeasurer);
    ops.push({
      kind: "line",
      from: center,
      to: layout.center,
      stroke: { color: track.color, alpha: LEADER_ALPHA, width: leaderWidth, cap: "round", join: "round" }
    });
    ops.push({
      kind: "text",
      text: layout.text,
      origin: layout.textOrigin,
      style: layout.style,
      fill: { color: DEFAULT_NOTE_LABEL.textColor, alpha: 255 }
    });
  }
}

function toAlpha(fraction: number): number {
  return clamp(Math.round(255 * fraction), 0, 255);
}
