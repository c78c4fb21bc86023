export interface Point {
  x: number;
  y: number;
}

/**
 * Axis-aligned bounds. In world space `top` is the minimum Y and `bottom` the
 * maximum Y, matching the `[minX, minY, maxX, maxY]` order of contour datasets.
 */
export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface ContourLine {
  readonly elevation: number;
  readonly isMajor: boolean;
  readonly points: readonly Point[];
}

export interface LayerStyle {
  readonly color: string;
  readonly strokeWidth: number;
  readonly opacity: number;
}

export interface ContourLayer extends LayerStyle {
  readonly id: string;
  readonly sourceId: string;
  readonly name: string;
  readonly bounds: Rect;
  readonly lines: readonly ContourLine[];
  readonly visible: boolean;
}

export interface TrackNote {
  readonly id: string;
  /** World point on the track; fixed once the note exists. */
  readonly anchorPoint: Point;
  readonly text: string;
  /** World vector from the anchor to the label center. */
  readonly labelOffset: Point;
  readonly visible: boolean;
}

export type Polyline = readonly Point[];

export interface TrackLayer extends LayerStyle {
  readonly id: string;
  readonly name: string;
  readonly polylines: readonly Polyline[];
  readonly notes: readonly TrackNote[];
  readonly visible: boolean;
}

export type DecorationKind = "title" | "northArrow" | "legend";

export type Selection =
  | { kind: "none" }
  | { kind: "contour"; id: string }
  | { kind: "track"; id: string }
  | { kind: "decoration"; decoration: DecorationKind };

export interface Decorations {
  title: boolean;
  northArrow: boolean;
  legend: boolean;
  titleText: string;
  titleColor: string;
  titleFontSize: number;
}

export interface ContourSource {
  id: string;
  name: string;
  assetPath: string;
}

export interface LoadedContours {
  bounds: Rect;
  lines: readonly ContourLine[];
}

/** Base dataset shown under every layer; empty when none was bundled. */
export interface BaseOverlay {
  bounds: Rect;
  lines: readonly ContourLine[];
}
