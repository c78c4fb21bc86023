export interface ViewportSettings {
  /** Multiplier over the fit scale so default views open on mountain-scale detail. */
  baselineZoomFactor: number;
  fitRatio: number;
  minScale: number;
  maxScale: number;
}

export interface BoundsSettings {
  /** World units added on every side of a track's extent. */
  trackMargin: number;
  /** World units added around all tracks when clipping a newly loaded contour source. */
  contourClipMargin: number;
}

export interface NoteHitSettings {
  trackHitPx: number;
  markerHitPx: number;
  labelHitPx: number;
  labelInflateTapPx: number;
  labelInflateDragPx: number;
  dragStartSlopPx: number;
  defaultLabelOffsetPx: { x: number; y: number };
  maxTextLength: number;
}

export interface NoteLabelSettings {
  fontSize: number;
  maxWidthPx: number;
  paddingX: number;
  paddingY: number;
  textColor: string;
  fallbackFontFamily: string;
}

export interface LayerStyleDefaults {
  contourColor: string;
  contourWidth: number;
  contourOpacity: number;
  trackWidth: number;
  trackOpacity: number;
  trackPalette: readonly string[];
}

export interface RenderSettings {
  contourScaleFactor: number;
  contourStroke: { min: number; max: number };
  trackStroke: { min: number; max: number };
  markerRadius: { min: number; max: number };
  startMarkerColor: string;
  endMarkerColor: string;
}

export interface ExportSettings {
  minPixelRatio: number;
  maxPixelRatio: number;
  filePrefix: string;
}

export const DEFAULT_VIEWPORT: ViewportSettings = {
  baselineZoomFactor: 1.6,
  fitRatio: 0.92,
  minScale: 0.2,
  maxScale: 48.0
};

export const DEFAULT_BOUNDS: BoundsSettings = {
  trackMargin: 1400,
  contourClipMargin: 5000
};

export const DEFAULT_NOTE_HIT: NoteHitSettings = {
  trackHitPx: 24,
  markerHitPx: 24,
  labelHitPx: 16,
  labelInflateTapPx: 12,
  labelInflateDragPx: 16,
  dragStartSlopPx: 20,
  defaultLabelOffsetPx: { x: 36, y: 16 },
  maxTextLength: 28
};

export const DEFAULT_NOTE_LABEL: NoteLabelSettings = {
  fontSize: 10,
  maxWidthPx: 120,
  paddingX: 6,
  paddingY: 4,
  textColor: "#22302a",
  fallbackFontFamily: "Noto Sans KR"
};

export const DEFAULT_LAYER_STYLE: LayerStyleDefaults = {
  contourColor: "#2c3e50",
  contourWidth: 2.2,
  contourOpacity: 0.5,
  trackWidth: 2.2,
  trackOpacity: 1.0,
  trackPalette: ["#e74b3c", "#1e7e55", "#0f6cbd", "#d2691e", "#7b5ea7", "#2c3e50"]
};

export const DEFAULT_RENDER: RenderSettings = {
  contourScaleFactor: 1.85,
  contourStroke: { min: 0.03, max: 0.52 },
  trackStroke: { min: 0.4, max: 7.0 },
  markerRadius: { min: 0.7, max: 3.2 },
  startMarkerColor: "#1e7e55",
  endMarkerColor: "#c7292d"
};

export const DEFAULT_EXPORT: ExportSettings = {
  minPixelRatio: 2.0,
  maxPixelRatio: 5.0,
  filePrefix: "contour"
};

export const NOTE_FONT_FAMILIES = [
  "Noto Sans KR",
  "Gothic A1",
  "Nanum Pen Script",
  "Nanum Myeongjo"
] as const;

export type NoteFontFamily = (typeof NOTE_FONT_FAMILIES)[number];

export function resolveNoteFontFamily(family: string | undefined): NoteFontFamily {
  return NOTE_FONT_FAMILIES.find((option) => option === family) ?? NOTE_FONT_FAMILIES[0];
}
