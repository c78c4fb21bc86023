import { DEFAULT_NOTE_LABEL, type NoteLabelSettings } from "./settings";
import { addPoints, rectFromCenter } from "./geometry";
import type { Point, Rect, TrackNote } from "./types";
import type { ViewportProjector } from "./viewport";

export interface TextMetrics {
  width: number;
  height: number;
}

export interface TextStyle {
  fontFamily: string;
  fontSize: number;
  fontWeight: number;
}

/** Measures one line of text in canvas pixels. */
export interface TextMeasurer {
  measure(text: string, style: TextStyle): TextMetrics;
}

export interface NoteLabelLayout {
  /** Label box in canvas pixels, centred on the projected label center. */
  rect: Rect;
  center: Point;
  /** Text after ellipsis truncation. */
  text: string;
  textOrigin: Point;
  style: TextStyle;
}

const ELLIPSIS = "…";
const AVERAGE_CHAR_WIDTH_EM = 0.6;
const LINE_HEIGHT_EM = 1.2;

/** Fixed-advance measurer for environments without a canvas. */
export const approximateTextMeasurer: TextMeasurer = {
  measure(text, style) {
    return {
      width: Array.from(text).length * style.fontSize * AVERAGE_CHAR_WIDTH_EM,
      height: style.fontSize * LINE_HEIGHT_EM
    };
  }
};

export function createCanvasTextMeasurer(ctx: CanvasRenderingContext2D): TextMeasurer {
  return {
    measure(text, style) {
      ctx.save();
      ctx.font = cssFont(style);
      const metrics = ctx.measureText(text);
      ctx.restore();
      return { width: metrics.width, height: style.fontSize * LINE_HEIGHT_EM };
    }
  };
}

export function cssFont(style: TextStyle): string {
  return `${style.fontWeight} ${style.fontSize}px "${style.fontFamily}", "${DEFAULT_NOTE_LABEL.fallbackFontFamily}", sans-serif`;
}

export function buildNoteLabelLayout(
  note: Pick<TrackNote, "anchorPoint" | "labelOffset" | "text">,
  projector: ViewportProjector,
  fontFamily: string,
  measurer: TextMeasurer = approximateTextMeasurer,
  settings: NoteLabelSettings = DEFAULT_NOTE_LABEL
): NoteLabelLayout {
  const style: TextStyle = { fontFamily, fontSize: settings.fontSize, fontWeight: 600 };
  const text = fitText(note.text, style, settings.maxWidthPx, measurer);
  const metrics = measurer.measure(text, style);
  const center = projector.toCanvas(addPoints(note.anchorPoint, note.labelOffset));
  const rect = rectFromCenter(center, metrics.width + settings.paddingX, metrics.height + settings.paddingY);
  return {
    rect,
    center,
    text,
    textOrigin: { x: rect.left + settings.paddingX / 2, y: rect.top + settings.paddingY / 2 },
    style
  };
}

/** Truncates to one line no wider than `maxWidth`, ending in an ellipsis when cut. */
export function fitText(text: string, style: TextStyle, maxWidth: number, measurer: TextMeasurer): string {
  if (measurer.measure(text, style).width <= maxWidth) {
    return text;
  }
  const chars = Array.from(text);
  let low = 0;
  let high = chars.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    const candidate = chars.slice(0, mid).join("") + ELLIPSIS;
    if (measurer.measure(candidate, style).width <= maxWidth) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return chars.slice(0, low).join("") + ELLIPSIS;
}
