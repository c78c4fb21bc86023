import { DEFAULT_EXPORT, type ExportSettings } from "./settings";
import { clamp } from "./geometry";
import type { LayerStore } from "./layerStore";

export type ExportResult =
  | { status: "saved"; fileName: string; path: string; gallerySaved: boolean; message: string }
  | { status: "busy"; message: string }
  | { status: "failed"; message: string; error: unknown };

export interface SceneExporterOptions<TImage> {
  store: LayerStore;
  /** Renders the current map (decorations included) at the given pixel ratio. */
  capture: (pixelRatio: number) => Promise<TImage>;
  encode: (image: TImage) => Promise<Uint8Array>;
  /** Writes the file and resolves to where it landed. */
  writeFile: (fileName: string, bytes: Uint8Array) => Promise<string>;
  saveToGallery?: (path: string) => Promise<boolean>;
  now?: () => Date;
  devicePixelRatio?: () => number;
  onStatus?: (message: string) => void;
  settings?: Partial<ExportSettings>;
}

export function exportPixelRatio(
  devicePixelRatio: number,
  settings: Pick<ExportSettings, "minPixelRatio" | "maxPixelRatio"> = DEFAULT_EXPORT
): number {
  const ratio = Number.isFinite(devicePixelRatio) && devicePixelRatio > 0 ? devicePixelRatio : 1;
  return clamp(ratio * 2, settings.minPixelRatio, settings.maxPixelRatio);
}

/** `contour_YYYYMMDD_HHMMSS.png` in local time. */
export function exportFileName(date: Date, prefix = DEFAULT_EXPORT.filePrefix, extension = "png"): string {
  const day = `${date.getFullYear()}${twoDigits(date.getMonth() + 1)}${twoDigits(date.getDate())}`;
  const time = `${twoDigits(date.getHours())}${twoDigits(date.getMinutes())}${twoDigits(date.getSeconds())}`;
  return `${prefix}_${day}_${time}.${extension}`;
}

/**
 * Exports the map as a flattened image. Title, north arrow and legend are
 * forced on for the capture and put back afterwards whatever the outcome.
 */
export class SceneExporter<TImage> {
  private options: SceneExporterOptions<TImage>;
  private settings: ExportSettings;
  private exporting: boolean;

  constructor(options: SceneExporterOptions<TImage>) {
    this.options = options;
    this.settings = { ...DEFAULT_EXPORT, ...options.settings };
    this.exporting = false;
  }

  isExporting(): boolean {
    return this.exporting;
  }

  async exportImage(): Promise<ExportResult> {
    if (this.exporting) {
      return { status: "busy", message: "An export is already running." };
    }
    const { store } = this.options;
    const previous = store.getState().decorations;
    this.exporting = true;
    store.setDecorations({ title: true, northArrow: true, legend: true });
    this.report("Exporting image (title, north arrow and legend included)...");

    try {
      const pixelRatio = exportPixelRatio(this.options.devicePixelRatio?.() ?? 1, this.settings);
      const image = await this.options.capture(pixelRatio);
      const bytes = await this.options.encode(image);
      const fileName = exportFileName(this.options.now?.() ?? new Date(), this.settings.filePrefix);
      const path = await this.options.writeFile(fileName, bytes);
      const gallerySaved = await this.saveToGallery(path);
      const message = gallerySaved
        ? `Image saved (gallery included): ${fileName}`
        : `Image saved (file only): ${fileName}`;
      this.report(message);
      return { status: "saved", fileName, path, gallerySaved, message };
    } catch (error) {
      console.error("[export] Image export failed.", error);
      const message = `Image export failed: ${error instanceof Error ? error.message : String(error)}`;
      this.report(message);
      return { status: "failed", message, error };
    } finally {
      store.setDecorations({
        title: previous.title,
        northArrow: previous.northArrow,
        legend: previous.legend
      });
      this.exporting = false;
    }
  }

  private async saveToGallery(path: string): Promise<boolean> {
    if (!this.options.saveToGallery) {
      return false;
    }
    try {
      return await this.options.saveToGallery(path);
    } catch (error) {
      console.warn("[export] Gallery save failed; file kept.", error);
      return false;
    }
  }

  private report(message: string): void {
    this.options.onStatus?.(message);
  }
}

/** The slice of a 2-D context the flatten step draws with. */
export interface RasterContext<TSource> {
  fillStyle: string | CanvasGradient | CanvasPattern;
  fillRect(x: number, y: number, width: number, height: number): void;
  drawImage(image: TSource, dx: number, dy: number): void;
}

export interface RasterCanvas<TSource> {
  width: number;
  height: number;
  getContext(contextId: "2d"): RasterContext<TSource> | null;
  toBlob(callback: (blob: Blob | null) => void, type?: string): void;
}

export interface CanvasExporterOptions<TSource extends { width: number; height: number }>
  extends Omit<SceneExporterOptions<TSource>, "encode"> {
  /** Blank canvas the capture is flattened onto before PNG encoding. */
  createCanvas: () => RasterCanvas<TSource>;
}

/** Draws `source` over an opaque white background on a new canvas. */
export function flattenOnWhite<TSource extends { width: number; height: number }>(
  source: TSource,
  createCanvas: () => RasterCanvas<TSource>
): RasterCanvas<TSource> {
  const canvas = createCanvas();
  canvas.width = source.width;
  canvas.height = source.height;
  const ctx = canvas.getContext("2d");
  if (!ctx) {
    throw new Error("Canvas 2D context unavailable.");
  }
  ctx.fillStyle = "#ffffff";
  ctx.fillRect(0, 0, canvas.width, canvas.height);
  ctx.drawImage(source, 0, 0);
  return canvas;
}

export async function canvasToPngBytes(canvas: Pick<RasterCanvas<unknown>, "toBlob">): Promise<Uint8Array> {
  const blob = await new Promise<Blob>((resolve, reject) => {
    canvas.toBlob((value) => {
      if (!value) {
        reject(new Error("Failed to encode PNG."));
        return;
      }
      resolve(value);
    }, "image/png");
  });
  const buffer = await blob.arrayBuffer();
  return new Uint8Array(buffer);
}

/** Exporter for canvas captures: flattens each capture on white, then encodes it as PNG. */
export function createCanvasExporter<TSource extends { width: number; height: number }>(
  options: CanvasExporterOptions<TSource>
): SceneExporter<TSource> {
  const { createCanvas, ...rest } = options;
  return new SceneExporter<TSource>({
    ...rest,
    encode: async (image) => canvasToPngBytes(flattenOnWhite(image, createCanvas))
  });
}

function twoDigits(value: number): string {
  return value.toString().padStart(2, "0");
}
