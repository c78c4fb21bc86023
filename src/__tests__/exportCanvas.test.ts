// @vitest-environment node
import { describe, it, expect } from "vitest";
import { LayerStore } from "../layerStore";
import { canvasToPngBytes, createCanvasExporter, flattenOnWhite, type RasterCanvas } from "../exportImage";

interface Capture {
  width: number;
  height: number;
}

function fakeCanvas(calls: string[], blob: Blob | null = new Blob([Uint8Array.of(1, 2, 3)])) {
  const ctx = {
    fillStyle: "",
    fillRect: (x: number, y: number, width: number, height: number) => {
      calls.push(`fillRect ${ctx.fillStyle} ${x},${y},${width},${height}`);
    },
    drawImage: (image: Capture, dx: number, dy: number) => {
      calls.push(`drawImage ${image.width}x${image.height} at ${dx},${dy}`);
    }
  };
  const canvas: RasterCanvas<Capture> = {
    width: 0,
    height: 0,
    getContext: () => ctx,
    toBlob: (callback, type) => {
      calls.push(`toBlob ${type ?? ""}`);
      callback(blob);
    }
  };
  return canvas;
}

describe("flattenOnWhite", () => {
  it("paints white under the capture at the capture's size", () => {
    const calls: string[] = [];
    const flat = flattenOnWhite({ width: 640, height: 480 }, () => fakeCanvas(calls));
    expect(calls).toEqual(["fillRect #ffffff 0,0,640,480", "drawImage 640x480 at 0,0"]);
    expect([flat.width, flat.height]).toEqual([640, 480]);
  });

  it("fails without a 2-D context", () => {
    const canvas: RasterCanvas<Capture> = {
      width: 0,
      height: 0,
      getContext: () => null,
      toBlob: () => undefined
    };
    expect(() => flattenOnWhite({ width: 1, height: 1 }, () => canvas)).toThrow("Canvas 2D context unavailable.");
  });
});

describe("canvasToPngBytes", () => {
  it("rejects when the canvas produces no blob", async () => {
    await expect(canvasToPngBytes(fakeCanvas([], null))).rejects.toThrow("Failed to encode PNG.");
  });
});

describe("createCanvasExporter", () => {
  it("flattens each capture before writing PNG bytes", async () => {
    const calls: string[] = [];
    const written: Uint8Array[] = [];
    const exporter = createCanvasExporter<Capture>({
      store: new LayerStore(),
      capture: async (pixelRatio) => ({ width: 100 * pixelRatio, height: 50 * pixelRatio }),
      createCanvas: () => fakeCanvas(calls),
      writeFile: async (fileName, bytes) => {
        written.push(bytes);
        return `/exports/${fileName}`;
      },
      now: () => new Date(2024, 0, 2, 3, 4, 5),
      devicePixelRatio: () => 1
    });

    const result = await exporter.exportImage();
    expect(result.message).toBe("Image saved (file only): contour_20240102_030405.png");
    expect(calls).toEqual(["fillRect #ffffff 0,0,200,100", "drawImage 200x100 at 0,0", "toBlob image/png"]);
    expect(Array.from(written[0])).toEqual([1, 2, 3]);
  });
});
