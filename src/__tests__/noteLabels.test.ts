import { describe, it, expect } from "vitest";
import { approximateTextMeasurer, buildNoteLabelLayout, cssFont, fitText } from "../noteLabels";
import { ViewportProjector } from "../viewport";

const style = { fontFamily: "Noto Sans KR", fontSize: 10, fontWeight: 600 };

describe("note labels", () => {
  it("keeps text that fits", () => {
    expect(fitText("Spring", style, 120, approximateTextMeasurer)).toBe("Spring");
  });

  it("truncates long text to one line with an ellipsis", () => {
    const fitted = fitText("abcdefghijklmnopqrstuvwxyz0123", style, 120, approximateTextMeasurer);
    expect(fitted).toBe("abcdefghijklmnopqrs…");
  });

  it("centres the padded box on the projected label point", () => {
    const projector = new ViewportProjector(
      { left: 0, top: 0, right: 100, bottom: 100 },
      { width: 100, height: 100 },
      { baselineZoomFactor: 1 }
    );
    const layout = buildNoteLabelLayout(
      { anchorPoint: { x: 10, y: 20 }, labelOffset: { x: 5, y: 5 }, text: "Spring" },
      projector,
      "Gothic A1"
    );
    expect(layout.center).toEqual({ x: 15, y: 75 });
    expect(layout.rect.left).toBeCloseTo(-6, 9);
    expect(layout.rect.right).toBeCloseTo(36, 9);
    expect(layout.rect.top).toBeCloseTo(67, 9);
    expect(layout.rect.bottom).toBeCloseTo(83, 9);
    expect(layout.textOrigin.x).toBeCloseTo(-3, 9);
    expect(layout.textOrigin.y).toBeCloseTo(69, 9);
    expect(layout.style).toEqual({ fontFamily: "Gothic A1", fontSize: 10, fontWeight: 600 });
  });

  it("builds a CSS font with the fallback family", () => {
    expect(cssFont(style)).toBe('600 10px "Noto Sans KR", "Noto Sans KR", sans-serif');
  });
});
