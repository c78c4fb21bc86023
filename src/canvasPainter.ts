import { cssFont } from "./noteLabels";
import type { DrawOp, FillStyle, StrokeStyle } from "./scene";

export type PaintContext = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "arc"
  | "stroke"
  | "fill"
  | "fillText"
  | "strokeStyle"
  | "fillStyle"
  | "globalAlpha"
  | "lineWidth"
  | "lineCap"
  | "lineJoin"
  | "font"
  | "textBaseline"
>;

/** Replays scene operations onto a 2-D context. The caller sets any transform first. */
export function paintScene(ctx: PaintContext, ops: readonly DrawOp[]): void {
  for (const op of ops) {
    ctx.save();
    switch (op.kind) {
      case "polyline":
        if (op.points.length > 0) {
          ctx.beginPath();
          ctx.moveTo(op.points[0].x, op.points[0].y);
          for (let i = 1; i < op.points.length; i += 1) {
            ctx.lineTo(op.points[i].x, op.points[i].y);
          }
          applyStroke(ctx, op.stroke);
          ctx.stroke();
        }
        break;
      case "circle":
        ctx.beginPath();
        ctx.arc(op.center.x, op.center.y, op.radius, 0, Math.PI * 2);
        if (op.fill) {
          applyFill(ctx, op.fill);
          ctx.fill();
        }
        if (op.stroke) {
          applyStroke(ctx, op.stroke);
          ctx.stroke();
        }
        break;
      case "line":
        ctx.beginPath();
        ctx.moveTo(op.from.x, op.from.y);
        ctx.lineTo(op.to.x, op.to.y);
        applyStroke(ctx, op.stroke);
        ctx.stroke();
        break;
      case "text":
        applyFill(ctx, op.fill);
        ctx.font = cssFont(op.style);
        ctx.textBaseline = "top";
        ctx.fillText(op.text, op.origin.x, op.origin.y);
        break;
    }
    ctx.restore();
  }
}

function applyStroke(ctx: PaintContext, stroke: StrokeStyle): void {
  ctx.strokeStyle = stroke.color;
  ctx.globalAlpha = stroke.alpha / 255;
  ctx.lineWidth = stroke.width;
  ctx.lineCap = stroke.cap;
  ctx.lineJoin = stroke.join;
}

function applyFill(ctx: PaintContext, fill: FillStyle): void {
  ctx.fillStyle = fill.color;
  ctx.globalAlpha = fill.alpha / 255;
}
