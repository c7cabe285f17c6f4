import {
  BLACK,
  WHITE,
  circle,
  line,
  rect,
  rgba8,
  scale,
  translate,
} from "@brushwork/core";
import { IDENTITY_2F, type Path2D, type PixelImage } from "@brushwork/canvas";
import { describe, expect, it } from "vitest";
import { CompositeFontSource } from "../src/fonts/composite-font-source.js";
import { VectorRenderContext } from "../src/render-context.js";
import { thrownKind } from "./helpers/errors.js";
import { RecordingCanvas } from "./helpers/recording-canvas.js";

function setup(): { canvas: RecordingCanvas; ctx: VectorRenderContext } {
  const canvas = new RecordingCanvas();
  return { canvas, ctx: new VectorRenderContext(canvas, new CompositeFontSource()) };
}

function pathsDrawn(canvas: RecordingCanvas): Path2D[] {
  const paths: Path2D[] = [];
  for (const call of canvas.calls) {
    if (call.method === "strokePath" || call.method === "fillPath" || call.method === "clipPath") {
      paths.push(call.args[0]);
    }
  }
  return paths;
}

function drawnImage(canvas: RecordingCanvas): PixelImage {
  for (const call of canvas.calls) {
    if (call.method === "drawImage") return call.args[0].toPattern(IDENTITY_2F).image;
  }
  throw new Error("no image drawn");
}

const SQUARE = { x: 0, y: 0, width: 4, height: 4 };
const BLACK_STYLE = { kind: "color", color: { r: 0, g: 0, b: 0, a: 255 } };

describe("VectorRenderContext", () => {
  it("strokes a rect with one path, one stroke and the given width", () => {
    const { canvas, ctx } = setup();
    ctx.stroke(rect(75, 140, 150, 110), ctx.solidBrush(BLACK), 10);

    expect(canvas.calls).toEqual([
      { method: "setStrokeStyle", args: [BLACK_STYLE] },
      { method: "setLineWidth", args: [10] },
      { method: "strokePath", args: [expect.anything()] },
    ]);
    const [path] = pathsDrawn(canvas);
    const [cmd] = path.commands;
    if (cmd.op !== "rect") throw new Error("expected a rect command");
    expect(cmd.rect.origin).toEqual({ x: 75, y: 140 });
    expect({
      x: cmd.rect.origin.x + cmd.rect.size.x,
      y: cmd.rect.origin.y + cmd.rect.size.y,
    }).toEqual({ x: 225, y: 250 });
  });

  it("narrows stroke widths to single precision", () => {
    const { canvas, ctx } = setup();
    ctx.stroke(line({ x: 0, y: 0 }, { x: 1, y: 1 }), ctx.solidBrush(BLACK), 0.1);
    expect(canvas.calls[1]).toEqual({ method: "setLineWidth", args: [Math.fround(0.1)] });
  });

  it("strokes styled shapes like plain strokes", () => {
    const { canvas, ctx } = setup();
    ctx.strokeStyled(rect(0, 0, 1, 1), ctx.solidBrush(BLACK), 2, {
      dash: { pattern: [4, 2], offset: 0 },
      lineCap: "round",
    });
    expect(canvas.methods()).toEqual(["setStrokeStyle", "setLineWidth", "strokePath"]);
  });

  it("fills with the winding or even-odd rule", () => {
    const { canvas, ctx } = setup();
    ctx.fill(circle({ x: 0, y: 0 }, 1), ctx.solidBrush(WHITE));
    ctx.fillEvenOdd(circle({ x: 0, y: 0 }, 1), ctx.solidBrush(WHITE));

    const rules = canvas.calls.flatMap((c) => (c.method === "fillPath" ? [c.args[1]] : []));
    expect(rules).toEqual(["winding", "even-odd"]);
    expect(canvas.methods()).toEqual(["setFillStyle", "fillPath", "setFillStyle", "fillPath"]);
  });

  it("fails a gradient draw before touching the canvas", () => {
    const { canvas, ctx } = setup();
    const brush = ctx.gradient({
      kind: "radial",
      center: { x: 0, y: 0 },
      originOffset: { x: 0, y: 0 },
      radius: 5,
      stops: [],
    });
    expect(thrownKind(() => ctx.fill(rect(0, 0, 1, 1), brush))).toBe("not-supported");
    expect(thrownKind(() => ctx.stroke(rect(0, 0, 1, 1), brush, 1))).toBe("not-supported");
    expect(thrownKind(() => ctx.blurredRect(SQUARE, 1, brush))).toBe("not-supported");
    expect(canvas.calls).toEqual([]);
  });

  it("fills a cleared region with the color", () => {
    const { canvas, ctx } = setup();
    ctx.clear({ x: 1, y: 2, width: 3, height: 4 }, WHITE);
    expect(canvas.calls).toEqual([
      { method: "setFillStyle", args: [{ kind: "color", color: { r: 255, g: 255, b: 255, a: 255 } }] },
      { method: "fillRect", args: [{ origin: { x: 1, y: 2 }, size: { x: 3, y: 4 } }] },
    ]);
  });

  it("clears the whole canvas without a region", () => {
    const { canvas, ctx } = setup();
    ctx.clear(undefined, WHITE);
    expect(canvas.methods()).toEqual(["clear"]);
  });

  it("clips with the winding rule", () => {
    const { canvas, ctx } = setup();
    ctx.save();
    ctx.clip(rect(0, 0, 10, 10));
    ctx.restore();
    expect(canvas.methods()).toEqual(["save", "clipPath", "restore"]);
    expect(canvas.calls[1]).toEqual({ method: "clipPath", args: [expect.anything(), "winding"] });
  });

  it("replaces the transform rather than composing", () => {
    const { ctx } = setup();
    ctx.transform(translate(10, 0));
    ctx.transform(scale(2));
    expect(ctx.currentTransform()).toEqual([2, 0, 0, 2, 0, 0]);
  });

  it("reads back the transform it set", () => {
    const { ctx } = setup();
    ctx.transform([1, 0.5, -0.5, 1, 3, 4]);
    expect(ctx.currentTransform()).toEqual([1, 0.5, -0.5, 1, 3, 4]);
  });

  it("sets smoothing from the interpolation mode before drawing", () => {
    const { canvas, ctx } = setup();
    const image = ctx.makeImage(1, 1, new Uint8Array(4), "rgba-separate");
    ctx.drawImage(image, SQUARE, "nearest-neighbor");
    ctx.drawImageArea(image, { x: 0, y: 0, width: 1, height: 1 }, SQUARE, "bilinear");

    expect(canvas.calls).toEqual([
      { method: "setImageSmoothingEnabled", args: [false] },
      { method: "drawImage", args: [image, { origin: { x: 0, y: 0 }, size: { x: 4, y: 4 } }] },
      { method: "setImageSmoothingEnabled", args: [true] },
      { method: "setImageSmoothingQuality", args: ["low"] },
      {
        method: "drawSubimage",
        args: [
          image,
          { origin: { x: 0, y: 0 }, size: { x: 1, y: 1 } },
          { origin: { x: 0, y: 0 }, size: { x: 4, y: 4 } },
        ],
      },
    ]);
  });

  it("cannot capture canvas pixels", () => {
    const { ctx } = setup();
    expect(thrownKind(() => ctx.captureImageArea(SQUARE))).toBe("not-supported");
  });

  it("draws a layout's text at the origin", () => {
    const { canvas, ctx } = setup();
    const layout = ctx.text().newTextLayout("hello").maxWidth(40).build();
    ctx.drawText(layout, { x: 5, y: 6 });
    expect(canvas.calls).toEqual([{ method: "fillText", args: ["hello", { x: 5, y: 6 }] }]);
  });

  it("draws a blurred rect as a tinted coverage image", () => {
    const { canvas, ctx } = setup();
    ctx.blurredRect({ x: 0, y: 0, width: 10, height: 10 }, 2, ctx.solidBrush(rgba8(255, 0, 0, 128)));

    expect(canvas.methods()).toEqual(["drawImage"]);
    expect(canvas.calls[0]).toEqual({
      method: "drawImage",
      args: [expect.anything(), { x: -5, y: -5 }],
    });
    const image = drawnImage(canvas);
    expect(image.width).toBe(20);
    expect(image.height).toBe(20);
    expect(image.pixels).toHaveLength(20 * 20 * 4);

    const center = (10 * 20 + 10) * 4;
    expect(Array.from(image.pixels.subarray(center, center + 3))).toEqual([255, 0, 0]);
    expect(image.pixels[center + 3]).toBeGreaterThan(120);
    expect(image.pixels[center + 3]).toBeLessThanOrEqual(128);
    expect(image.pixels[3]).toBe(0);
  });

  it("blurs a rect with negative width like its normalized twin", () => {
    const flipped = setup();
    flipped.ctx.blurredRect({ x: 20, y: 0, width: -10, height: 10 }, 1, flipped.ctx.solidBrush(BLACK));
    const upright = setup();
    upright.ctx.blurredRect({ x: 10, y: 0, width: 10, height: 10 }, 1, upright.ctx.solidBrush(BLACK));

    expect(flipped.canvas.calls[0]).toEqual({
      method: "drawImage",
      args: [expect.anything(), { x: 7, y: -3 }],
    });
    const image = drawnImage(flipped.canvas);
    expect(image.width).toBe(16);
    expect(image.height).toBe(16);
    expect(Array.from(image.pixels)).toEqual(Array.from(drawnImage(upright.canvas).pixels));
  });

  it("propagates an oversized blur instead of drawing", () => {
    const { canvas, ctx } = setup();
    const huge = { x: 0, y: 0, width: 1e9, height: 1e9 };
    expect(thrownKind(() => ctx.blurredRect(huge, 0, ctx.solidBrush(BLACK)))).toBe(
      "unsupported-format",
    );
    expect(canvas.calls).toEqual([]);
  });

  it("reports a healthy status and finishes", () => {
    const { canvas, ctx } = setup();
    expect(() => ctx.status()).not.toThrow();
    expect(() => ctx.finish()).not.toThrow();
    expect(canvas.calls).toEqual([]);
  });
});
