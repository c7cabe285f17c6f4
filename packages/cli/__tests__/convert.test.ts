import { describe, expect, it } from "vitest";
import { toAffine, toShape } from "../src/script/convert.js";

describe("toShape", () => {
  it("maps lines and rects directly", () => {
    expect(toShape({ type: "line", from: [1, 2], to: [3, 4] })).toEqual({
      type: "line",
      p0: { x: 1, y: 2 },
      p1: { x: 3, y: 4 },
    });
    expect(toShape({ type: "rect", x: 1, y: 2, width: 3, height: 4 })).toEqual({
      type: "rect",
      rect: { x: 1, y: 2, width: 3, height: 4 },
    });
  });

  it("converts angles from degrees", () => {
    const shape = toShape({
      type: "arc",
      center: [0, 0],
      radii: [5, 5],
      start: 90,
      sweep: 180,
      rotation: 45,
    });
    if (shape.type !== "arc") throw new Error("expected an arc");
    expect(shape.startAngle).toBeCloseTo(Math.PI / 2);
    expect(shape.sweepAngle).toBeCloseTo(Math.PI);
    expect(shape.xRotation).toBeCloseTo(Math.PI / 4);
  });

  it("maps path elements in order", () => {
    const shape = toShape({
      type: "path",
      elements: [
        { op: "move", to: [0, 0] },
        { op: "quad", ctrl: [1, 1], to: [2, 0] },
        { op: "cubic", ctrl1: [3, 1], ctrl2: [4, 1], to: [5, 0] },
        { op: "close" },
      ],
    });
    expect(shape).toEqual({
      type: "path",
      elements: [
        { type: "move-to", point: { x: 0, y: 0 } },
        { type: "quad-to", ctrl: { x: 1, y: 1 }, point: { x: 2, y: 0 } },
        {
          type: "curve-to",
          ctrl1: { x: 3, y: 1 },
          ctrl2: { x: 4, y: 1 },
          point: { x: 5, y: 0 },
        },
        { type: "close-path" },
      ],
    });
  });
});

describe("toAffine", () => {
  it("scales before translating", () => {
    expect(toAffine({ op: "transform", translate: [10, 20], scale: 2 })).toEqual([
      2, 0, 0, 2, 10, 20,
    ]);
  });

  it("accepts per-axis scale", () => {
    expect(toAffine({ op: "transform", scale: [2, 3] })).toEqual([2, 0, 0, 3, 0, 0]);
  });

  it("applies the matrix innermost", () => {
    expect(
      toAffine({ op: "transform", matrix: [1, 0, 0, 1, 5, 5], translate: [1, 1] }),
    ).toEqual([1, 0, 0, 1, 6, 6]);
  });

  it("rotates by degrees", () => {
    const [a, b, c, d, e, f] = toAffine({ op: "transform", rotate: 90 });
    expect(a).toBeCloseTo(0);
    expect(b).toBeCloseTo(1);
    expect(c).toBeCloseTo(-1);
    expect(d).toBeCloseTo(0);
    expect(e).toBe(0);
    expect(f).toBe(0);
  });
});
