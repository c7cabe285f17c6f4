import { describe, expect, it } from "vitest";
import {
  IDENTITY_2F,
  fromScale,
  fromTranslation,
  isIdentity,
  rowMajor,
  transformMul,
  transformPoint,
  vec2f,
} from "../src/geometry.js";

describe("Transform2F", () => {
  it("maps points row-major", () => {
    const t = rowMajor(1, 2, 3, 4, 5, 6);
    expect(transformPoint(t, vec2f(1, 1))).toEqual({ x: 8, y: 13 });
  });

  it("applies the right operand first", () => {
    const t = transformMul(fromTranslation(vec2f(10, 0)), fromScale(2, 2));
    expect(transformPoint(t, vec2f(1, 1))).toEqual({ x: 12, y: 2 });
  });

  it("narrows to single precision", () => {
    expect(vec2f(0.1, 0).x).toBe(Math.fround(0.1));
    expect(rowMajor(0.1, 0, 0, 1, 0, 0).m11).not.toBe(0.1);
  });

  it("recognizes the identity", () => {
    expect(isIdentity(IDENTITY_2F)).toBe(true);
    expect(isIdentity(transformMul(IDENTITY_2F, fromScale(1, 1)))).toBe(true);
    expect(isIdentity(fromScale(2, 1))).toBe(false);
  });
});
