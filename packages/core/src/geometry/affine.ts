import type { Affine, Point } from "../types/geometry.js";

export const IDENTITY: Affine = [1, 0, 0, 1, 0, 0];

export function translate(x: number, y: number): Affine {
  return [1, 0, 0, 1, x, y];
}

export function scale(sx: number, sy: number = sx): Affine {
  return [sx, 0, 0, sy, 0, 0];
}

/** Rotation by `theta` radians (clockwise in a Y-down space). */
export function rotate(theta: number): Affine {
  const cos = Math.cos(theta);
  const sin = Math.sin(theta);
  return [cos, sin, -sin, cos, 0, 0];
}

/**
 * Compose two transforms. The result applies `inner` first, then `outer`.
 */
export function affineMultiply(outer: Affine, inner: Affine): Affine {
  const [a0, a1, a2, a3, a4, a5] = outer;
  const [b0, b1, b2, b3, b4, b5] = inner;
  return [
    a0 * b0 + a2 * b1,
    a1 * b0 + a3 * b1,
    a0 * b2 + a2 * b3,
    a1 * b2 + a3 * b3,
    a0 * b4 + a2 * b5 + a4,
    a1 * b4 + a3 * b5 + a5,
  ];
}

export function applyAffine(t: Affine, p: Point): Point {
  const [a, b, c, d, e, f] = t;
  return {
    x: a * p.x + c * p.y + e,
    y: b * p.x + d * p.y + f,
  };
}
