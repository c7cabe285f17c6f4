/**
 * Single-precision geometry. Every constructor narrows its inputs with
 * `Math.fround`, so values stored here are exactly representable as f32.
 */
export interface Vector2F {
  readonly x: number;
  readonly y: number;
}

export interface RectF {
  readonly origin: Vector2F;
  readonly size: Vector2F;
}

/**
 * Row-major 2x3 affine:
 *
 *   | m11 m12 m31 |
 *   | m21 m22 m32 |
 *
 * so that x' = m11*x + m12*y + m31 and y' = m21*x + m22*y + m32.
 */
export interface Transform2F {
  readonly m11: number;
  readonly m12: number;
  readonly m21: number;
  readonly m22: number;
  readonly m31: number;
  readonly m32: number;
}

export function vec2f(x: number, y: number): Vector2F {
  return { x: Math.fround(x), y: Math.fround(y) };
}

export function rectF(origin: Vector2F, size: Vector2F): RectF {
  return { origin: vec2f(origin.x, origin.y), size: vec2f(size.x, size.y) };
}

export function rowMajor(
  m11: number,
  m12: number,
  m21: number,
  m22: number,
  m31: number,
  m32: number,
): Transform2F {
  return {
    m11: Math.fround(m11),
    m12: Math.fround(m12),
    m21: Math.fround(m21),
    m22: Math.fround(m22),
    m31: Math.fround(m31),
    m32: Math.fround(m32),
  };
}

export const IDENTITY_2F: Transform2F = rowMajor(1, 0, 0, 1, 0, 0);

export function fromScale(sx: number, sy: number): Transform2F {
  return rowMajor(sx, 0, 0, sy, 0, 0);
}

export function fromTranslation(v: Vector2F): Transform2F {
  return rowMajor(1, 0, 0, 1, v.x, v.y);
}

/** `a * b`: the result applies `b` first, then `a`. */
export function transformMul(a: Transform2F, b: Transform2F): Transform2F {
  return rowMajor(
    a.m11 * b.m11 + a.m12 * b.m21,
    a.m11 * b.m12 + a.m12 * b.m22,
    a.m21 * b.m11 + a.m22 * b.m21,
    a.m21 * b.m12 + a.m22 * b.m22,
    a.m11 * b.m31 + a.m12 * b.m32 + a.m31,
    a.m21 * b.m31 + a.m22 * b.m32 + a.m32,
  );
}

export function transformPoint(t: Transform2F, p: Vector2F): Vector2F {
  return vec2f(t.m11 * p.x + t.m12 * p.y + t.m31, t.m21 * p.x + t.m22 * p.y + t.m32);
}

export function isIdentity(t: Transform2F): boolean {
  return (
    t.m11 === 1 && t.m12 === 0 && t.m21 === 0 && t.m22 === 1 && t.m31 === 0 && t.m32 === 0
  );
}
