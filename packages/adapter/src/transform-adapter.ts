import type { Affine } from "@brushwork/core";
import { rowMajor, type Transform2F } from "@brushwork/canvas";

/**
 * Convert a generic affine `[a, b, c, d, e, f]` (x' = a·x + c·y + e,
 * y' = b·x + d·y + f) into the canvas's row-major form. Coefficients are
 * narrowed to single precision; singular matrices pass through unchanged.
 */
export function toBackendTransform(affine: Affine): Transform2F {
  const [a, b, c, d, e, f] = affine;
  return rowMajor(a, c, b, d, e, f);
}

/** Inverse of {@link toBackendTransform}, up to single-precision rounding. */
export function toGenericTransform(t: Transform2F): Affine {
  return [t.m11, t.m21, t.m12, t.m22, t.m31, t.m32];
}
