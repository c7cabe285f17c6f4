import { normalizeRect } from "../geometry/shape.js";
import type { Rect, Size } from "../types/geometry.js";

// The mask extends this many blur radii past each edge of the rect
const BLUR_EXTENT = 2.5;

/**
 * Pixel-aligned bounds of the mask for a rect blurred by `radius`.
 * Rects with a negative width or height are normalized first.
 */
export function blurredRectBounds(r: Rect, radius: number): Rect {
  const rect = normalizeRect(r);
  const padding = BLUR_EXTENT * Math.max(0, radius);
  const x0 = Math.floor(rect.x - padding);
  const y0 = Math.floor(rect.y - padding);
  const x1 = Math.ceil(rect.x + rect.width + padding);
  const y1 = Math.ceil(rect.y + rect.height + padding);
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}

/** Size of the coverage buffer `computeBlurredRect` fills. */
export function sizeForBlurredRect(rect: Rect, radius: number): Size {
  const { width, height } = blurredRectBounds(rect, radius);
  return { width, height };
}

/**
 * Fill `buf` (one byte per pixel, `stride` bytes per row) with the coverage of
 * `rect` convolved with a Gaussian of standard deviation `radius`.
 *
 * @returns The bounds the buffer covers, in the rect's coordinate space.
 */
export function computeBlurredRect(
  r: Rect,
  radius: number,
  stride: number,
  buf: Uint8Array,
): Rect {
  const rect = normalizeRect(r);
  const bounds = blurredRectBounds(rect, radius);
  const rows = stride > 0 ? Math.min(bounds.height, Math.floor(buf.length / stride)) : 0;
  const cols = Math.min(bounds.width, stride);

  const xs = edgeProfile(bounds.x, cols, rect.x, rect.x + rect.width, radius);
  const ys = edgeProfile(bounds.y, rows, rect.y, rect.y + rect.height, radius);

  for (let j = 0; j < rows; j++) {
    for (let i = 0; i < cols; i++) {
      buf[j * stride + i] = Math.round(255 * xs[i] * ys[j]);
    }
  }
  return bounds;
}

/** Coverage of the interval [lo, hi] along one axis, sampled at pixel centers. */
function edgeProfile(
  origin: number,
  count: number,
  lo: number,
  hi: number,
  radius: number,
): Float64Array {
  const out = new Float64Array(count);
  for (let i = 0; i < count; i++) {
    const c = origin + i + 0.5;
    if (radius <= 0) {
      out[i] = c >= lo && c < hi ? 1 : 0;
    } else {
      const k = 1 / (Math.SQRT2 * radius);
      out[i] = 0.5 * (erf7((c - lo) * k) - erf7((c - hi) * k));
    }
  }
  return out;
}

/** Rational approximation of erf, good to about 1e-3. */
function erf7(x: number): number {
  const z = x * (2 / Math.sqrt(Math.PI));
  const zz = z * z;
  const w = z + (0.24295 + (0.03395 + 0.0104 * zz) * zz) * (z * zz);
  return w / Math.sqrt(1 + w * w);
}
