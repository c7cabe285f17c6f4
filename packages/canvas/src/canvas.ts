import type { RectF, Transform2F, Vector2F } from "./geometry.js";
import type { Path2D } from "./path.js";
import type { CanvasImageSource, FillStyle } from "./style.js";

export type FillRule = "winding" | "even-odd";

export type ImageSmoothingQuality = "low" | "medium" | "high";

/**
 * The engine's immediate-mode drawing surface. State (styles, transform,
 * clip, smoothing) lives on a stack managed by `save` and `restore`.
 */
export interface CanvasRenderingContext2D {
  save(): void;
  restore(): void;
  /** Replace the current transform. */
  setTransform(transform: Transform2F): void;
  transform(): Transform2F;

  setFillStyle(style: FillStyle): void;
  setStrokeStyle(style: FillStyle): void;
  setLineWidth(width: number): void;
  setImageSmoothingEnabled(enabled: boolean): void;
  setImageSmoothingQuality(quality: ImageSmoothingQuality): void;

  /** Discard everything drawn so far. */
  clear(): void;
  fillRect(rect: RectF): void;
  fillPath(path: Path2D, rule: FillRule): void;
  strokePath(path: Path2D): void;
  clipPath(path: Path2D, rule: FillRule): void;
  fillText(text: string, position: Vector2F): void;
  /** Draw at `dest`; a bare point keeps the image's own size. */
  drawImage(image: CanvasImageSource, dest: RectF | Vector2F): void;
  drawSubimage(image: CanvasImageSource, src: RectF, dest: RectF): void;
}
