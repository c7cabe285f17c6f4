import type { FixedGradient } from "./brush.js";
import type { Color } from "./color.js";
import type { Affine, Point, Rect, Shape } from "./geometry.js";
import type { Image, ImageFormat, InterpolationMode } from "./image.js";
import type { Text, TextLayout } from "./text.js";

export type LineJoin = "miter" | "round" | "bevel";
export type LineCap = "butt" | "round" | "square";

export interface StrokeStyle {
  lineJoin?: LineJoin;
  lineCap?: LineCap;
  dash?: { pattern: number[]; offset: number };
  miterLimit?: number;
}

/**
 * The backend-agnostic immediate-mode drawing interface. Every method either
 * completes or throws a `DrawError`.
 */
export interface RenderContext<
  B,
  I extends Image,
  L extends TextLayout,
  T extends Text<L>,
> {
  /** Throws if the context has entered a failed state. */
  status(): void;
  solidBrush(color: Color): B;
  gradient(gradient: FixedGradient): B;
  /** Fill `region` with `color`, or clear the whole surface when absent. */
  clear(region: Rect | undefined, color: Color): void;
  stroke(shape: Shape, brush: B, width: number): void;
  strokeStyled(shape: Shape, brush: B, width: number, style: StrokeStyle): void;
  fill(shape: Shape, brush: B): void;
  fillEvenOdd(shape: Shape, brush: B): void;
  clip(shape: Shape): void;
  text(): T;
  drawText(layout: L, origin: Point): void;
  save(): void;
  restore(): void;
  finish(): void;
  transform(transform: Affine): void;
  makeImage(width: number, height: number, buf: Uint8Array, format: ImageFormat): I;
  drawImage(image: I, dst: Rect, interp: InterpolationMode): void;
  drawImageArea(image: I, src: Rect, dst: Rect, interp: InterpolationMode): void;
  captureImageArea(src: Rect): I;
  blurredRect(rect: Rect, blurRadius: number, brush: B): void;
  currentTransform(): Affine;
}
