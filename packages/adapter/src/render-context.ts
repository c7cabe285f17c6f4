import {
  DrawError,
  boundingBox,
  computeBlurredRect,
  sizeForBlurredRect,
} from "@brushwork/core";
import type {
  Affine,
  Color,
  FixedGradient,
  ImageFormat,
  InterpolationMode,
  Point,
  Rect,
  RenderContext,
  Shape,
  StrokeStyle,
} from "@brushwork/core";
import type { CanvasRenderingContext2D, FillRule } from "@brushwork/canvas";
import { rectFFromRect, vec2fFromPoint } from "./conversions.js";
import type { CompositeFontSource } from "./fonts/composite-font-source.js";
import { AdapterImage, makeImage, rgbaByteLength } from "./image-bridge.js";
import { pathFromShape } from "./shape-to-path.js";
import { resolveBrush, type Brush } from "./style-mapper.js";
import { AdapterText, type AdapterTextLayout } from "./text.js";
import { toBackendTransform, toGenericTransform } from "./transform-adapter.js";

/**
 * Drives a vector canvas through the generic drawing interface. Every
 * argument is converted before the first canvas call, so an operation that
 * throws leaves the canvas untouched.
 */
export class VectorRenderContext
  implements RenderContext<Brush, AdapterImage, AdapterTextLayout, AdapterText>
{
  private readonly textFactory: AdapterText;

  constructor(
    private readonly canvas: CanvasRenderingContext2D,
    fonts: CompositeFontSource,
  ) {
    this.textFactory = new AdapterText(fonts);
  }

  status(): void {}

  solidBrush(color: Color): Brush {
    return { kind: "solid", color };
  }

  gradient(gradient: FixedGradient): Brush {
    return { kind: "gradient", gradient };
  }

  clear(region: Rect | undefined, color: Color): void {
    if (!region) {
      this.canvas.clear();
      return;
    }
    const style = resolveBrush(this.solidBrush(color), () => region);
    this.canvas.setFillStyle(style);
    this.canvas.fillRect(rectFFromRect(region));
  }

  stroke(shape: Shape, brush: Brush, width: number): void {
    const style = resolveBrush(brush, () => boundingBox(shape));
    const path = pathFromShape(shape);
    this.canvas.setStrokeStyle(style);
    this.canvas.setLineWidth(Math.fround(width));
    this.canvas.strokePath(path);
  }

  /** Joins, caps, dashes and miter limits are not applied. */
  strokeStyled(shape: Shape, brush: Brush, width: number, _style: StrokeStyle): void {
    this.stroke(shape, brush, width);
  }

  fill(shape: Shape, brush: Brush): void {
    this.fillWith(shape, brush, "winding");
  }

  fillEvenOdd(shape: Shape, brush: Brush): void {
    this.fillWith(shape, brush, "even-odd");
  }

  clip(shape: Shape): void {
    this.canvas.clipPath(pathFromShape(shape), "winding");
  }

  text(): AdapterText {
    return this.textFactory;
  }

  /** Draws the layout's text with the current fill style; attributes are ignored. */
  drawText(layout: AdapterTextLayout, origin: Point): void {
    this.canvas.fillText(layout.text(), vec2fFromPoint(origin));
  }

  save(): void {
    this.canvas.save();
  }

  restore(): void {
    this.canvas.restore();
  }

  finish(): void {}

  /** Replaces the current transform. */
  transform(transform: Affine): void {
    this.canvas.setTransform(toBackendTransform(transform));
  }

  currentTransform(): Affine {
    return toGenericTransform(this.canvas.transform());
  }

  makeImage(width: number, height: number, buf: Uint8Array, format: ImageFormat): AdapterImage {
    return makeImage(width, height, buf, format);
  }

  drawImage(image: AdapterImage, dst: Rect, interp: InterpolationMode): void {
    const dest = rectFFromRect(dst);
    this.setInterpolation(interp);
    this.canvas.drawImage(image, dest);
  }

  drawImageArea(image: AdapterImage, src: Rect, dst: Rect, interp: InterpolationMode): void {
    const source = rectFFromRect(src);
    const dest = rectFFromRect(dst);
    this.setInterpolation(interp);
    this.canvas.drawSubimage(image, source, dest);
  }

  captureImageArea(_src: Rect): AdapterImage {
    throw new DrawError("not-supported", "Capturing canvas pixels is not supported");
  }

  /**
   * Paint a rect blurred by a Gaussian of standard deviation `blurRadius`
   * as an image covering the blur's extent.
   */
  blurredRect(rect: Rect, blurRadius: number, brush: Brush): void {
    const style = resolveBrush(brush, () => rect);
    if (style.kind !== "color") {
      throw new DrawError("not-supported", "Blurred rects need a solid brush");
    }
    const { width, height } = sizeForBlurredRect(rect, blurRadius);
    const pixels = new Uint8Array(rgbaByteLength(width, height));
    const mask = new Uint8Array(width * height);
    const bounds = computeBlurredRect(rect, blurRadius, width, mask);

    const { r, g, b, a } = style.color;
    for (let i = 0; i < mask.length; i++) {
      pixels[4 * i] = r;
      pixels[4 * i + 1] = g;
      pixels[4 * i + 2] = b;
      pixels[4 * i + 3] = Math.round((mask[i] * a) / 255);
    }
    this.canvas.drawImage(new AdapterImage(width, height, pixels), vec2fFromPoint(bounds));
  }

  private fillWith(shape: Shape, brush: Brush, rule: FillRule): void {
    const style = resolveBrush(brush, () => boundingBox(shape));
    const path = pathFromShape(shape);
    this.canvas.setFillStyle(style);
    this.canvas.fillPath(path, rule);
  }

  private setInterpolation(interp: InterpolationMode): void {
    switch (interp) {
      case "nearest-neighbor":
        this.canvas.setImageSmoothingEnabled(false);
        break;
      case "bilinear":
        this.canvas.setImageSmoothingEnabled(true);
        this.canvas.setImageSmoothingQuality("low");
        break;
    }
  }
}
