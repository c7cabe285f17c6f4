import type { ColorU } from "./color.js";
import type { Transform2F } from "./geometry.js";

/** Non-premultiplied RGBA pixels, `width * height * 4` bytes. */
export interface PixelImage {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint8Array;
}

/** An image positioned in user space by `transform`. */
export interface Pattern {
  readonly image: PixelImage;
  readonly transform: Transform2F;
}

export type FillStyle =
  | { kind: "color"; color: ColorU }
  | { kind: "pattern"; pattern: Pattern };

/** Anything the canvas can paint as an image. */
export interface CanvasImageSource {
  toPattern(transform: Transform2F): Pattern;
}
