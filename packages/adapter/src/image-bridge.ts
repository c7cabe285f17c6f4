import { constants } from "node:buffer";
import { DrawError, bytesPerPixel } from "@brushwork/core";
import type { Image, ImageFormat, Size } from "@brushwork/core";
import type { CanvasImageSource, Pattern, Transform2F } from "@brushwork/canvas";

const U32_MAX = 0xffffffff;

/**
 * An owned, non-premultiplied RGBA image the canvas can paint. `pixels` is
 * taken as is and must hold `width * height * 4` bytes.
 */
export class AdapterImage implements Image, CanvasImageSource {
  constructor(
    readonly width: number,
    readonly height: number,
    private readonly pixels: Uint8Array,
  ) {
    checkLength(width, height, pixels.length);
  }

  size(): Size {
    return { width: this.width, height: this.height };
  }

  toPattern(transform: Transform2F): Pattern {
    return {
      image: { width: this.width, height: this.height, pixels: this.pixels },
      transform,
    };
  }
}

/**
 * Copy `buf` into a new image. Only separate-alpha RGBA is accepted, and the
 * buffer must hold exactly `width * height * 4` bytes.
 */
export function makeImage(
  width: number,
  height: number,
  buf: Uint8Array,
  format: ImageFormat,
): AdapterImage {
  if (format !== "rgba-separate") {
    throw new DrawError("unsupported-format", `Unsupported image format: ${format}`);
  }
  checkDimension("width", width);
  checkDimension("height", height);

  checkLength(width, height, buf.length);
  return new AdapterImage(width, height, new Uint8Array(buf));
}

function checkLength(width: number, height: number, length: number): void {
  const expected = width * height * bytesPerPixel("rgba-separate");
  if (length !== expected) {
    throw new DrawError(
      "invalid-input",
      `Image buffer holds ${length} bytes, expected ${expected} for ${width}x${height}`,
    );
  }
}

function checkDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new DrawError("invalid-input", `Image ${name} must be a non-negative integer, got ${value}`);
  }
  if (value > U32_MAX) {
    throw new DrawError("unsupported-format", `Image ${name} ${value} is too large`);
  }
}

/**
 * Byte length of an RGBA buffer for `width` x `height` pixels.
 * @throws DrawError `unsupported-format` when no such buffer can be allocated.
 */
export function rgbaByteLength(width: number, height: number): number {
  const length = width * height * 4;
  if (!Number.isSafeInteger(length) || length < 0 || length > constants.MAX_LENGTH) {
    throw new DrawError("unsupported-format", `Image of ${width}x${height} is too large`);
  }
  return length;
}
