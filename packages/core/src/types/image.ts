import type { Size } from "./geometry.js";

export type ImageFormat = "grayscale" | "rgb" | "rgba-separate" | "rgba-premul";

export type InterpolationMode = "nearest-neighbor" | "bilinear";

export interface Image {
  size(): Size;
}

export function bytesPerPixel(format: ImageFormat): number {
  switch (format) {
    case "grayscale":
      return 1;
    case "rgb":
      return 3;
    case "rgba-separate":
    case "rgba-premul":
      return 4;
  }
}
