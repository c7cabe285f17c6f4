/** An 8-bit-per-channel, non-premultiplied color. */
export interface ColorU {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export const COLOR_BLACK: ColorU = { r: 0, g: 0, b: 0, a: 255 };

/** Unpack `0xRRGGBBAA`. */
export function colorUFromU32(rgba: number): ColorU {
  return {
    r: (rgba >>> 24) & 0xff,
    g: (rgba >>> 16) & 0xff,
    b: (rgba >>> 8) & 0xff,
    a: rgba & 0xff,
  };
}

export function colorUToHex(color: ColorU): string {
  const hex = (v: number): string => v.toString(16).padStart(2, "0");
  return `#${hex(color.r)}${hex(color.g)}${hex(color.b)}`;
}
