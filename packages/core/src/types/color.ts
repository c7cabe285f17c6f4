/**
 * A color packed as `0xRRGGBBAA`, non-premultiplied, always an unsigned
 * 32-bit integer.
 */
export type Color = number;

export interface ColorComponents {
  r: number;
  g: number;
  b: number;
  a: number;
}

export const BLACK: Color = 0x000000ff;
export const WHITE: Color = 0xffffffff;

export function rgba8(r: number, g: number, b: number, a: number = 255): Color {
  return (((r & 0xff) << 24) | ((g & 0xff) << 16) | ((b & 0xff) << 8) | (a & 0xff)) >>> 0;
}

export function colorComponents(color: Color): ColorComponents {
  return {
    r: (color >>> 24) & 0xff,
    g: (color >>> 16) & 0xff,
    b: (color >>> 8) & 0xff,
    a: color & 0xff,
  };
}

/** Replace the alpha channel; `alpha` is clamped to [0, 1]. */
export function withAlpha(color: Color, alpha: number): Color {
  const { r, g, b } = colorComponents(color);
  return rgba8(r, g, b, Math.round(Math.min(1, Math.max(0, alpha)) * 255));
}

const HEX = /^#?([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parse `#rgb`, `#rrggbb` or `#rrggbbaa` (leading `#` optional).
 */
export function colorFromHex(hex: string): Color {
  const match = hex.trim().match(HEX);
  if (!match) {
    throw new Error(`Invalid color: "${hex}"`);
  }
  let digits = match[1];
  if (digits.length === 3) {
    digits = digits
      .split("")
      .map((d) => d + d)
      .join("");
  }
  if (digits.length === 6) {
    digits += "ff";
  }
  return parseInt(digits, 16) >>> 0;
}

export function colorToHex(color: Color): string {
  return "#" + (color >>> 0).toString(16).padStart(8, "0");
}
