import { describe, expect, it } from "vitest";
import { decodePng, encodePng } from "../src/png.js";

describe("PNG codec", () => {
  it("decodes what it encodes", () => {
    const pixels = new Uint8Array(3 * 2 * 4);
    for (let i = 0; i < pixels.length; i++) pixels[i] = (i * 37) & 0xff;

    const decoded = decodePng(encodePng({ width: 3, height: 2, pixels }));

    expect(decoded.width).toBe(3);
    expect(decoded.height).toBe(2);
    expect(Array.from(decoded.pixels)).toEqual(Array.from(pixels));
  });

  it("starts with the PNG signature and IHDR", () => {
    const png = encodePng({ width: 1, height: 1, pixels: new Uint8Array(4) });
    expect(Array.from(png.subarray(0, 8))).toEqual([137, 80, 78, 71, 13, 10, 26, 10]);
    expect(String.fromCharCode(...png.subarray(12, 16))).toBe("IHDR");
  });

  it("rejects pixel buffers of the wrong length", () => {
    expect(() => encodePng({ width: 2, height: 2, pixels: new Uint8Array(15) })).toThrow(
      "Image data length (15) does not match dimensions (2x2x4 = 16)",
    );
  });

  it("rejects data without the signature", () => {
    expect(() => decodePng(new Uint8Array(16))).toThrow("Invalid PNG signature");
  });
});
