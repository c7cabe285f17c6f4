import { unzlibSync, zlibSync } from "fflate";
import type { PixelImage } from "./style.js";

const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

const COLOR_TYPE_RGB = 2;
const COLOR_TYPE_RGBA = 6;

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

function writeChunk(out: Uint8Array, offset: number, type: string, data: Uint8Array): number {
  write32(out, offset, data.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) {
    out[typeStart + i] = type.charCodeAt(i);
  }
  out.set(data, typeStart + 4);
  const end = typeStart + 4 + data.length;
  write32(out, end, crc32(out, typeStart, end));
  return end + 4;
}

/**
 * Encode RGBA pixels as an 8-bit RGBA PNG (filter type 0 on every row).
 */
export function encodePng(image: PixelImage): Uint8Array {
  const { pixels, width, height } = image;
  if (pixels.length !== width * height * 4) {
    throw new Error(
      `Image data length (${pixels.length}) does not match dimensions (${width}x${height}x4 = ${width * height * 4})`,
    );
  }

  const rowBytes = width * 4;
  const raw = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    raw[y * (1 + rowBytes)] = 0;
    raw.set(pixels.subarray(y * rowBytes, (y + 1) * rowBytes), y * (1 + rowBytes) + 1);
  }
  const compressed = zlibSync(raw);

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8;
  ihdr[9] = COLOR_TYPE_RGBA;

  const out = new Uint8Array(8 + 25 + 12 + compressed.length + 12);
  out.set(PNG_SIGNATURE, 0);
  let offset = writeChunk(out, 8, "IHDR", ihdr);
  offset = writeChunk(out, offset, "IDAT", compressed);
  writeChunk(out, offset, "IEND", new Uint8Array(0));
  return out;
}

/**
 * Decode an 8-bit RGB or RGBA, non-interlaced PNG into RGBA pixels.
 */
export function decodePng(png: Uint8Array): PixelImage {
  for (let i = 0; i < PNG_SIGNATURE.length; i++) {
    if (png[i] !== PNG_SIGNATURE[i]) {
      throw new Error("Invalid PNG signature");
    }
  }

  let width = 0;
  let height = 0;
  let colorType = -1;
  const idat: Uint8Array[] = [];

  let offset = 8;
  while (offset + 8 <= png.length) {
    const length = read32(png, offset);
    const type = String.fromCharCode(
      png[offset + 4],
      png[offset + 5],
      png[offset + 6],
      png[offset + 7],
    );
    const data = offset + 8;

    if (type === "IHDR") {
      width = read32(png, data);
      height = read32(png, data + 4);
      const bitDepth = png[data + 8];
      colorType = png[data + 9];
      const interlace = png[data + 12];
      if (
        bitDepth !== 8 ||
        (colorType !== COLOR_TYPE_RGB && colorType !== COLOR_TYPE_RGBA) ||
        interlace !== 0
      ) {
        throw new Error(
          `Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}, interlace=${interlace}`,
        );
      }
    } else if (type === "IDAT") {
      idat.push(png.subarray(data, data + length));
    } else if (type === "IEND") {
      break;
    }
    offset = data + length + 4;
  }

  if (width === 0 || height === 0) {
    throw new Error("PNG missing IHDR chunk");
  }

  const total = idat.reduce((sum, chunk) => sum + chunk.length, 0);
  const joined = new Uint8Array(total);
  let pos = 0;
  for (const chunk of idat) {
    joined.set(chunk, pos);
    pos += chunk.length;
  }
  const raw = unzlibSync(joined);

  const channels = colorType === COLOR_TYPE_RGBA ? 4 : 3;
  const stride = width * channels;
  if (raw.length < height * (stride + 1)) {
    throw new Error("PNG image data is truncated");
  }

  const rows = new Uint8Array(height * stride);
  for (let y = 0; y < height; y++) {
    unfilterRow(raw, y * (stride + 1), rows, y * stride, stride, channels, y > 0);
  }

  if (channels === 4) {
    return { width, height, pixels: rows };
  }
  const pixels = new Uint8Array(width * height * 4);
  for (let i = 0, j = 0; i < rows.length; i += 3, j += 4) {
    pixels[j] = rows[i];
    pixels[j + 1] = rows[i + 1];
    pixels[j + 2] = rows[i + 2];
    pixels[j + 3] = 255;
  }
  return { width, height, pixels };
}

function unfilterRow(
  raw: Uint8Array,
  rawOffset: number,
  out: Uint8Array,
  outOffset: number,
  stride: number,
  bpp: number,
  hasPrior: boolean,
): void {
  const filter = raw[rawOffset];
  const src = rawOffset + 1;
  const prior = outOffset - stride;

  for (let i = 0; i < stride; i++) {
    const a = i >= bpp ? out[outOffset + i - bpp] : 0;
    const b = hasPrior ? out[prior + i] : 0;
    const c = hasPrior && i >= bpp ? out[prior + i - bpp] : 0;
    let predictor: number;
    switch (filter) {
      case 0:
        predictor = 0;
        break;
      case 1:
        predictor = a;
        break;
      case 2:
        predictor = b;
        break;
      case 3:
        predictor = (a + b) >>> 1;
        break;
      case 4:
        predictor = paeth(a, b, c);
        break;
      default:
        throw new Error(`Unknown PNG filter type: ${filter}`);
    }
    out[outOffset + i] = (raw[src + i] + predictor) & 0xff;
  }
}

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}
