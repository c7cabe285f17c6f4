// Geometry
export type { RectF, Transform2F, Vector2F } from "./geometry.js";
export {
  IDENTITY_2F,
  fromScale,
  fromTranslation,
  isIdentity,
  rectF,
  rowMajor,
  transformMul,
  transformPoint,
  vec2f,
} from "./geometry.js";

// Color and styles
export type { ColorU } from "./color.js";
export { COLOR_BLACK, colorUFromU32, colorUToHex } from "./color.js";
export type { CanvasImageSource, FillStyle, Pattern, PixelImage } from "./style.js";

// Paths
export type { PathCommand } from "./path.js";
export { Path2D } from "./path.js";

// Canvas
export type {
  CanvasRenderingContext2D,
  FillRule,
  ImageSmoothingQuality,
} from "./canvas.js";
export { SvgCanvas, pathData } from "./svg-canvas.js";
export type { SvgCanvasOptions } from "./svg-canvas.js";
export { SvgDocument, escapeXml } from "./svg-document.js";

// PNG
export { decodePng, encodePng } from "./png.js";
