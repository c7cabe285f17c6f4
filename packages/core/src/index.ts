export * from "./types/geometry.js";
export * from "./types/color.js";
export * from "./types/brush.js";
export * from "./types/image.js";
export * from "./types/errors.js";
export * from "./types/text.js";
export * from "./types/render-context.js";
export {
  IDENTITY,
  translate,
  scale,
  rotate,
  affineMultiply,
  applyAffine,
} from "./geometry/affine.js";
export { appendArc, arcSegmentCount, sampleEllipse } from "./geometry/arc.js";
export {
  line,
  rect,
  path,
  circle,
  ellipse,
  arc,
  roundedRect,
  moveTo,
  lineTo,
  quadTo,
  curveTo,
  closePath,
  asLine,
  asRect,
  asPathSlice,
  pathElements,
  boundingBox,
} from "./geometry/shape.js";
export {
  blurredRectBounds,
  sizeForBlurredRect,
  computeBlurredRect,
} from "./util/blur.js";
