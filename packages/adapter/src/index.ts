export { VectorRenderContext } from "./render-context.js";
export { toBackendTransform, toGenericTransform } from "./transform-adapter.js";
export { FLATTEN_TOLERANCE, pathFromShape } from "./shape-to-path.js";
export { resolveBrush } from "./style-mapper.js";
export type { Brush } from "./style-mapper.js";
export { AdapterImage, makeImage, rgbaByteLength } from "./image-bridge.js";
export { rectFFromRect, vec2fFromPoint } from "./conversions.js";
export { AdapterText, AdapterTextLayout, AdapterTextLayoutBuilder } from "./text.js";
export type { LayoutOptions } from "./text.js";
export * from "./fonts/index.js";
