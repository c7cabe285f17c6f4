export type {
  FamilyHandle,
  FamilyName,
  FontDescription,
  FontHandle,
  FontProperties,
  FontProvider,
  FontStyleKind,
  GenericFamilyName,
} from "./types.js";
export { DEFAULT_PROPERTIES, titleFamily } from "./types.js";
export type { FontLoadingErrorReason, SelectionErrorReason } from "./errors.js";
export { FontLoadingError, SelectionError } from "./errors.js";
export { describeFont, describeFonts, describeHandle } from "./loader.js";
export { propertiesFromSubfamily } from "./properties.js";
export { findBestMatch } from "./matching.js";
export { defaultFamilyName } from "./generic-families.js";
export { MemSource } from "./mem-source.js";
export { DirectorySource, SystemSource, systemFontDirectories } from "./directory-source.js";
export type { SkippedFont } from "./directory-source.js";
export { MultiSource } from "./multi-source.js";
export { CompositeFontSource } from "./composite-font-source.js";
