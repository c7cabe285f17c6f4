// ---- Handles ----

/** Where a font's bytes live. `fontIndex` selects a face inside a collection. */
export type FontHandle =
  | { kind: "memory"; bytes: Uint8Array; fontIndex: number }
  | { kind: "path"; path: string; fontIndex: number };

export interface FamilyHandle {
  fonts: FontHandle[];
}

// ---- Properties ----

export type FontStyleKind = "normal" | "italic" | "oblique";

export interface FontProperties {
  style: FontStyleKind;
  /** CSS weight, 100..900. */
  weight: number;
  /** Width as a fraction of normal, 0.5..2.0. */
  stretch: number;
}

export const DEFAULT_PROPERTIES: FontProperties = {
  style: "normal",
  weight: 400,
  stretch: 1,
};

export interface FontDescription {
  familyName: string;
  postscriptName: string;
  fullName: string;
  properties: FontProperties;
}

// ---- Family names ----

export type GenericFamilyName = "serif" | "sans-serif" | "monospace" | "cursive" | "fantasy";

export type FamilyName = { kind: "title"; name: string } | { kind: GenericFamilyName };

export function titleFamily(name: string): FamilyName {
  return { kind: "title", name };
}

// ---- Providers ----

/**
 * A source of fonts. Selections throw `SelectionError` when nothing
 * matches or the source cannot be read.
 */
export interface FontProvider {
  allFonts(): FontHandle[];
  allFamilies(): string[];
  selectFamilyByName(familyName: string): FamilyHandle;
  selectByPostscriptName(postscriptName: string): FontHandle;
  selectFamilyByGenericName(familyName: FamilyName): FamilyHandle;
  /** Best face across `familyNames`, tried in order, for `properties`. */
  selectBestMatch(familyNames: readonly FamilyName[], properties: FontProperties): FontHandle;
  selectDescriptionsInFamily(family: FamilyHandle): FontDescription[];
}
