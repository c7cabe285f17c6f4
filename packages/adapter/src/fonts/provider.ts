import { defaultFamilyName } from "./generic-families.js";
import { FontLoadingError, SelectionError } from "./errors.js";
import { describeHandle } from "./loader.js";
import { findBestMatch } from "./matching.js";
import type {
  FamilyHandle,
  FamilyName,
  FontDescription,
  FontHandle,
  FontProperties,
  FontProvider,
} from "./types.js";

/** Resolve a family name; generic names go through the platform defaults. */
export function familyForName(provider: FontProvider, family: FamilyName): FamilyHandle {
  const name = family.kind === "title" ? family.name : defaultFamilyName(family.kind);
  return provider.selectFamilyByName(name);
}

/**
 * Best face for `properties` in the first of `familyNames` the provider
 * knows. Families it cannot resolve are skipped.
 */
export function bestMatch(
  provider: FontProvider,
  familyNames: readonly FamilyName[],
  properties: FontProperties,
): FontHandle {
  for (const name of familyNames) {
    let family: FamilyHandle;
    try {
      family = provider.selectFamilyByGenericName(name);
    } catch (err) {
      if (err instanceof SelectionError) continue;
      throw err;
    }
    const candidates = provider.selectDescriptionsInFamily(family);
    if (candidates.length === 0) continue;
    return family.fonts[findBestMatch(candidates.map((c) => c.properties), properties)];
  }
  throw new SelectionError("not-found", "No font matches the requested families");
}

/** Describe each face of `family`, consulting `known` before loading. */
export function describeFamily(
  family: FamilyHandle,
  known: (handle: FontHandle) => FontDescription | undefined = () => undefined,
): FontDescription[] {
  return family.fonts.map((handle) => {
    const cached = known(handle);
    if (cached) return cached;
    try {
      return describeHandle(handle);
    } catch (err) {
      if (err instanceof FontLoadingError) {
        throw new SelectionError("cannot-access-source", err.message, { cause: err });
      }
      throw err;
    }
  });
}
