import { SelectionError } from "./errors.js";
import { bestMatch } from "./provider.js";
import type {
  FamilyHandle,
  FamilyName,
  FontDescription,
  FontHandle,
  FontProperties,
  FontProvider,
} from "./types.js";

/**
 * An ordered list of providers. Lookups return the first provider's
 * answer; enumerations concatenate in order.
 */
export class MultiSource implements FontProvider {
  constructor(private readonly sources: readonly FontProvider[]) {}

  allFonts(): FontHandle[] {
    return this.sources.flatMap((s) => s.allFonts());
  }

  allFamilies(): string[] {
    return this.sources.flatMap((s) => s.allFamilies());
  }

  selectFamilyByName(familyName: string): FamilyHandle {
    return this.first(
      (s) => s.selectFamilyByName(familyName),
      `No font family named "${familyName}"`,
    );
  }

  selectByPostscriptName(postscriptName: string): FontHandle {
    return this.first(
      (s) => s.selectByPostscriptName(postscriptName),
      `No font with PostScript name "${postscriptName}"`,
    );
  }

  selectFamilyByGenericName(familyName: FamilyName): FamilyHandle {
    return this.first(
      (s) => s.selectFamilyByGenericName(familyName),
      "No font family matches the generic name",
    );
  }

  selectBestMatch(familyNames: readonly FamilyName[], properties: FontProperties): FontHandle {
    return bestMatch(this, familyNames, properties);
  }

  selectDescriptionsInFamily(family: FamilyHandle): FontDescription[] {
    return this.first(
      (s) => s.selectDescriptionsInFamily(family),
      "No source can describe the family",
    );
  }

  private first<T>(select: (source: FontProvider) => T, message: string): T {
    for (const source of this.sources) {
      try {
        return select(source);
      } catch (err) {
        if (!(err instanceof SelectionError)) throw err;
      }
    }
    throw new SelectionError("not-found", message);
  }
}
