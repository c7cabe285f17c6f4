import { SelectionError } from "./errors.js";
import { bestMatch, describeFamily, familyForName } from "./provider.js";
import type {
  FamilyHandle,
  FamilyName,
  FontDescription,
  FontHandle,
  FontProperties,
  FontProvider,
} from "./types.js";

interface IndexedFont {
  handle: FontHandle;
  description: FontDescription;
}

/**
 * A provider answering lookups from a list of already-described fonts.
 * Handles are handed out as copies, so callers cannot alter a stored font.
 */
export abstract class IndexedSource implements FontProvider {
  protected readonly entries: IndexedFont[] = [];
  private readonly issued = new WeakMap<FontHandle, IndexedFont>();

  allFonts(): FontHandle[] {
    return this.entries.map((e) => this.issue(e));
  }

  allFamilies(): string[] {
    const names = new Set(this.entries.map((e) => e.description.familyName));
    return [...names].sort();
  }

  selectFamilyByName(familyName: string): FamilyHandle {
    const fonts = this.entries
      .filter((e) => e.description.familyName === familyName)
      .map((e) => this.issue(e));
    if (fonts.length === 0) {
      throw new SelectionError("not-found", `No font family named "${familyName}"`);
    }
    return { fonts };
  }

  selectByPostscriptName(postscriptName: string): FontHandle {
    const entry = this.entries.find((e) => e.description.postscriptName === postscriptName);
    if (!entry) {
      throw new SelectionError("not-found", `No font with PostScript name "${postscriptName}"`);
    }
    return this.issue(entry);
  }

  selectFamilyByGenericName(familyName: FamilyName): FamilyHandle {
    return familyForName(this, familyName);
  }

  selectBestMatch(familyNames: readonly FamilyName[], properties: FontProperties): FontHandle {
    return bestMatch(this, familyNames, properties);
  }

  selectDescriptionsInFamily(family: FamilyHandle): FontDescription[] {
    return describeFamily(
      family,
      (handle) => this.issued.get(handle)?.description,
    );
  }

  protected register(handle: FontHandle, description: FontDescription): void {
    this.entries.push({ handle, description });
  }

  private issue(entry: IndexedFont): FontHandle {
    const { handle } = entry;
    const copy: FontHandle =
      handle.kind === "memory" ? { ...handle, bytes: new Uint8Array(handle.bytes) } : { ...handle };
    this.issued.set(copy, entry);
    return copy;
  }
}
