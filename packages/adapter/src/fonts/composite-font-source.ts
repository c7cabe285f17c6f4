import { DrawError } from "@brushwork/core";
import { FontLoadingError, SelectionError } from "./errors.js";
import { MemSource } from "./mem-source.js";
import { MultiSource } from "./multi-source.js";
import type {
  FamilyHandle,
  FamilyName,
  FontDescription,
  FontHandle,
  FontProperties,
  FontProvider,
} from "./types.js";

/**
 * Fonts registered at run time layered over a fixed list of external
 * providers. Selections consult the registered fonts first; enumerations
 * list external fonts, then registered ones.
 */
export class CompositeFontSource implements FontProvider {
  private readonly memory = new MemSource();
  private readonly external: MultiSource;

  constructor(providers: readonly FontProvider[] = []) {
    this.external = new MultiSource(providers);
  }

  allFonts(): FontHandle[] {
    return [...this.external.allFonts(), ...this.memory.allFonts()];
  }

  allFamilies(): string[] {
    return [...this.external.allFamilies(), ...this.memory.allFamilies()];
  }

  selectFamilyByName(familyName: string): FamilyHandle {
    return this.select((s) => s.selectFamilyByName(familyName));
  }

  selectByPostscriptName(postscriptName: string): FontHandle {
    return this.select((s) => s.selectByPostscriptName(postscriptName));
  }

  selectFamilyByGenericName(familyName: FamilyName): FamilyHandle {
    return this.select((s) => s.selectFamilyByGenericName(familyName));
  }

  selectBestMatch(familyNames: readonly FamilyName[], properties: FontProperties): FontHandle {
    return this.select((s) => s.selectBestMatch(familyNames, properties));
  }

  selectDescriptionsInFamily(family: FamilyHandle): FontDescription[] {
    return this.select((s) => s.selectDescriptionsInFamily(family));
  }

  /**
   * Register a font from raw bytes (the first face of a collection). The
   * bytes are copied.
   */
  registerFont(bytes: Uint8Array): FontDescription {
    try {
      return this.memory.addFont({ kind: "memory", bytes, fontIndex: 0 });
    } catch (err) {
      throw toDrawError(err);
    }
  }

  private select<T>(lookup: (source: FontProvider) => T): T {
    try {
      return lookup(this.memory);
    } catch (err) {
      if (err instanceof SelectionError) return lookup(this.external);
      throw err;
    }
  }
}

function toDrawError(err: unknown): DrawError {
  if (err instanceof FontLoadingError) {
    switch (err.reason) {
      case "no-such-font-in-collection":
        return new DrawError("missing-font", err.message);
      case "unknown-format":
      case "parse":
        return new DrawError("font-loading-failed", err.message);
      case "io":
        break;
    }
  }
  return new DrawError("backend-error", undefined, { cause: err });
}
