import { readFileSync } from "node:fs";
import { create } from "fontkit";
import type { Font } from "fontkit";
import { FontLoadingError } from "./errors.js";
import { propertiesFromSubfamily } from "./properties.js";
import type { FontDescription, FontHandle } from "./types.js";

/** Describe every face in a font file or collection blob. */
export function describeFonts(bytes: Uint8Array): FontDescription[] {
  return parse(() => faces(bytes).map(describe));
}

/** Describe the face at `fontIndex`. */
export function describeFont(bytes: Uint8Array, fontIndex: number): FontDescription {
  return parse(() => {
    const all = faces(bytes);
    if (!Number.isInteger(fontIndex) || fontIndex < 0 || fontIndex >= all.length) {
      throw new FontLoadingError(
        "no-such-font-in-collection",
        `No font at index ${fontIndex} (the data holds ${all.length})`,
      );
    }
    return describe(all[fontIndex]);
  });
}

export function describeHandle(handle: FontHandle): FontDescription {
  return describeFont(handleBytes(handle), handle.fontIndex);
}

export function readFontFile(path: string): Uint8Array {
  try {
    return readFileSync(path);
  } catch (err) {
    throw new FontLoadingError("io", `Could not read font file: ${path}`, { cause: err });
  }
}

function handleBytes(handle: FontHandle): Uint8Array {
  return handle.kind === "memory" ? handle.bytes : readFontFile(handle.path);
}

function faces(bytes: Uint8Array): Font[] {
  const result = create(Buffer.from(bytes));
  return "fonts" in result ? result.fonts : [result];
}

function describe(font: Font): FontDescription {
  const familyName = font.familyName;
  if (!familyName) {
    throw new FontLoadingError("parse", "Font has no family name");
  }
  return {
    familyName,
    postscriptName: font.postscriptName || "",
    fullName: font.fullName || familyName,
    properties: propertiesFromSubfamily(font.subfamilyName || "Regular"),
  };
}

/** Run a fontkit call, classifying whatever it throws. */
function parse<T>(run: () => T): T {
  try {
    return run();
  } catch (err) {
    if (err instanceof FontLoadingError) throw err;
    if (err instanceof Error && err.message === "Unknown font format") {
      throw new FontLoadingError("unknown-format", "Unknown font format", { cause: err });
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new FontLoadingError("parse", `Malformed font data: ${detail}`, { cause: err });
  }
}
