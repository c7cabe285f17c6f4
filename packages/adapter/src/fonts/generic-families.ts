import type { GenericFamilyName } from "./types.js";

type FamilyTable = Record<GenericFamilyName, string>;

const WINDOWS: FamilyTable = {
  serif: "Times New Roman",
  "sans-serif": "Arial",
  monospace: "Courier New",
  cursive: "Comic Sans MS",
  fantasy: "Impact",
};

const MACOS: FamilyTable = {
  serif: "Times New Roman",
  "sans-serif": "Arial",
  monospace: "Courier New",
  cursive: "Apple Chancery",
  fantasy: "Papyrus",
};

const OTHER: FamilyTable = {
  serif: "DejaVu Serif",
  "sans-serif": "DejaVu Sans",
  monospace: "DejaVu Sans Mono",
  cursive: "DejaVu Sans",
  fantasy: "DejaVu Sans",
};

/** The concrete family a generic name stands for on `platform`. */
export function defaultFamilyName(
  generic: GenericFamilyName,
  platform: NodeJS.Platform = process.platform,
): string {
  switch (platform) {
    case "win32":
      return WINDOWS[generic];
    case "darwin":
      return MACOS[generic];
    default:
      return OTHER[generic];
  }
}
