import { DEFAULT_PROPERTIES, type FontProperties, type FontStyleKind } from "./types.js";

// Compound keywords come before the words they contain.
const WEIGHTS: ReadonlyArray<[string, number]> = [
  ["extralight", 200],
  ["ultralight", 200],
  ["semibold", 600],
  ["demibold", 600],
  ["extrabold", 800],
  ["ultrabold", 800],
  ["thin", 100],
  ["light", 300],
  ["medium", 500],
  ["bold", 700],
  ["black", 900],
  ["heavy", 900],
];

const STRETCHES: ReadonlyArray<[string, number]> = [
  ["ultracondensed", 0.5],
  ["extracondensed", 0.625],
  ["semicondensed", 0.875],
  ["condensed", 0.75],
  ["ultraexpanded", 2],
  ["extraexpanded", 1.5],
  ["semiexpanded", 1.125],
  ["expanded", 1.25],
];

/**
 * Derive style, weight and stretch from a subfamily name such as
 * "Bold Italic" or "SemiCondensed Light". Unrecognized words are ignored.
 */
export function propertiesFromSubfamily(subfamily: string): FontProperties {
  const key = subfamily.toLowerCase().replace(/[\s_-]+/g, "");
  return {
    style: styleOf(key),
    weight: lookup(WEIGHTS, key) ?? DEFAULT_PROPERTIES.weight,
    stretch: lookup(STRETCHES, key) ?? DEFAULT_PROPERTIES.stretch,
  };
}

function styleOf(key: string): FontStyleKind {
  if (key.includes("italic")) return "italic";
  if (key.includes("oblique")) return "oblique";
  return "normal";
}

function lookup(table: ReadonlyArray<[string, number]>, key: string): number | undefined {
  return table.find(([word]) => key.includes(word))?.[1];
}
