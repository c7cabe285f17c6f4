import { SelectionError } from "./errors.js";
import type { FontProperties, FontStyleKind } from "./types.js";

const STYLE_PREFERENCE: Record<FontStyleKind, FontStyleKind[]> = {
  italic: ["italic", "oblique", "normal"],
  oblique: ["oblique", "italic", "normal"],
  normal: ["normal", "oblique", "italic"],
};

/**
 * Index of the candidate that best matches `query`, following the CSS Fonts
 * matching steps: narrow by stretch, then style, then weight.
 */
export function findBestMatch(
  candidates: readonly FontProperties[],
  query: FontProperties,
): number {
  let set = candidates.map((_, i) => i);
  if (set.length === 0) {
    throw new SelectionError("not-found", "No candidate fonts to match against");
  }

  const stretch = pickStretch(set.map((i) => candidates[i].stretch), query.stretch);
  set = set.filter((i) => candidates[i].stretch === stretch);

  const styles = new Set(set.map((i) => candidates[i].style));
  const style = STYLE_PREFERENCE[query.style].find((s) => styles.has(s));
  set = set.filter((i) => candidates[i].style === style);

  const weight = pickWeight(set.map((i) => candidates[i].weight), query.weight);
  set = set.filter((i) => candidates[i].weight === weight);

  return set[0];
}

function pickStretch(available: number[], desired: number): number {
  if (available.includes(desired)) return desired;
  const narrower = available.filter((s) => s < desired);
  const wider = available.filter((s) => s > desired);
  if (desired <= 1) {
    return narrower.length > 0 ? Math.max(...narrower) : Math.min(...wider);
  }
  return wider.length > 0 ? Math.min(...wider) : Math.max(...narrower);
}

function pickWeight(available: number[], desired: number): number {
  if (available.includes(desired)) return desired;
  const lighter = available.filter((w) => w < desired);
  const heavier = available.filter((w) => w > desired);
  const lightestHeavier = (): number => Math.min(...heavier);
  const heaviestLighter = (): number => Math.max(...lighter);

  if (desired >= 400 && desired <= 500) {
    const upTo500 = heavier.filter((w) => w <= 500);
    if (upTo500.length > 0) return Math.min(...upTo500);
    if (lighter.length > 0) return heaviestLighter();
    return lightestHeavier();
  }
  if (desired < 400) {
    return lighter.length > 0 ? heaviestLighter() : lightestHeavier();
  }
  return heavier.length > 0 ? lightestHeavier() : heaviestLighter();
}
