import { resolve } from "node:path";
import {
  CompositeFontSource,
  DEFAULT_PROPERTIES,
  DirectorySource,
  SystemSource,
  describeHandle,
  titleFamily,
  type FamilyName,
  type FontProperties,
  type FontStyleKind,
  type GenericFamilyName,
} from "@brushwork/adapter";

interface SourceOptions {
  dir?: string[];
  system?: boolean;
}

interface MatchOptions extends SourceOptions {
  weight?: string;
  style?: string;
}

const GENERIC_NAMES: readonly GenericFamilyName[] = [
  "serif",
  "sans-serif",
  "monospace",
  "cursive",
  "fantasy",
];

const STYLES: readonly FontStyleKind[] = ["normal", "italic", "oblique"];

function buildSource(options: SourceOptions): { source: CompositeFontSource; dirs: DirectorySource[] } {
  const dirs: DirectorySource[] = [];
  if (options.dir && options.dir.length > 0) {
    dirs.push(new DirectorySource(options.dir.map((d) => resolve(d))));
  }
  if (options.system !== false) {
    dirs.push(new SystemSource());
  }
  return { source: new CompositeFontSource(dirs), dirs };
}

/** A generic family keyword, or a title family for anything else. */
export function parseFamilyName(name: string): FamilyName {
  const generic = GENERIC_NAMES.find((g) => g === name.toLowerCase());
  return generic ? { kind: generic } : titleFamily(name);
}

export function parseProperties(options: { weight?: string; style?: string }): FontProperties {
  const props: FontProperties = { ...DEFAULT_PROPERTIES };
  if (options.weight !== undefined) {
    const weight = Number(options.weight);
    if (!Number.isFinite(weight) || weight < 1 || weight > 1000) {
      throw new Error(`Invalid weight: ${options.weight} (expected 1-1000)`);
    }
    props.weight = weight;
  }
  if (options.style !== undefined) {
    const style = STYLES.find((s) => s === options.style);
    if (!style) {
      throw new Error(`Invalid style: ${options.style} (expected ${STYLES.join(", ")})`);
    }
    props.style = style;
  }
  return props;
}

export function fontsListCommand(options: SourceOptions): void {
  try {
    const { source, dirs } = buildSource(options);
    const families = [...new Set(source.allFamilies())].sort();
    for (const family of families) {
      console.log(family);
    }
    console.log(`\n${families.length} family(ies), ${source.allFonts().length} face(s)`);

    const skipped = dirs.flatMap((d) => d.skipped);
    if (skipped.length > 0) {
      console.warn(`\n${skipped.length} file(s) skipped:`);
      for (const { path, error } of skipped) {
        console.warn(`  ⚠ ${path}: ${error.message}`);
      }
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

export function fontsMatchCommand(families: string[], options: MatchOptions): void {
  try {
    const { source } = buildSource(options);
    const properties = parseProperties(options);
    const handle = source.selectBestMatch(families.map(parseFamilyName), properties);
    const desc = describeHandle(handle);

    console.log(`✓ ${desc.postscriptName}`);
    console.log(`  family:  ${desc.familyName}`);
    console.log(
      `  style:   ${desc.properties.style}, weight ${desc.properties.weight}, stretch ${desc.properties.stretch}`,
    );
    if (handle.kind === "path") {
      console.log(`  file:    ${handle.path}#${handle.fontIndex}`);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
