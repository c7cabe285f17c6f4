import { readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { parseScript } from "../script/parser.js";
import { renderScript } from "../script/run-script.js";

interface RenderOptions {
  output?: string;
}

/** Output path beside the input, with its extension replaced by `.svg`. */
export function defaultOutputPath(input: string): string {
  return /\.(ya?ml|json)$/i.test(input)
    ? input.replace(/\.(ya?ml|json)$/i, ".svg")
    : `${input}.svg`;
}

export async function renderCommand(input: string, options: RenderOptions): Promise<void> {
  try {
    const content = readFileSync(input, "utf-8");
    const script = parseScript(content);
    const svg = await renderScript(script, { baseDir: dirname(input) });

    const outputPath = options.output ?? defaultOutputPath(input);
    writeFileSync(outputPath, svg, "utf-8");
    console.log(`Rendered: ${outputPath}`);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
