import yaml from "js-yaml";
import { DrawingScriptSchema, type DrawingScript } from "./schema.js";

/**
 * Read a drawing script: canvas size and background, font sources, and the
 * command list. JSON is tried before YAML. Schema defaults are applied
 * (stroke width 1, bilinear image interpolation, no system fonts), angles
 * stay in degrees, and relative paths are left for the caller to resolve.
 */
export function parseScript(input: string): DrawingScript {
  let raw: unknown;

  try {
    raw = JSON.parse(input);
  } catch {
    try {
      raw = yaml.load(input);
    } catch (yamlErr) {
      throw new Error(
        `Failed to parse input as JSON or YAML: ${yamlErr instanceof Error ? yamlErr.message : String(yamlErr)}`,
      );
    }
  }

  const result = DrawingScriptSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid drawing script:\n${issues}`);
  }

  return result.data;
}
