import { readFileSync } from "node:fs";
import { dirname } from "node:path";
import { checkScript } from "../script/check.js";
import { parseScript } from "../script/parser.js";

export function validateCommand(input: string): void {
  try {
    const content = readFileSync(input, "utf-8");
    const script = parseScript(content);
    const { errors, warnings } = checkScript(script, dirname(input));

    if (errors.length === 0 && warnings.length === 0) {
      console.log("✓ Script is valid. No issues found.");
      return;
    }

    if (errors.length > 0) {
      console.error(`\n${errors.length} error(s):`);
      for (const err of errors) {
        console.error(`  ✗ [${err.code}] ${err.message}`);
        if (err.suggestion) {
          console.error(`    → ${err.suggestion}`);
        }
      }
    }

    if (warnings.length > 0) {
      console.warn(`\n${warnings.length} warning(s):`);
      for (const warn of warnings) {
        console.warn(`  ⚠ [${warn.code}] ${warn.message}`);
        if (warn.suggestion) {
          console.warn(`    → ${warn.suggestion}`);
        }
      }
    }

    console.log(`\nSummary: ${errors.length} error(s), ${warnings.length} warning(s)`);

    if (errors.length > 0) {
      process.exit(1);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
