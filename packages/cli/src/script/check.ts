import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { DrawingScript, ScriptShape } from "./schema.js";

export interface ScriptIssue {
  code: string;
  message: string;
  suggestion?: string;
}

export interface ScriptCheckResult {
  errors: ScriptIssue[];
  warnings: ScriptIssue[];
}

/**
 * Linter-style pass over a parsed script. Catches problems the schema
 * cannot see: save/restore balance, files that do not exist, and paths
 * that draw before moving.
 */
export function checkScript(script: DrawingScript, baseDir: string): ScriptCheckResult {
  const errors: ScriptIssue[] = [];
  const warnings: ScriptIssue[] = [];

  checkSaveBalance(script, errors, warnings);
  checkFiles(script, baseDir, errors);
  checkPaths(script, warnings);

  return { errors, warnings };
}

function checkSaveBalance(
  script: DrawingScript,
  errors: ScriptIssue[],
  warnings: ScriptIssue[],
): void {
  let depth = 0;
  script.commands.forEach((cmd, i) => {
    if (cmd.op === "save") {
      depth++;
    } else if (cmd.op === "restore") {
      if (depth === 0) {
        errors.push({
          code: "restore-without-save",
          message: `commands.${i}: restore has no matching save`,
          suggestion: "Remove the restore or add a save before it",
        });
      } else {
        depth--;
      }
    }
  });
  if (depth > 0) {
    warnings.push({
      code: "unbalanced-save",
      message: `${depth} save(s) are never restored`,
    });
  }
}

function checkFiles(script: DrawingScript, baseDir: string, errors: ScriptIssue[]): void {
  const missing = (path: string): boolean => !existsSync(resolve(baseDir, path));

  script.fonts.files.forEach((file, i) => {
    if (missing(file)) {
      errors.push({
        code: "missing-file",
        message: `fonts.files.${i}: font file not found: ${file}`,
      });
    }
  });
  script.commands.forEach((cmd, i) => {
    if (cmd.op === "image" && missing(cmd.src)) {
      errors.push({
        code: "missing-file",
        message: `commands.${i}: image file not found: ${cmd.src}`,
      });
    }
  });
}

function checkPaths(script: DrawingScript, warnings: ScriptIssue[]): void {
  script.commands.forEach((cmd, i) => {
    if (!("shape" in cmd)) return;
    if (!startsWithMove(cmd.shape)) {
      warnings.push({
        code: "path-without-move",
        message: `commands.${i}: path does not start with a move`,
        suggestion: "Begin the path with a move element",
      });
    }
  });
}

function startsWithMove(shape: ScriptShape): boolean {
  return shape.type !== "path" || shape.elements[0].op === "move";
}
