import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { checkScript } from "../src/script/check.js";
import { parseScript } from "../src/script/parser.js";

function script(commands: unknown[], fonts?: unknown) {
  return parseScript(
    JSON.stringify({ version: "0.1", canvas: { width: 10, height: 10 }, fonts, commands }),
  );
}

describe("checkScript", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "brushwork-check-"));
    writeFileSync(join(dir, "present.png"), "");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("passes a balanced script", () => {
    const result = checkScript(
      script([
        { op: "save" },
        { op: "clip", shape: { type: "rect", x: 0, y: 0, width: 5, height: 5 } },
        { op: "restore" },
      ]),
      dir,
    );
    expect(result).toEqual({ errors: [], warnings: [] });
  });

  it("flags a restore with no save", () => {
    const result = checkScript(script([{ op: "restore" }]), dir);
    expect(result.errors).toEqual([
      {
        code: "restore-without-save",
        message: "commands.0: restore has no matching save",
        suggestion: "Remove the restore or add a save before it",
      },
    ]);
  });

  it("warns about saves left open", () => {
    const result = checkScript(script([{ op: "save" }, { op: "save" }, { op: "restore" }]), dir);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([
      { code: "unbalanced-save", message: "1 save(s) are never restored" },
    ]);
  });

  it("reports font and image files that do not exist", () => {
    const dest = { x: 0, y: 0, width: 1, height: 1 };
    const result = checkScript(
      script(
        [
          { op: "image", src: "present.png", dest },
          { op: "image", src: "absent.png", dest },
        ],
        { files: ["absent.ttf"] },
      ),
      dir,
    );
    expect(result.errors.map((e) => e.message)).toEqual([
      "fonts.files.0: font file not found: absent.ttf",
      "commands.1: image file not found: absent.png",
    ]);
  });

  it("warns about paths that start without a move", () => {
    const result = checkScript(
      script([
        {
          op: "fill",
          shape: { type: "path", elements: [{ op: "line", to: [1, 1] }] },
          color: "#000",
        },
      ]),
      dir,
    );
    expect(result.warnings.map((w) => w.code)).toEqual(["path-without-move"]);
    expect(result.warnings[0].message).toBe("commands.0: path does not start with a move");
  });
});
