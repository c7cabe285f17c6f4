import { describe, expect, it } from "vitest";
import { parseFamilyName, parseProperties } from "../src/commands/fonts.js";
import { templates } from "../src/commands/init.js";
import { defaultOutputPath } from "../src/commands/render.js";
import { checkScript } from "../src/script/check.js";
import { parseScript } from "../src/script/parser.js";
import { renderScript } from "../src/script/run-script.js";

describe("defaultOutputPath", () => {
  it("replaces script extensions", () => {
    expect(defaultOutputPath("art/house.yaml")).toBe("art/house.svg");
    expect(defaultOutputPath("art/house.YML")).toBe("art/house.svg");
    expect(defaultOutputPath("house.json")).toBe("house.svg");
  });

  it("appends to other names", () => {
    expect(defaultOutputPath("house")).toBe("house.svg");
    expect(defaultOutputPath("house.txt")).toBe("house.txt.svg");
  });
});

describe("font option parsing", () => {
  it("recognizes generic family keywords", () => {
    expect(parseFamilyName("Monospace")).toEqual({ kind: "monospace" });
    expect(parseFamilyName("Fira Code")).toEqual({ kind: "title", name: "Fira Code" });
  });

  it("builds properties from flags", () => {
    expect(parseProperties({})).toEqual({ style: "normal", weight: 400, stretch: 1 });
    expect(parseProperties({ weight: "700", style: "italic" })).toEqual({
      style: "italic",
      weight: 700,
      stretch: 1,
    });
  });

  it("rejects bad flags", () => {
    expect(() => parseProperties({ weight: "heavy" })).toThrow(
      "Invalid weight: heavy (expected 1-1000)",
    );
    expect(() => parseProperties({ style: "slanted" })).toThrow(
      "Invalid style: slanted (expected normal, italic, oblique)",
    );
  });
});

describe("templates", () => {
  for (const [name, source] of Object.entries(templates)) {
    it(`${name} is a clean script that renders`, async () => {
      const script = parseScript(source);
      expect(checkScript(script, ".")).toEqual({ errors: [], warnings: [] });

      const svg = await renderScript(script, { baseDir: ".", fontProviders: [] });
      expect(svg.startsWith("<svg ")).toBe(true);
      expect(svg.endsWith("</svg>")).toBe(true);
    });
  }
});
