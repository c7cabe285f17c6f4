import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { encodePng } from "@brushwork/canvas";
import { buildFont } from "../../adapter/__tests__/helpers/font-fixture.js";
import { parseScript } from "../src/script/parser.js";
import { renderScript } from "../src/script/run-script.js";

describe("renderScript", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "brushwork-run-"));
    writeFileSync(join(dir, "Test.ttf"), buildFont({ family: "Test Sans" }));
    writeFileSync(
      join(dir, "dot.png"),
      encodePng({ width: 2, height: 2, pixels: new Uint8Array(16).fill(255) }),
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function render(commands: unknown[], extra: Record<string, unknown> = {}): Promise<string[]> {
    const script = parseScript(
      JSON.stringify({ version: "0.1", canvas: { width: 20, height: 10 }, commands, ...extra }),
    );
    const svg = await renderScript(script, { baseDir: dir, fontProviders: [] });
    return svg.split("\n");
  }

  const square = { type: "rect", x: 1, y: 2, width: 3, height: 4 };

  it("paints the background color", async () => {
    const lines = await render([], { canvas: { width: 20, height: 10, background: "#fff" } });
    expect(lines).toEqual([
      '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 20 10" width="20" height="10">',
      '<rect x="0" y="0" width="20" height="10" fill="#ffffffff"/>',
      "</svg>",
    ]);
  });

  it("fills with the command color", async () => {
    const lines = await render([{ op: "fill", shape: square, color: "#ff0000" }]);
    expect(lines).toContain('<path d="M 1,2 h 3 v 4 h -3 Z" fill="#ff0000" fill-rule="nonzero"/>');
  });

  it("composes transforms until restore", async () => {
    const lines = await render([
      { op: "save" },
      { op: "transform", translate: [5, 6] },
      { op: "transform", translate: [1, 1] },
      { op: "fill-even-odd", shape: square, color: "#00ff00" },
      { op: "restore" },
      { op: "fill", shape: square, color: "#00ff00" },
    ]);
    expect(lines).toContain(
      '<path d="M 1,2 h 3 v 4 h -3 Z" fill="#00ff00" fill-rule="evenodd" transform="matrix(1 0 0 1 6 7)"/>',
    );
    expect(lines).toContain('<path d="M 1,2 h 3 v 4 h -3 Z" fill="#00ff00" fill-rule="nonzero"/>');
  });

  it("strokes styled and plain lines alike", async () => {
    const line = { type: "line", from: [0, 0], to: [10, 0] };
    const lines = await render([
      { op: "stroke", shape: line, color: "#0000ff", width: 2 },
      { op: "stroke", shape: line, color: "#0000ff", width: 2, dash: [1, 1], cap: "round" },
    ]);
    const stroked = '<path d="M 0,0 L 10,0" fill="none" stroke="#0000ff" stroke-width="2"/>';
    expect(lines.filter((l) => l === stroked)).toHaveLength(2);
  });

  it("clears a region with a filled rect", async () => {
    const lines = await render([
      { op: "clear", color: "#123456", region: { x: 0, y: 0, width: 5, height: 5 } },
    ]);
    expect(lines).toContain('<rect x="0" y="0" width="5" height="5" fill="#123456"/>');
  });

  it("draws text in the current fill color", async () => {
    const lines = await render([
      { op: "fill", shape: square, color: "#ff0000" },
      { op: "text", text: "a<b", at: [1, 2] },
    ]);
    expect(lines).toContain(
      '<text x="1" y="2" font-family="sans-serif" font-size="10" fill="#ff0000">a&lt;b</text>',
    );
  });

  it("resolves fonts loaded from files", async () => {
    const lines = await render([{ op: "text", text: "hi", at: [0, 8], font: "Test Sans" }], {
      fonts: { files: ["Test.ttf"] },
    });
    expect(lines.filter((l) => l.startsWith("<text"))).toHaveLength(1);
  });

  it("rejects text in an unknown family", async () => {
    await expect(render([{ op: "text", text: "hi", at: [0, 8], font: "Nope" }])).rejects.toThrow(
      "Unknown font family: Nope",
    );
  });

  it("draws images relative to the script directory", async () => {
    const lines = await render([
      {
        op: "image",
        src: "dot.png",
        dest: { x: 0, y: 0, width: 4, height: 4 },
        interpolation: "nearest-neighbor",
      },
    ]);
    const image = lines.find((l) => l.startsWith("<svg x="));
    expect(image).toMatch(
      /^<svg x="0" y="0" width="4" height="4" viewBox="0 0 2 2" preserveAspectRatio="none"><image width="2" height="2" image-rendering="pixelated" href="data:image\/png;base64,[A-Za-z0-9+/=]+"\/><\/svg>$/,
    );
  });

  it("crops with a source rect", async () => {
    const lines = await render([
      {
        op: "image",
        src: "dot.png",
        source: { x: 1, y: 0, width: 1, height: 2 },
        dest: { x: 0, y: 0, width: 4, height: 4 },
      },
    ]);
    expect(lines.some((l) => l.includes('viewBox="1 0 1 2"'))).toBe(true);
    expect(lines.some((l) => l.includes('image-rendering="optimizeSpeed"'))).toBe(true);
  });

  it("paints blurred rects as an image", async () => {
    const lines = await render([
      { op: "blurred-rect", rect: { x: 5, y: 5, width: 10, height: 10 }, radius: 2, color: "#000" },
    ]);
    expect(lines.some((l) => l.startsWith('<svg x="0" y="0" width="20" height="20"'))).toBe(true);
  });
});
