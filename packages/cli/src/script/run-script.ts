import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  CompositeFontSource,
  DirectorySource,
  SystemSource,
  VectorRenderContext,
  type Brush,
  type FontProvider,
} from "@brushwork/adapter";
import { SvgCanvas, decodePng } from "@brushwork/canvas";
import { affineMultiply, colorFromHex, colorToHex, type StrokeStyle } from "@brushwork/core";
import { toAffine, toPoint, toRect, toShape } from "./convert.js";
import type { DrawingScript, ScriptCommand } from "./schema.js";

export interface RunOptions {
  /** Directory relative paths in the script resolve against. */
  baseDir: string;
  /** Font providers to use instead of the ones the script's `fonts` block names. */
  fontProviders?: FontProvider[];
}

/** Run a script against a fresh SVG canvas and return the SVG. */
export async function renderScript(script: DrawingScript, options: RunOptions): Promise<string> {
  const providers = options.fontProviders ?? scriptFontProviders(script, options.baseDir);
  const canvas = new SvgCanvas(script.canvas, {
    background: script.canvas.background && colorToHex(colorFromHex(script.canvas.background)),
  });
  const ctx = new VectorRenderContext(canvas, new CompositeFontSource(providers));

  await Promise.all(
    script.fonts.files.map((file) => ctx.text().loadFontFile(resolve(options.baseDir, file))),
  );

  for (const command of script.commands) {
    runCommand(ctx, command, options.baseDir);
  }
  ctx.finish();
  return canvas.toSvg();
}

export function scriptFontProviders(script: DrawingScript, baseDir: string): FontProvider[] {
  const providers: FontProvider[] = [];
  if (script.fonts.directories.length > 0) {
    providers.push(new DirectorySource(script.fonts.directories.map((d) => resolve(baseDir, d))));
  }
  if (script.fonts.system) {
    providers.push(new SystemSource());
  }
  return providers;
}

export function runCommand(ctx: VectorRenderContext, cmd: ScriptCommand, baseDir: string): void {
  switch (cmd.op) {
    case "clear":
      ctx.clear(cmd.region && toRect(cmd.region), colorFromHex(cmd.color));
      break;
    case "fill":
      ctx.fill(toShape(cmd.shape), solid(ctx, cmd.color));
      break;
    case "fill-even-odd":
      ctx.fillEvenOdd(toShape(cmd.shape), solid(ctx, cmd.color));
      break;
    case "stroke": {
      const shape = toShape(cmd.shape);
      const brush = solid(ctx, cmd.color);
      if (cmd.dash || cmd.cap || cmd.join) {
        const style: StrokeStyle = { lineCap: cmd.cap, lineJoin: cmd.join };
        if (cmd.dash) style.dash = { pattern: cmd.dash, offset: 0 };
        ctx.strokeStyled(shape, brush, cmd.width, style);
      } else {
        ctx.stroke(shape, brush, cmd.width);
      }
      break;
    }
    case "clip":
      ctx.clip(toShape(cmd.shape));
      break;
    case "save":
      ctx.save();
      break;
    case "restore":
      ctx.restore();
      break;
    case "transform":
      ctx.transform(affineMultiply(ctx.currentTransform(), toAffine(cmd)));
      break;
    case "text": {
      const builder = ctx.text().newTextLayout(cmd.text);
      if (cmd.font !== undefined) {
        const family = ctx.text().fontFamily(cmd.font);
        if (!family) throw new Error(`Unknown font family: ${cmd.font}`);
        builder.defaultAttribute({ kind: "font-family", family });
      }
      if (cmd.size !== undefined) {
        builder.defaultAttribute({ kind: "font-size", size: cmd.size });
      }
      ctx.drawText(builder.build(), toPoint(cmd.at));
      break;
    }
    case "image": {
      const png = decodePng(readFileSync(resolve(baseDir, cmd.src)));
      const image = ctx.makeImage(png.width, png.height, png.pixels, "rgba-separate");
      if (cmd.source) {
        ctx.drawImageArea(image, toRect(cmd.source), toRect(cmd.dest), cmd.interpolation);
      } else {
        ctx.drawImage(image, toRect(cmd.dest), cmd.interpolation);
      }
      break;
    }
    case "blurred-rect":
      ctx.blurredRect(toRect(cmd.rect), cmd.radius, solid(ctx, cmd.color));
      break;
  }
}

function solid(ctx: VectorRenderContext, hex: string): Brush {
  return ctx.solidBrush(colorFromHex(hex));
}
