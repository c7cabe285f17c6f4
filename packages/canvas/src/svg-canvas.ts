import type {
  CanvasRenderingContext2D,
  FillRule,
  ImageSmoothingQuality,
} from "./canvas.js";
import { COLOR_BLACK, colorUToHex } from "./color.js";
import {
  IDENTITY_2F,
  isIdentity,
  vec2f,
  type RectF,
  type Transform2F,
  type Vector2F,
} from "./geometry.js";
import type { Path2D } from "./path.js";
import { encodePng } from "./png.js";
import type { CanvasImageSource, FillStyle, Pattern } from "./style.js";
import { SvgDocument, escapeXml, n } from "./svg-document.js";

export interface SvgCanvasOptions {
  /** CSS color painted behind everything; omitted means transparent. */
  background?: string;
  fontFamily?: string;
  fontSize?: number;
}

const DEFAULT_OPTIONS = {
  fontFamily: "sans-serif",
  fontSize: 10,
} as const;

interface CanvasState {
  transform: Transform2F;
  fillStyle: FillStyle;
  strokeStyle: FillStyle;
  lineWidth: number;
  clipId?: string;
  smoothingEnabled: boolean;
  smoothingQuality: ImageSmoothingQuality;
}

/**
 * SVG implementation of CanvasRenderingContext2D.
 * Each drawing call appends one element; `toSvg` serializes the scene.
 */
export class SvgCanvas implements CanvasRenderingContext2D {
  private readonly doc: SvgDocument;
  private readonly opts: SvgCanvasOptions & Required<Pick<SvgCanvasOptions, "fontFamily" | "fontSize">>;
  private state: CanvasState = defaultState();
  private stack: CanvasState[] = [];
  private nextId = 1;

  constructor(
    readonly size: { width: number; height: number },
    options?: SvgCanvasOptions,
  ) {
    this.opts = { ...DEFAULT_OPTIONS, ...options };
    this.doc = new SvgDocument(size, this.opts.background);
  }

  /** Number of drawn elements currently in the scene. */
  get elementCount(): number {
    return this.doc.elementCount;
  }

  save(): void {
    this.stack.push({ ...this.state });
  }

  restore(): void {
    const prev = this.stack.pop();
    if (prev) this.state = prev;
  }

  setTransform(transform: Transform2F): void {
    this.state.transform = transform;
  }

  transform(): Transform2F {
    return this.state.transform;
  }

  setFillStyle(style: FillStyle): void {
    this.state.fillStyle = style;
  }

  setStrokeStyle(style: FillStyle): void {
    this.state.strokeStyle = style;
  }

  setLineWidth(width: number): void {
    this.state.lineWidth = width;
  }

  setImageSmoothingEnabled(enabled: boolean): void {
    this.state.smoothingEnabled = enabled;
  }

  setImageSmoothingQuality(quality: ImageSmoothingQuality): void {
    this.state.smoothingQuality = quality;
  }

  clear(): void {
    this.doc.clearBody();
  }

  fillRect(rect: RectF): void {
    const { origin, size } = rect;
    this.emit(
      `<rect x="${n(origin.x)}" y="${n(origin.y)}" width="${n(size.x)}" height="${n(size.y)}"${this.paint("fill", this.state.fillStyle)}${this.transformAttr()}/>`,
    );
  }

  fillPath(path: Path2D, rule: FillRule): void {
    this.emit(
      `<path d="${pathData(path)}"${this.paint("fill", this.state.fillStyle)} fill-rule="${svgRule(rule)}"${this.transformAttr()}/>`,
    );
  }

  strokePath(path: Path2D): void {
    this.emit(
      `<path d="${pathData(path)}" fill="none"${this.paint("stroke", this.state.strokeStyle)} stroke-width="${n(this.state.lineWidth)}"${this.transformAttr()}/>`,
    );
  }

  clipPath(path: Path2D, rule: FillRule): void {
    const id = `clip${this.nextId++}`;
    const parent = this.state.clipId ? ` clip-path="url(#${this.state.clipId})"` : "";
    this.doc.addDef(
      `<clipPath id="${id}"${parent}><path d="${pathData(path)}" clip-rule="${svgRule(rule)}"${this.transformAttr()}/></clipPath>`,
    );
    this.state.clipId = id;
  }

  fillText(text: string, position: Vector2F): void {
    this.emit(
      `<text x="${n(position.x)}" y="${n(position.y)}" font-family="${escapeXml(this.opts.fontFamily)}" font-size="${n(this.opts.fontSize)}"${this.paint("fill", this.state.fillStyle)}${this.transformAttr()}>${escapeXml(text)}</text>`,
    );
  }

  drawImage(image: CanvasImageSource, dest: RectF | Vector2F): void {
    const pattern = image.toPattern(IDENTITY_2F);
    const { width, height } = pattern.image;
    const src: RectF = { origin: vec2f(0, 0), size: vec2f(width, height) };
    const dst: RectF = "origin" in dest ? dest : { origin: dest, size: src.size };
    this.drawPattern(pattern, src, dst);
  }

  drawSubimage(image: CanvasImageSource, src: RectF, dest: RectF): void {
    this.drawPattern(image.toPattern(IDENTITY_2F), src, dest);
  }

  toSvg(): string {
    return this.doc.toString();
  }

  private drawPattern(pattern: Pattern, src: RectF, dst: RectF): void {
    const inner =
      `<svg x="${n(dst.origin.x)}" y="${n(dst.origin.y)}" width="${n(dst.size.x)}" height="${n(dst.size.y)}" ` +
      `viewBox="${n(src.origin.x)} ${n(src.origin.y)} ${n(src.size.x)} ${n(src.size.y)}" preserveAspectRatio="none">` +
      `${this.imageElement(pattern)}</svg>`;
    const transform = this.transformAttr();
    this.emit(transform ? `<g${transform}>${inner}</g>` : inner);
  }

  private imageElement(pattern: Pattern): string {
    const { image, transform } = pattern;
    const png = Buffer.from(encodePng(image)).toString("base64");
    const t = isIdentity(transform) ? "" : ` transform="${matrix(transform)}"`;
    return `<image width="${image.width}" height="${image.height}" image-rendering="${this.rendering()}"${t} href="data:image/png;base64,${png}"/>`;
  }

  private rendering(): string {
    if (!this.state.smoothingEnabled) return "pixelated";
    return this.state.smoothingQuality === "low" ? "optimizeSpeed" : "optimizeQuality";
  }

  private paint(attr: "fill" | "stroke", style: FillStyle): string {
    if (style.kind === "color") {
      const { color } = style;
      const opacity = color.a < 255 ? ` ${attr}-opacity="${n(color.a / 255)}"` : "";
      return ` ${attr}="${colorUToHex(color)}"${opacity}`;
    }
    const id = `pattern${this.nextId++}`;
    const { image, transform } = style.pattern;
    const t = isIdentity(transform) ? "" : ` patternTransform="${matrix(transform)}"`;
    this.doc.addDef(
      `<pattern id="${id}" patternUnits="userSpaceOnUse" width="${image.width}" height="${image.height}"${t}>${this.imageElement({ image, transform: IDENTITY_2F })}</pattern>`,
    );
    return ` ${attr}="url(#${id})"`;
  }

  private transformAttr(): string {
    const t = this.state.transform;
    return isIdentity(t) ? "" : ` transform="${matrix(t)}"`;
  }

  /** Clip is applied on a wrapper so it stays in canvas space. */
  private emit(element: string): void {
    const clipId = this.state.clipId;
    this.doc.add(clipId ? `<g clip-path="url(#${clipId})">${element}</g>` : element);
  }
}

function defaultState(): CanvasState {
  return {
    transform: IDENTITY_2F,
    fillStyle: { kind: "color", color: COLOR_BLACK },
    strokeStyle: { kind: "color", color: COLOR_BLACK },
    lineWidth: 1,
    smoothingEnabled: true,
    smoothingQuality: "low",
  };
}

function svgRule(rule: FillRule): string {
  return rule === "winding" ? "nonzero" : "evenodd";
}

/** SVG `matrix(a b c d e f)` takes the column-convention order. */
function matrix(t: Transform2F): string {
  const c = (v: number): string => Number(v.toFixed(4)).toString();
  return `matrix(${c(t.m11)} ${c(t.m21)} ${c(t.m12)} ${c(t.m22)} ${c(t.m31)} ${c(t.m32)})`;
}

/** Serialize a path to SVG path data. */
export function pathData(path: Path2D): string {
  const parts: string[] = [];
  const pt = (v: Vector2F): string => `${n(v.x)},${n(v.y)}`;
  for (const cmd of path.commands) {
    switch (cmd.op) {
      case "move":
        parts.push(`M ${pt(cmd.to)}`);
        break;
      case "line":
        parts.push(`L ${pt(cmd.to)}`);
        break;
      case "quad":
        parts.push(`Q ${pt(cmd.ctrl)} ${pt(cmd.to)}`);
        break;
      case "cubic":
        parts.push(`C ${pt(cmd.ctrl0)} ${pt(cmd.ctrl1)} ${pt(cmd.to)}`);
        break;
      case "rect": {
        const { origin, size } = cmd.rect;
        parts.push(`M ${pt(origin)} h ${n(size.x)} v ${n(size.y)} h ${n(-size.x)} Z`);
        break;
      }
      case "close":
        parts.push("Z");
        break;
    }
  }
  return parts.join(" ");
}
