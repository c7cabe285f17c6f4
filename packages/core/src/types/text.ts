import type { Color } from "./color.js";
import type { Point, Rect, Size } from "./geometry.js";

export type GenericFamily = "serif" | "sans-serif" | "monospace" | "system-ui";

/**
 * A font family reference. Named families come from a font lookup or a
 * registered font; generic families are resolved by the backend.
 */
export interface FontFamily {
  readonly name: string;
  readonly generic?: GenericFamily;
}

export function namedFamily(name: string): FontFamily {
  return { name };
}

export type FontStyle = "regular" | "italic";

export type TextAlignment = "start" | "end" | "center" | "justified";

export type TextAttribute =
  | { kind: "font-family"; family: FontFamily }
  | { kind: "font-size"; size: number }
  | { kind: "weight"; weight: number }
  | { kind: "text-color"; color: Color }
  | { kind: "style"; style: FontStyle }
  | { kind: "underline"; underline: boolean }
  | { kind: "strikethrough"; strikethrough: boolean };

/** A half-open range of UTF-16 code unit offsets. */
export interface TextRange {
  start: number;
  end: number;
}

export interface LineMetric {
  startOffset: number;
  endOffset: number;
  trailingWhitespace: number;
  baseline: number;
  height: number;
  y: number;
}

export interface HitTestPoint {
  idx: number;
  isInside: boolean;
}

export interface HitTestPosition {
  point: Point;
  line: number;
}

export interface TextLayout {
  /** Whether the metric and hit-test methods are implemented. */
  readonly supportsMetrics: boolean;
  text(): string;
  size(): Size;
  trailingWhitespaceWidth(): number;
  imageBounds(): Rect;
  lineText(lineNumber: number): string | undefined;
  lineMetric(lineNumber: number): LineMetric | undefined;
  lineCount(): number;
  hitTestPoint(point: Point): HitTestPoint;
  hitTestTextPosition(idx: number): HitTestPosition;
}

export interface TextLayoutBuilder<L extends TextLayout> {
  maxWidth(width: number): this;
  alignment(alignment: TextAlignment): this;
  defaultAttribute(attribute: TextAttribute): this;
  rangeAttribute(range: TextRange, attribute: TextAttribute): this;
  build(): L;
}

export interface Text<L extends TextLayout> {
  fontFamily(familyName: string): FontFamily | undefined;
  loadFont(data: Uint8Array): FontFamily;
  newTextLayout(text: string): TextLayoutBuilder<L>;
}
