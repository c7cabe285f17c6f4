import { readFile } from "node:fs/promises";
import { DrawError, namedFamily } from "@brushwork/core";
import type {
  FontFamily,
  HitTestPoint,
  HitTestPosition,
  LineMetric,
  Point,
  Rect,
  Size,
  Text,
  TextAlignment,
  TextAttribute,
  TextLayout,
  TextLayoutBuilder,
  TextRange,
} from "@brushwork/core";
import type { CompositeFontSource } from "./fonts/composite-font-source.js";
import { SelectionError } from "./fonts/errors.js";

/** Font lookup and layout factory backed by a composite font source. */
export class AdapterText implements Text<AdapterTextLayout> {
  constructor(readonly fonts: CompositeFontSource) {}

  fontFamily(familyName: string): FontFamily | undefined {
    try {
      this.fonts.selectFamilyByName(familyName);
    } catch (err) {
      if (err instanceof SelectionError) return undefined;
      throw err;
    }
    return namedFamily(familyName);
  }

  loadFont(data: Uint8Array): FontFamily {
    return namedFamily(this.fonts.registerFont(data).familyName);
  }

  /** Read a font file and register it. */
  async loadFontFile(path: string): Promise<FontFamily> {
    let data: Uint8Array;
    try {
      data = await readFile(path);
    } catch (err) {
      throw new DrawError("backend-error", `Could not read font file: ${path}`, { cause: err });
    }
    return this.loadFont(data);
  }

  newTextLayout(text: string): AdapterTextLayoutBuilder {
    return new AdapterTextLayoutBuilder(text);
  }
}

/** Layout options are recorded but do not change the built layout. */
export class AdapterTextLayoutBuilder implements TextLayoutBuilder<AdapterTextLayout> {
  private width = Infinity;
  private align: TextAlignment = "start";
  private readonly defaults: TextAttribute[] = [];
  private readonly ranges: Array<{ range: TextRange; attribute: TextAttribute }> = [];

  constructor(private readonly source: string) {}

  maxWidth(width: number): this {
    this.width = width;
    return this;
  }

  alignment(alignment: TextAlignment): this {
    this.align = alignment;
    return this;
  }

  defaultAttribute(attribute: TextAttribute): this {
    this.defaults.push(attribute);
    return this;
  }

  rangeAttribute(range: TextRange, attribute: TextAttribute): this {
    this.ranges.push({ range, attribute });
    return this;
  }

  build(): AdapterTextLayout {
    return new AdapterTextLayout(this.source, {
      maxWidth: this.width,
      alignment: this.align,
      defaultAttributes: [...this.defaults],
      rangeAttributes: [...this.ranges],
    });
  }
}

export interface LayoutOptions {
  maxWidth: number;
  alignment: TextAlignment;
  defaultAttributes: TextAttribute[];
  rangeAttributes: Array<{ range: TextRange; attribute: TextAttribute }>;
}

/**
 * A layout that carries its text and options but computes no metrics;
 * every metric and hit-test query throws `not-supported`.
 */
export class AdapterTextLayout implements TextLayout {
  readonly supportsMetrics = false;

  constructor(
    private readonly source: string,
    readonly options: LayoutOptions,
  ) {}

  text(): string {
    return this.source;
  }

  size(): Size {
    return unsupported("size");
  }

  trailingWhitespaceWidth(): number {
    return unsupported("trailingWhitespaceWidth");
  }

  imageBounds(): Rect {
    return unsupported("imageBounds");
  }

  lineText(_lineNumber: number): string | undefined {
    return unsupported("lineText");
  }

  lineMetric(_lineNumber: number): LineMetric | undefined {
    return unsupported("lineMetric");
  }

  lineCount(): number {
    return unsupported("lineCount");
  }

  hitTestPoint(_point: Point): HitTestPoint {
    return unsupported("hitTestPoint");
  }

  hitTestTextPosition(_idx: number): HitTestPosition {
    return unsupported("hitTestTextPosition");
  }
}

function unsupported(operation: string): never {
  throw new DrawError("not-supported", `Text layout ${operation} is not supported`);
}
