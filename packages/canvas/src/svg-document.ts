/**
 * Lightweight SVG document builder. No DOM dependency.
 */
export class SvgDocument {
  private defs: string[] = [];
  private body: string[] = [];

  constructor(
    private size: { width: number; height: number },
    private background?: string,
  ) {}

  addDef(svg: string): void {
    this.defs.push(svg);
  }

  add(svg: string): void {
    this.body.push(svg);
  }

  /** Drop drawn elements; definitions stay so live clip references resolve. */
  clearBody(): void {
    this.body = [];
  }

  get elementCount(): number {
    return this.body.length;
  }

  toString(): string {
    const { width, height } = this.size;
    const parts: string[] = [];

    parts.push(
      `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${n(width)} ${n(height)}" width="${n(width)}" height="${n(height)}">`,
    );

    if (this.defs.length > 0) {
      parts.push("<defs>");
      for (const def of this.defs) {
        parts.push(def);
      }
      parts.push("</defs>");
    }

    if (this.background !== undefined) {
      parts.push(
        `<rect x="0" y="0" width="${n(width)}" height="${n(height)}" fill="${this.background}"/>`,
      );
    }

    for (const el of this.body) {
      parts.push(el);
    }

    parts.push("</svg>");
    return parts.join("\n");
  }
}

/** Round a number for clean SVG attribute output */
export function n(value: number): string {
  return Number(value.toFixed(2)).toString();
}

/** Escape XML special characters in text content */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
