import {
  IDENTITY_2F,
  type CanvasRenderingContext2D,
  type Transform2F,
} from "@brushwork/canvas";

type CanvasMethod = keyof CanvasRenderingContext2D;

export type CanvasCall = {
  [K in CanvasMethod]: { method: K; args: Parameters<CanvasRenderingContext2D[K]> };
}[CanvasMethod];

/** Records every call; keeps only the transform stack as state. */
export class RecordingCanvas implements CanvasRenderingContext2D {
  readonly calls: CanvasCall[] = [];
  private current: Transform2F = IDENTITY_2F;
  private stack: Transform2F[] = [];

  methods(): CanvasMethod[] {
    return this.calls.map((c) => c.method);
  }

  save(): void {
    this.calls.push({ method: "save", args: [] });
    this.stack.push(this.current);
  }

  restore(): void {
    this.calls.push({ method: "restore", args: [] });
    this.current = this.stack.pop() ?? this.current;
  }

  setTransform(...args: Parameters<CanvasRenderingContext2D["setTransform"]>): void {
    this.calls.push({ method: "setTransform", args });
    this.current = args[0];
  }

  transform(): Transform2F {
    this.calls.push({ method: "transform", args: [] });
    return this.current;
  }

  setFillStyle(...args: Parameters<CanvasRenderingContext2D["setFillStyle"]>): void {
    this.calls.push({ method: "setFillStyle", args });
  }

  setStrokeStyle(...args: Parameters<CanvasRenderingContext2D["setStrokeStyle"]>): void {
    this.calls.push({ method: "setStrokeStyle", args });
  }

  setLineWidth(...args: Parameters<CanvasRenderingContext2D["setLineWidth"]>): void {
    this.calls.push({ method: "setLineWidth", args });
  }

  setImageSmoothingEnabled(
    ...args: Parameters<CanvasRenderingContext2D["setImageSmoothingEnabled"]>
  ): void {
    this.calls.push({ method: "setImageSmoothingEnabled", args });
  }

  setImageSmoothingQuality(
    ...args: Parameters<CanvasRenderingContext2D["setImageSmoothingQuality"]>
  ): void {
    this.calls.push({ method: "setImageSmoothingQuality", args });
  }

  clear(): void {
    this.calls.push({ method: "clear", args: [] });
  }

  fillRect(...args: Parameters<CanvasRenderingContext2D["fillRect"]>): void {
    this.calls.push({ method: "fillRect", args });
  }

  fillPath(...args: Parameters<CanvasRenderingContext2D["fillPath"]>): void {
    this.calls.push({ method: "fillPath", args });
  }

  strokePath(...args: Parameters<CanvasRenderingContext2D["strokePath"]>): void {
    this.calls.push({ method: "strokePath", args });
  }

  clipPath(...args: Parameters<CanvasRenderingContext2D["clipPath"]>): void {
    this.calls.push({ method: "clipPath", args });
  }

  fillText(...args: Parameters<CanvasRenderingContext2D["fillText"]>): void {
    this.calls.push({ method: "fillText", args });
  }

  drawImage(...args: Parameters<CanvasRenderingContext2D["drawImage"]>): void {
    this.calls.push({ method: "drawImage", args });
  }

  drawSubimage(...args: Parameters<CanvasRenderingContext2D["drawSubimage"]>): void {
    this.calls.push({ method: "drawSubimage", args });
  }
}
