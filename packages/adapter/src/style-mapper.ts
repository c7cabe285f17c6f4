import { DrawError } from "@brushwork/core";
import type { Color, FixedGradient, Rect } from "@brushwork/core";
import { colorUFromU32, type FillStyle } from "@brushwork/canvas";

export type Brush =
  | { kind: "solid"; color: Color }
  | { kind: "gradient"; gradient: FixedGradient };

/**
 * Resolve a brush to a canvas fill style. `bbox` is the bounds of the shape
 * being painted, for brushes that need them; solid colors never call it.
 * Gradients are rejected.
 */
export function resolveBrush(brush: Brush, bbox: () => Rect): FillStyle {
  switch (brush.kind) {
    case "solid":
      return { kind: "color", color: colorUFromU32(brush.color) };
    case "gradient":
      throw new DrawError("not-supported", "Gradient brushes are not supported");
  }
}
