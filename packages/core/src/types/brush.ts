import type { Color } from "./color.js";
import type { Point, Vec2 } from "./geometry.js";

export interface GradientStop {
  /** Position along the ramp, 0..1. */
  pos: number;
  color: Color;
}

export interface LinearGradient {
  kind: "linear";
  start: Point;
  end: Point;
  stops: GradientStop[];
}

export interface RadialGradient {
  kind: "radial";
  center: Point;
  originOffset: Vec2;
  radius: number;
  stops: GradientStop[];
}

/** A gradient whose geometry is already in user space. */
export type FixedGradient = LinearGradient | RadialGradient;
