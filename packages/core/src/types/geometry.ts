// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

/** A displacement or a pair of radii; same shape as a point, different meaning. */
export interface Vec2 {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Line {
  p0: Point;
  p1: Point;
}

/**
 * A 2D affine map as six coefficients `[a, b, c, d, e, f]`, column convention:
 *
 *   x' = a*x + c*y + e
 *   y' = b*x + d*y + f
 */
export type Affine = readonly [number, number, number, number, number, number];

// ---- Path elements ----

export type PathEl =
  | { type: "move-to"; point: Point }
  | { type: "line-to"; point: Point }
  | { type: "quad-to"; ctrl: Point; point: Point }
  | { type: "curve-to"; ctrl1: Point; ctrl2: Point; point: Point }
  | { type: "close-path" };

// ---- Shapes ----

export interface ArcParams {
  center: Point;
  radii: Vec2;
  /** Radians, measured before `xRotation` is applied. */
  startAngle: number;
  /** Radians; negative sweeps run counter-clockwise in a Y-down space. */
  sweepAngle: number;
  xRotation: number;
}

export type Shape =
  | { type: "line"; p0: Point; p1: Point }
  | { type: "rect"; rect: Rect }
  | { type: "path"; elements: readonly PathEl[] }
  | { type: "circle"; center: Point; radius: number }
  | { type: "ellipse"; center: Point; radii: Vec2; rotation: number }
  | ({ type: "arc" } & ArcParams)
  | { type: "rounded-rect"; rect: Rect; radius: number };
