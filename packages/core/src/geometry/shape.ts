import type {
  ArcParams,
  Line,
  PathEl,
  Point,
  Rect,
  Shape,
  Vec2,
} from "../types/geometry.js";
import { appendArc, arcStart } from "./arc.js";

// ---- Constructors ----

export function line(p0: Point, p1: Point): Shape {
  return { type: "line", p0, p1 };
}

export function rect(x: number, y: number, width: number, height: number): Shape {
  return { type: "rect", rect: { x, y, width, height } };
}

export function path(elements: readonly PathEl[]): Shape {
  return { type: "path", elements };
}

export function circle(center: Point, radius: number): Shape {
  return { type: "circle", center, radius };
}

export function ellipse(center: Point, radii: Vec2, rotation: number = 0): Shape {
  return { type: "ellipse", center, radii, rotation };
}

export function arc(params: ArcParams): Shape {
  return { type: "arc", ...params };
}

export function roundedRect(r: Rect, radius: number): Shape {
  return { type: "rounded-rect", rect: r, radius };
}

export function moveTo(x: number, y: number): PathEl {
  return { type: "move-to", point: { x, y } };
}

export function lineTo(x: number, y: number): PathEl {
  return { type: "line-to", point: { x, y } };
}

export function quadTo(cx: number, cy: number, x: number, y: number): PathEl {
  return { type: "quad-to", ctrl: { x: cx, y: cy }, point: { x, y } };
}

export function curveTo(
  c1x: number,
  c1y: number,
  c2x: number,
  c2y: number,
  x: number,
  y: number,
): PathEl {
  return {
    type: "curve-to",
    ctrl1: { x: c1x, y: c1y },
    ctrl2: { x: c2x, y: c2y },
    point: { x, y },
  };
}

export function closePath(): PathEl {
  return { type: "close-path" };
}

// ---- Capability queries ----

/** The shape as a single line segment, if it is exactly one. */
export function asLine(shape: Shape): Line | undefined {
  return shape.type === "line" ? { p0: shape.p0, p1: shape.p1 } : undefined;
}

/** The shape as an axis-aligned rectangle, if it is exactly one. */
export function asRect(shape: Shape): Rect | undefined {
  return shape.type === "rect" ? shape.rect : undefined;
}

/** The shape's explicit element sequence, if it carries one. */
export function asPathSlice(shape: Shape): readonly PathEl[] | undefined {
  return shape.type === "path" ? shape.elements : undefined;
}

/**
 * Express any shape as path elements. Curves are approximated with cubic
 * Béziers accurate to within `tolerance` in the shape's own units.
 */
export function pathElements(shape: Shape, tolerance: number): PathEl[] {
  switch (shape.type) {
    case "line":
      return [
        { type: "move-to", point: shape.p0 },
        { type: "line-to", point: shape.p1 },
      ];
    case "rect":
      return rectElements(shape.rect);
    case "path":
      return [...shape.elements];
    case "circle":
      return ellipseElements(
        shape.center,
        { x: shape.radius, y: shape.radius },
        0,
        tolerance,
      );
    case "ellipse":
      return ellipseElements(shape.center, shape.radii, shape.rotation, tolerance);
    case "arc": {
      const out: PathEl[] = [{ type: "move-to", point: arcStart(shape) }];
      appendArc(out, shape, tolerance);
      return out;
    }
    case "rounded-rect":
      return roundedRectElements(shape.rect, shape.radius, tolerance);
  }
}

/**
 * Axis-aligned bounds. Exact for lines, rects, circles and ellipses; for
 * paths and arcs this is the hull of on-curve and control points.
 */
export function boundingBox(shape: Shape): Rect {
  switch (shape.type) {
    case "rect":
    case "rounded-rect":
      return normalizeRect(shape.rect);
    case "circle":
      return {
        x: shape.center.x - shape.radius,
        y: shape.center.y - shape.radius,
        width: 2 * shape.radius,
        height: 2 * shape.radius,
      };
    case "ellipse": {
      const cos = Math.cos(shape.rotation);
      const sin = Math.sin(shape.rotation);
      const { x: rx, y: ry } = shape.radii;
      const hw = Math.sqrt(rx * rx * cos * cos + ry * ry * sin * sin);
      const hh = Math.sqrt(rx * rx * sin * sin + ry * ry * cos * cos);
      return {
        x: shape.center.x - hw,
        y: shape.center.y - hh,
        width: 2 * hw,
        height: 2 * hh,
      };
    }
    default:
      return boundsOfElements(pathElements(shape, 0.1));
  }
}

function boundsOfElements(elements: readonly PathEl[]): Rect {
  let x0 = Infinity;
  let y0 = Infinity;
  let x1 = -Infinity;
  let y1 = -Infinity;
  const add = (p: Point): void => {
    x0 = Math.min(x0, p.x);
    y0 = Math.min(y0, p.y);
    x1 = Math.max(x1, p.x);
    y1 = Math.max(y1, p.y);
  };
  for (const el of elements) {
    switch (el.type) {
      case "move-to":
      case "line-to":
        add(el.point);
        break;
      case "quad-to":
        add(el.ctrl);
        add(el.point);
        break;
      case "curve-to":
        add(el.ctrl1);
        add(el.ctrl2);
        add(el.point);
        break;
      case "close-path":
        break;
    }
  }
  if (x0 > x1) return { x: 0, y: 0, width: 0, height: 0 };
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}

/** The same rect with its origin at the min corner and a non-negative size. */
export function normalizeRect(r: Rect): Rect {
  return {
    x: Math.min(r.x, r.x + r.width),
    y: Math.min(r.y, r.y + r.height),
    width: Math.abs(r.width),
    height: Math.abs(r.height),
  };
}

function rectElements(r: Rect): PathEl[] {
  const x1 = r.x + r.width;
  const y1 = r.y + r.height;
  return [
    { type: "move-to", point: { x: r.x, y: r.y } },
    { type: "line-to", point: { x: x1, y: r.y } },
    { type: "line-to", point: { x: x1, y: y1 } },
    { type: "line-to", point: { x: r.x, y: y1 } },
    { type: "close-path" },
  ];
}

function ellipseElements(
  center: Point,
  radii: Vec2,
  rotation: number,
  tolerance: number,
): PathEl[] {
  const full: ArcParams = {
    center,
    radii,
    startAngle: 0,
    sweepAngle: 2 * Math.PI,
    xRotation: rotation,
  };
  const out: PathEl[] = [{ type: "move-to", point: arcStart(full) }];
  appendArc(out, full, tolerance);
  out.push({ type: "close-path" });
  return out;
}

function roundedRectElements(r: Rect, radius: number, tolerance: number): PathEl[] {
  const n = normalizeRect(r);
  const rad = Math.max(0, Math.min(radius, n.width / 2, n.height / 2));
  if (rad === 0) return rectElements(n);

  const x0 = n.x;
  const y0 = n.y;
  const x1 = n.x + n.width;
  const y1 = n.y + n.height;
  const radii = { x: rad, y: rad };
  const corner = (cx: number, cy: number, startAngle: number): ArcParams => ({
    center: { x: cx, y: cy },
    radii,
    startAngle,
    sweepAngle: Math.PI / 2,
    xRotation: 0,
  });

  const out: PathEl[] = [{ type: "move-to", point: { x: x0 + rad, y: y0 } }];
  out.push({ type: "line-to", point: { x: x1 - rad, y: y0 } });
  appendArc(out, corner(x1 - rad, y0 + rad, -Math.PI / 2), tolerance);
  out.push({ type: "line-to", point: { x: x1, y: y1 - rad } });
  appendArc(out, corner(x1 - rad, y1 - rad, 0), tolerance);
  out.push({ type: "line-to", point: { x: x0 + rad, y: y1 } });
  appendArc(out, corner(x0 + rad, y1 - rad, Math.PI / 2), tolerance);
  out.push({ type: "line-to", point: { x: x0, y: y0 + rad } });
  appendArc(out, corner(x0 + rad, y0 + rad, Math.PI), tolerance);
  out.push({ type: "close-path" });
  return out;
}
