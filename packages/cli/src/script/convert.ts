import {
  IDENTITY,
  affineMultiply,
  arc,
  circle,
  ellipse,
  line,
  path,
  rect,
  rotate,
  roundedRect,
  scale,
  translate,
} from "@brushwork/core";
import type { Affine, PathEl, Point, Rect, Shape } from "@brushwork/core";
import type {
  ScriptCommand,
  ScriptPathElement,
  ScriptPoint,
  ScriptRect,
  ScriptShape,
} from "./schema.js";

type TransformCommand = Extract<ScriptCommand, { op: "transform" }>;

const DEG = Math.PI / 180;

export function toPoint([x, y]: ScriptPoint): Point {
  return { x, y };
}

export function toRect(r: ScriptRect): Rect {
  return { x: r.x, y: r.y, width: r.width, height: r.height };
}

export function toShape(shape: ScriptShape): Shape {
  switch (shape.type) {
    case "line":
      return line(toPoint(shape.from), toPoint(shape.to));
    case "rect":
      return rect(shape.x, shape.y, shape.width, shape.height);
    case "rounded-rect":
      return roundedRect(toRect(shape), shape.radius);
    case "circle":
      return circle(toPoint(shape.center), shape.radius);
    case "ellipse":
      return ellipse(toPoint(shape.center), toPoint(shape.radii), shape.rotation * DEG);
    case "arc":
      return arc({
        center: toPoint(shape.center),
        radii: toPoint(shape.radii),
        startAngle: shape.start * DEG,
        sweepAngle: shape.sweep * DEG,
        xRotation: shape.rotation * DEG,
      });
    case "path":
      return path(shape.elements.map(toPathEl));
  }
}

function toPathEl(el: ScriptPathElement): PathEl {
  switch (el.op) {
    case "move":
      return { type: "move-to", point: toPoint(el.to) };
    case "line":
      return { type: "line-to", point: toPoint(el.to) };
    case "quad":
      return { type: "quad-to", ctrl: toPoint(el.ctrl), point: toPoint(el.to) };
    case "cubic":
      return {
        type: "curve-to",
        ctrl1: toPoint(el.ctrl1),
        ctrl2: toPoint(el.ctrl2),
        point: toPoint(el.to),
      };
    case "close":
      return { type: "close-path" };
  }
}

/**
 * The local transform of a `transform` command. Parts apply in the order
 * matrix, scale, rotate, translate.
 */
export function toAffine(cmd: TransformCommand): Affine {
  let t: Affine = cmd.matrix ?? IDENTITY;
  if (cmd.scale !== undefined) {
    const [sx, sy] = typeof cmd.scale === "number" ? [cmd.scale, cmd.scale] : cmd.scale;
    t = affineMultiply(scale(sx, sy), t);
  }
  if (cmd.rotate !== undefined) {
    t = affineMultiply(rotate(cmd.rotate * DEG), t);
  }
  if (cmd.translate !== undefined) {
    t = affineMultiply(translate(cmd.translate[0], cmd.translate[1]), t);
  }
  return t;
}
