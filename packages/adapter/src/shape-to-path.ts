import { asLine, asPathSlice, asRect, pathElements } from "@brushwork/core";
import type { PathEl, Shape } from "@brushwork/core";
import { Path2D } from "@brushwork/canvas";
import { rectFFromRect, vec2fFromPoint } from "./conversions.js";

/** Flattening tolerance for curves, in user-space units. */
export const FLATTEN_TOLERANCE = 0.1;

/**
 * Build a canvas path for `shape`. Lines and axis-aligned rects take a
 * direct route; explicit element lists are copied in order; everything
 * else is flattened to Béziers first.
 */
export function pathFromShape(shape: Shape): Path2D {
  const path = new Path2D();

  const line = asLine(shape);
  if (line) {
    path.moveTo(vec2fFromPoint(line.p0));
    path.lineTo(vec2fFromPoint(line.p1));
    return path;
  }

  const rect = asRect(shape);
  if (rect) {
    path.rect(rectFFromRect(rect));
    return path;
  }

  const elements = asPathSlice(shape) ?? pathElements(shape, FLATTEN_TOLERANCE);
  for (const el of elements) {
    applyElement(path, el);
  }
  return path;
}

function applyElement(path: Path2D, el: PathEl): void {
  switch (el.type) {
    case "move-to":
      path.moveTo(vec2fFromPoint(el.point));
      break;
    case "line-to":
      path.lineTo(vec2fFromPoint(el.point));
      break;
    case "quad-to":
      path.quadraticCurveTo(vec2fFromPoint(el.ctrl), vec2fFromPoint(el.point));
      break;
    case "curve-to":
      path.bezierCurveTo(
        vec2fFromPoint(el.ctrl1),
        vec2fFromPoint(el.ctrl2),
        vec2fFromPoint(el.point),
      );
      break;
    case "close-path":
      path.closePath();
      break;
  }
}
