import type { Point, Rect } from "@brushwork/core";
import { rectF, vec2f, type RectF, type Vector2F } from "@brushwork/canvas";

export function vec2fFromPoint(point: Point): Vector2F {
  return vec2f(point.x, point.y);
}

export function rectFFromRect(rect: Rect): RectF {
  return rectF(vec2f(rect.x, rect.y), vec2f(rect.width, rect.height));
}
