import type { ArcParams, PathEl, Point, Vec2 } from "../types/geometry.js";

/**
 * Point on an axis-aligned ellipse of `radii` at `angle`, rotated by
 * `xRotation`, relative to the ellipse center.
 */
export function sampleEllipse(radii: Vec2, xRotation: number, angle: number): Vec2 {
  const u = radii.x * Math.cos(angle);
  const v = radii.y * Math.sin(angle);
  const cos = Math.cos(xRotation);
  const sin = Math.sin(xRotation);
  return { x: u * cos - v * sin, y: u * sin + v * cos };
}

export function arcStart(arc: ArcParams): Point {
  const p = sampleEllipse(arc.radii, arc.xRotation, arc.startAngle);
  return { x: arc.center.x + p.x, y: arc.center.y + p.y };
}

/**
 * Number of cubic segments needed to keep an arc within `tolerance`.
 * Never fewer than four per full turn.
 */
export function arcSegmentCount(arc: ArcParams, tolerance: number): number {
  const scaledErr = Math.max(Math.abs(arc.radii.x), Math.abs(arc.radii.y)) / tolerance;
  const nErr = Math.max(Math.pow(1.1163 * scaledErr, 1 / 6), 3.999999);
  return Math.ceil((nErr * Math.abs(arc.sweepAngle)) / (2 * Math.PI));
}

/**
 * Append cubic approximations of `arc` to `out`. Assumes the current point is
 * already at the arc's start; emits no move.
 */
export function appendArc(out: PathEl[], arc: ArcParams, tolerance: number): void {
  const n = arcSegmentCount(arc, tolerance);
  if (n === 0) return;

  const step = arc.sweepAngle / n;
  const armLen = (4 / 3) * Math.abs(Math.tan(step / 4)) * Math.sign(arc.sweepAngle);
  const { center, radii, xRotation } = arc;

  let angle0 = arc.startAngle;
  let p0 = sampleEllipse(radii, xRotation, angle0);
  for (let i = 0; i < n; i++) {
    const angle1 = angle0 + step;
    const p1 = sampleEllipse(radii, xRotation, angle1);
    const t0 = sampleEllipse(radii, xRotation, angle0 + Math.PI / 2);
    const t1 = sampleEllipse(radii, xRotation, angle1 + Math.PI / 2);
    out.push({
      type: "curve-to",
      ctrl1: { x: center.x + p0.x + armLen * t0.x, y: center.y + p0.y + armLen * t0.y },
      ctrl2: { x: center.x + p1.x - armLen * t1.x, y: center.y + p1.y - armLen * t1.y },
      point: { x: center.x + p1.x, y: center.y + p1.y },
    });
    angle0 = angle1;
    p0 = p1;
  }
}
