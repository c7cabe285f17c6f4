import type { RectF, Vector2F } from "./geometry.js";

export type PathCommand =
  | { op: "move"; to: Vector2F }
  | { op: "line"; to: Vector2F }
  | { op: "quad"; ctrl: Vector2F; to: Vector2F }
  | { op: "cubic"; ctrl0: Vector2F; ctrl1: Vector2F; to: Vector2F }
  | { op: "rect"; rect: RectF }
  | { op: "close" };

/**
 * A mutable outline built command by command. `rect` appends a closed
 * rectangular subpath that starts with an implied move to its origin.
 */
export class Path2D {
  private readonly cmds: PathCommand[] = [];

  get commands(): readonly PathCommand[] {
    return this.cmds;
  }

  moveTo(to: Vector2F): void {
    this.cmds.push({ op: "move", to });
  }

  lineTo(to: Vector2F): void {
    this.cmds.push({ op: "line", to });
  }

  quadraticCurveTo(ctrl: Vector2F, to: Vector2F): void {
    this.cmds.push({ op: "quad", ctrl, to });
  }

  bezierCurveTo(ctrl0: Vector2F, ctrl1: Vector2F, to: Vector2F): void {
    this.cmds.push({ op: "cubic", ctrl0, ctrl1, to });
  }

  rect(rect: RectF): void {
    this.cmds.push({ op: "rect", rect });
  }

  closePath(): void {
    this.cmds.push({ op: "close" });
  }
}
