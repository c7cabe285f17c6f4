export type DrawErrorKind =
  | "unsupported-format"
  | "invalid-input"
  | "missing-font"
  | "font-loading-failed"
  | "backend-error"
  | "not-supported";

const DEFAULT_MESSAGES: Record<DrawErrorKind, string> = {
  "unsupported-format": "Unsupported format",
  "invalid-input": "Invalid input",
  "missing-font": "Font not found",
  "font-loading-failed": "Font could not be loaded",
  "backend-error": "Backend error",
  "not-supported": "Operation not supported",
};

/**
 * The single error type of the drawing contract. `kind` is the taxonomy;
 * `backend-error` carries the underlying failure as `cause`.
 */
export class DrawError extends Error {
  readonly kind: DrawErrorKind;

  constructor(kind: DrawErrorKind, message?: string, options?: { cause?: unknown }) {
    super(message ?? DEFAULT_MESSAGES[kind], options);
    this.name = "DrawError";
    this.kind = kind;
  }
}

export function isDrawError(err: unknown, kind?: DrawErrorKind): err is DrawError {
  return err instanceof DrawError && (kind === undefined || err.kind === kind);
}
