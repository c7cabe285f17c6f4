export type SelectionErrorReason = "not-found" | "cannot-access-source";

export class SelectionError extends Error {
  readonly reason: SelectionErrorReason;

  constructor(reason: SelectionErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SelectionError";
    this.reason = reason;
  }
}

export type FontLoadingErrorReason =
  | "no-such-font-in-collection"
  | "unknown-format"
  | "parse"
  | "io";

export class FontLoadingError extends Error {
  readonly reason: FontLoadingErrorReason;

  constructor(reason: FontLoadingErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FontLoadingError";
    this.reason = reason;
  }
}
