import { isDrawError } from "@brushwork/core";

/** The `kind` of the DrawError `run` throws, or undefined if it returns. */
export function thrownKind(run: () => unknown): string | undefined {
  try {
    run();
  } catch (err) {
    return isDrawError(err) ? err.kind : `not a DrawError: ${String(err)}`;
  }
  return undefined;
}
