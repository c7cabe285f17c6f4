import { IndexedSource } from "./indexed-source.js";
import { describeHandle } from "./loader.js";
import type { FontDescription, FontHandle } from "./types.js";

/** A mutable, in-memory font collection. */
export class MemSource extends IndexedSource {
  /**
   * Parse and register `handle`. Memory handles are registered with a copy
   * of their bytes.
   * @throws FontLoadingError when the font cannot be read or parsed.
   */
  addFont(handle: FontHandle): FontDescription {
    const stored: FontHandle =
      handle.kind === "memory" ? { ...handle, bytes: new Uint8Array(handle.bytes) } : { ...handle };
    const description = describeHandle(stored);
    this.register(stored, description);
    return description;
  }
}
