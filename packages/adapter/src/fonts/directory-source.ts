import { readdirSync, realpathSync, statSync, type Stats } from "node:fs";
import { homedir } from "node:os";
import { extname, join } from "node:path";
import { FontLoadingError } from "./errors.js";
import { IndexedSource } from "./indexed-source.js";
import { describeFonts, readFontFile } from "./loader.js";
import type { FontDescription } from "./types.js";

const FONT_EXTENSIONS = new Set([".ttf", ".otf", ".ttc", ".otc", ".woff", ".woff2"]);

// Filesystem failures that mean "nothing to index here"
const UNREADABLE = new Set(["ENOENT", "ENOTDIR", "EACCES", "EPERM", "ELOOP"]);

function isUnreadable(err: unknown): boolean {
  return err instanceof Error && "code" in err && UNREADABLE.has(String(err.code));
}

export interface SkippedFont {
  path: string;
  error: FontLoadingError;
}

/**
 * Fonts found by walking directories. Symlinks are followed; each real
 * directory is walked once. Each face is indexed by a path handle; files
 * that fail to load are listed in `skipped`. Paths that are missing, are
 * not directories, or cannot be read are ignored.
 */
export class DirectorySource extends IndexedSource {
  readonly skipped: SkippedFont[] = [];
  private readonly visited = new Set<string>();

  constructor(readonly directories: readonly string[]) {
    super();
    for (const dir of directories) {
      this.scan(dir);
    }
  }

  private scan(dir: string): void {
    let names: string[];
    try {
      const real = realpathSync(dir);
      if (this.visited.has(real)) return;
      this.visited.add(real);
      names = readdirSync(dir).sort();
    } catch (err) {
      if (isUnreadable(err)) return;
      throw err;
    }

    for (const name of names) {
      const path = join(dir, name);
      let stats: Stats;
      try {
        stats = statSync(path);
      } catch (err) {
        // dangling symlink
        if (isUnreadable(err)) continue;
        throw err;
      }
      if (stats.isDirectory()) {
        this.scan(path);
      } else if (stats.isFile() && FONT_EXTENSIONS.has(extname(name).toLowerCase())) {
        this.index(path);
      }
    }
  }

  private index(path: string): void {
    let descriptions: FontDescription[];
    try {
      descriptions = describeFonts(readFontFile(path));
    } catch (err) {
      if (err instanceof FontLoadingError) {
        this.skipped.push({ path, error: err });
        return;
      }
      throw err;
    }
    descriptions.forEach((description, fontIndex) => {
      this.register({ kind: "path", path, fontIndex }, description);
    });
  }
}

/** The standard font directories for `platform`. */
export function systemFontDirectories(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string[] {
  switch (platform) {
    case "win32": {
      const dirs = [join(env.WINDIR ?? "C:\\Windows", "Fonts")];
      if (env.LOCALAPPDATA) dirs.push(join(env.LOCALAPPDATA, "Microsoft", "Windows", "Fonts"));
      return dirs;
    }
    case "darwin":
      return ["/System/Library/Fonts", "/Library/Fonts", join(home, "Library", "Fonts")];
    default: {
      const dataHome = env.XDG_DATA_HOME ?? join(home, ".local", "share");
      return [
        "/usr/share/fonts",
        "/usr/local/share/fonts",
        join(home, ".fonts"),
        join(dataHome, "fonts"),
      ];
    }
  }
}

/** The fonts installed on this machine. */
export class SystemSource extends DirectorySource {
  constructor(platform: NodeJS.Platform = process.platform) {
    super(systemFontDirectories(platform));
  }
}
