import * as path from "node:path";
import type { SecurityLog } from "./security-log.js";

export type PathCheck =
  | { safe: true; absolutePath: string; relativePath: string }
  | { safe: false; reason: string };

const DENY_PATTERNS: ReadonlyArray<{ pattern: RegExp; reason: string }> = [
  { pattern: /(?:\.\.[\\/]){2,}/, reason: "repeated parent traversal" },
  { pattern: /\/etc\//i, reason: "system directory /etc" },
  { pattern: /\/proc\//i, reason: "system directory /proc" },
  { pattern: /[a-z]:[\\/]windows/i, reason: "system directory C:\\Windows" },
  {
    pattern: /(?:^|[\\/])\.(?:git|svn|hg)(?:[\\/]|$)/i,
    reason: "version control metadata",
  },
  { pattern: /(?:^|[\\/])\.env(?:[\\/.]|$)/i, reason: "environment secrets file" },
];

export interface CheckOptions {
  /** The caller will create, change or remove something at this path */
  mutation?: boolean;
}

const ALLOWED_HIDDEN_NAMES: ReadonlySet<string> = new Set([".gitkeep", ".gitignore"]);

/** Keeps every path the store touches inside its base directory. */
export class PathValidator {
  readonly baseDir: string;
  private readonly securityLog: SecurityLog;
  private readonly reservedDirs: ReadonlySet<string>;

  /**
   * @param reservedDirs - top-level directories the store keeps for itself;
   *   they can be read but not mutated through `check`.
   */
  constructor(baseDir: string, securityLog: SecurityLog, reservedDirs: Iterable<string> = []) {
    this.baseDir = path.resolve(baseDir);
    this.securityLog = securityLog;
    this.reservedDirs = new Set(Array.from(reservedDirs, (name) => name.toLowerCase()));
  }

  check(relativePath: string, options: CheckOptions = {}): PathCheck {
    if (relativePath.length === 0) {
      return { safe: false, reason: "empty path" };
    }
    if (relativePath.includes("\0")) {
      return { safe: false, reason: "NUL byte in path" };
    }

    const absolutePath = path.resolve(this.baseDir, relativePath);
    if (
      absolutePath !== this.baseDir &&
      !absolutePath.startsWith(this.baseDir + path.sep)
    ) {
      return { safe: false, reason: "outside base directory" };
    }

    for (const { pattern, reason } of DENY_PATTERNS) {
      if (pattern.test(relativePath)) {
        return { safe: false, reason };
      }
    }

    if (absolutePath !== this.baseDir) {
      const name = path.basename(absolutePath);
      if (name.startsWith(".") && !ALLOWED_HIDDEN_NAMES.has(name)) {
        return { safe: false, reason: "hidden file" };
      }
    }

    const relative = this.toRelative(absolutePath);
    if (options.mutation && this.reservedDirs.has(relative.split("/")[0].toLowerCase())) {
      return { safe: false, reason: "reserved store directory" };
    }

    return { safe: true, absolutePath, relativePath: relative };
  }

  /** Like `check`, but a rejection is written to the security log. */
  async validate(relativePath: string, options: CheckOptions = {}): Promise<PathCheck> {
    const result = this.check(relativePath, options);
    if (!result.safe) {
      await this.securityLog.record("path_rejected", relativePath, result.reason);
    }
    return result;
  }

  async isSafe(relativePath: string): Promise<boolean> {
    return (await this.validate(relativePath)).safe;
  }

  toRelative(absolutePath: string): string {
    const relative = path.relative(this.baseDir, absolutePath);
    return relative === "" ? "." : relative.split(path.sep).join("/");
  }
}
