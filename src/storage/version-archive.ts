import * as fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import * as path from "node:path";
import type { Logger } from "../logging.js";

const STAMP_SUFFIX = /^(\d{8}T\d{6})(?:-(\d+))?$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface VersionArchiveOptions {
  baseDir: string;
  versionsDir: string;
  archiveDir: string;
  enabled: boolean;
  logger: Logger;
}

export interface RetentionSweep {
  versions: number;
  archive: number;
}

/** `notes/a.txt` at 2026-10-19 10:32:05 UTC → `notes_a.txt.20261019T103205` */
export function versionName(relativePath: string, at: Date): string {
  return `${sanitize(relativePath)}.${formatStamp(at)}`;
}

function sanitize(relativePath: string): string {
  return relativePath.replace(/[\\/]+/g, "_");
}

function formatStamp(at: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `T${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`
  );
}

function withSuffix(name: string, n: number): string {
  return n === 0 ? name : `${name}-${n}`;
}

/**
 * Prior contents of overwritten files (`versions/`) and soft-deleted files
 * (`archive/`). Both areas only grow until `cleanup` is called.
 */
export class VersionArchive {
  readonly enabled: boolean;
  private readonly baseDir: string;
  private readonly versionsDir: string;
  private readonly archiveDir: string;
  private readonly logger: Logger;

  constructor(options: VersionArchiveOptions) {
    this.baseDir = options.baseDir;
    this.versionsDir = options.versionsDir;
    this.archiveDir = options.archiveDir;
    this.enabled = options.enabled;
    this.logger = options.logger;
  }

  /**
   * Copies the current content of `absolutePath` into the versions area.
   * Returns the version's path relative to the base directory, or null when
   * versioning is off, there is nothing to snapshot, or the copy failed.
   */
  async snapshot(absolutePath: string): Promise<string | null> {
    if (!this.enabled) return null;

    try {
      const stats = await fs.stat(absolutePath);
      if (!stats.isFile()) return null;
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      this.logger.warn(`Cannot stat ${absolutePath} for versioning`, err);
      return null;
    }

    const name = versionName(this.relative(absolutePath), new Date());
    await fs.mkdir(this.versionsDir, { recursive: true });

    for (let n = 0; ; n++) {
      const target = path.join(this.versionsDir, withSuffix(name, n));
      try {
        await fs.copyFile(absolutePath, target, fsConstants.COPYFILE_EXCL);
        this.logger.debug(`Saved version ${target}`);
        return this.relative(target);
      } catch (err: unknown) {
        if ((err as NodeJS.ErrnoException).code === "EEXIST") continue;
        this.logger.warn(`Failed to snapshot ${absolutePath}, continuing without a version`, err);
        return null;
      }
    }
  }

  /** Moves a file into the archive area; the caller maps failures. */
  async archive(absolutePath: string): Promise<string> {
    await fs.mkdir(this.archiveDir, { recursive: true });
    const name = versionName(this.relative(absolutePath), new Date());

    let target = path.join(this.archiveDir, name);
    for (let n = 1; await exists(target); n++) {
      target = path.join(this.archiveDir, withSuffix(name, n));
    }

    await fs.rename(absolutePath, target);
    // retention counts from the deletion, not from the last edit
    const now = new Date();
    await fs.utimes(target, now, now);
    return this.relative(target);
  }

  /** Versions of one file, oldest first. */
  async listVersions(relativePath: string): Promise<string[]> {
    const prefix = `${sanitize(relativePath)}.`;
    let names: string[];
    try {
      names = await fs.readdir(this.versionsDir);
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    const matches: Array<{ name: string; stamp: string; n: number }> = [];
    for (const name of names) {
      if (!name.startsWith(prefix)) continue;
      const m = STAMP_SUFFIX.exec(name.slice(prefix.length));
      if (!m) continue;
      matches.push({ name, stamp: m[1], n: m[2] ? Number(m[2]) : 0 });
    }

    matches.sort((a, b) =>
      a.stamp === b.stamp ? a.n - b.n : a.stamp < b.stamp ? -1 : 1,
    );
    return matches.map((m) => this.relative(path.join(this.versionsDir, m.name)));
  }

  async cleanup(maxAgeDays: number): Promise<RetentionSweep> {
    const cutoff = Date.now() - maxAgeDays * DAY_MS;
    const versions = await removeOlderThan(this.versionsDir, cutoff, this.logger);
    const archive = await removeOlderThan(this.archiveDir, cutoff, this.logger);
    if (versions + archive > 0) {
      this.logger.info(
        `Retention cleanup removed ${versions} versions and ${archive} archived files`,
      );
    }
    return { versions, archive };
  }

  private relative(absolutePath: string): string {
    return path.relative(this.baseDir, absolutePath).split(path.sep).join("/");
  }
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

export async function removeOlderThan(
  dir: string,
  cutoffMs: number,
  logger: Logger,
): Promise<number> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return 0;
    throw err;
  }

  let removed = 0;
  for (const name of names) {
    const target = path.join(dir, name);
    try {
      const stats = await fs.lstat(target);
      if (stats.mtimeMs >= cutoffMs) continue;
      await fs.rm(target, { recursive: true, force: true });
      removed++;
    } catch (err: unknown) {
      logger.warn(`Failed to remove expired entry ${target}`, err);
    }
  }
  return removed;
}
