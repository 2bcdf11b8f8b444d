import { randomUUID } from "node:crypto";
import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import mime from "mime-types";
import { FileStoreError } from "../errors.js";
import type { FileStoreErrorKind } from "../errors.js";
import type { FileEntry, StoreResult } from "../types/store.js";

/** `.<name>.<uuid>.tmp`, written beside the target and renamed over it */
export const TEMP_FILE_PATTERN =
  /^\..+\.[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\.tmp$/;

export function tempPathFor(absolutePath: string): string {
  return path.join(
    path.dirname(absolutePath),
    `.${path.basename(absolutePath)}.${randomUUID()}.tmp`,
  );
}

export function ok<T>(data: T): StoreResult<T> {
  return { success: true, data };
}

export function fail(
  kind: FileStoreErrorKind,
  relativePath: string,
  message: string,
  cause?: unknown,
): StoreResult<never> {
  return {
    success: false,
    error: new FileStoreError(message, { kind, path: relativePath, cause }),
  };
}

export function toFileStoreError(
  err: unknown,
  relativePath: string,
  fallback: FileStoreErrorKind,
): FileStoreError {
  if (err instanceof FileStoreError) return err;

  const code = (err as NodeJS.ErrnoException | undefined)?.code;
  const detail = err instanceof Error ? err.message : String(err);
  switch (code) {
    case "ENOENT":
      return new FileStoreError(`File not found: ${relativePath}`, {
        kind: "NotFound",
        path: relativePath,
        cause: err,
      });
    case "EACCES":
    case "EPERM":
      return new FileStoreError(`Permission denied: ${relativePath}`, {
        kind: "PermissionDenied",
        path: relativePath,
        cause: err,
      });
    case "EISDIR":
      return new FileStoreError(`Not a file: ${relativePath}`, {
        kind: "NotAFile",
        path: relativePath,
        cause: err,
      });
    case "ENOTDIR":
      return new FileStoreError(`Not a directory: ${relativePath}`, {
        kind: "NotADirectory",
        path: relativePath,
        cause: err,
      });
    default:
      return new FileStoreError(`${fallback} on ${relativePath}: ${detail}`, {
        kind: fallback,
        path: relativePath,
        cause: err,
      });
  }
}

export async function statOrNull(absolutePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(absolutePath);
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }
}

export function describeEntry(
  relativePath: string,
  stats: Stats,
  checksum: string | null,
): FileEntry {
  const name = path.posix.basename(relativePath);
  const isDirectory = stats.isDirectory();
  return {
    name,
    path: relativePath,
    size: stats.size,
    modifiedAt: stats.mtime.toISOString(),
    createdAt: stats.birthtime.toISOString(),
    isFile: stats.isFile(),
    isDirectory,
    mimeType: isDirectory ? null : mime.lookup(name) || null,
    permissions: (stats.mode & 0o777).toString(8).padStart(3, "0"),
    checksum,
  };
}

/** Files before directories, then by name ignoring case. */
export function compareEntries(a: FileEntry, b: FileEntry): number {
  if (a.isDirectory !== b.isDirectory) return a.isDirectory ? 1 : -1;
  const la = a.name.toLowerCase();
  const lb = b.name.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatBytes(size: number): string {
  let value = size;
  for (const unit of SIZE_UNITS.slice(0, -1)) {
    if (value < 1024) return `${value.toFixed(1)} ${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(1)} ${SIZE_UNITS[SIZE_UNITS.length - 1]}`;
}
