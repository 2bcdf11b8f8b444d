import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { FileStoreError } from "../../src/errors.js";
import {
  TEMP_FILE_PATTERN,
  compareEntries,
  formatBytes,
  tempPathFor,
  toFileStoreError,
} from "../../src/storage/fs-utils.js";
import type { FileEntry } from "../../src/types/store.js";

function entry(name: string, isDirectory: boolean): FileEntry {
  return {
    name,
    path: name,
    size: 0,
    modifiedAt: "2026-01-01T00:00:00.000Z",
    createdAt: "2026-01-01T00:00:00.000Z",
    isFile: !isDirectory,
    isDirectory,
    mimeType: null,
    permissions: "644",
    checksum: null,
  };
}

function errno(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: failed`), { code });
}

describe("formatBytes", () => {
  it("formats with one decimal and a binary unit", () => {
    expect(formatBytes(0)).toBe("0.0 B");
    expect(formatBytes(5)).toBe("5.0 B");
    expect(formatBytes(1023)).toBe("1023.0 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(1024 * 1024)).toBe("1.0 MB");
    expect(formatBytes(3 * 1024 ** 3)).toBe("3.0 GB");
    expect(formatBytes(2048 * 1024 ** 4)).toBe("2048.0 TB");
  });
});

describe("compareEntries", () => {
  it("puts files before directories, then sorts by name ignoring case", () => {
    const sorted = [
      entry("zeta", true),
      entry("beta.txt", false),
      entry("Alpha", true),
      entry("Gamma.md", false),
      entry("alpha.txt", false),
    ].sort(compareEntries);
    expect(sorted.map((e) => e.name)).toEqual([
      "alpha.txt",
      "beta.txt",
      "Gamma.md",
      "Alpha",
      "zeta",
    ]);
  });

  it("breaks case-insensitive ties by raw name", () => {
    const sorted = [entry("b.txt", false), entry("B.txt", false)].sort(compareEntries);
    expect(sorted.map((e) => e.name)).toEqual(["B.txt", "b.txt"]);
  });
});

describe("tempPathFor", () => {
  it("places a hidden temp file beside the target", () => {
    const tmp = tempPathFor(path.join("/srv", "notes", "a.txt"));
    expect(path.dirname(tmp)).toBe(path.join("/srv", "notes"));
    expect(path.basename(tmp)).toMatch(TEMP_FILE_PATTERN);
    expect(path.basename(tmp).startsWith(".a.txt.")).toBe(true);
  });

  it("does not mistake ordinary files for temp files", () => {
    expect(TEMP_FILE_PATTERN.test("a.txt")).toBe(false);
    expect(TEMP_FILE_PATTERN.test(".gitkeep")).toBe(false);
    expect(TEMP_FILE_PATTERN.test("report.tmp")).toBe(false);
  });
});

describe("toFileStoreError", () => {
  it("maps errno codes to error kinds", () => {
    expect(toFileStoreError(errno("ENOENT"), "a.txt", "OSFailure")).toMatchObject({
      kind: "NotFound",
      path: "a.txt",
      message: "File not found: a.txt",
    });
    expect(toFileStoreError(errno("EACCES"), "a.txt", "OSFailure").kind).toBe(
      "PermissionDenied",
    );
    expect(toFileStoreError(errno("EPERM"), "a.txt", "OSFailure").kind).toBe(
      "PermissionDenied",
    );
    expect(toFileStoreError(errno("EISDIR"), "a.txt", "OSFailure").kind).toBe("NotAFile");
    expect(toFileStoreError(errno("ENOTDIR"), "a.txt", "OSFailure").kind).toBe(
      "NotADirectory",
    );
  });

  it("falls back for anything else", () => {
    const cause = errno("ENOSPC");
    const err = toFileStoreError(cause, "a.txt", "WriteFailure");
    expect(err.kind).toBe("WriteFailure");
    expect(err.message).toBe("WriteFailure on a.txt: ENOSPC: failed");
    expect(err.cause).toBe(cause);
  });

  it("passes a FileStoreError through unchanged", () => {
    const existing = new FileStoreError("Not a file: a", { kind: "NotAFile", path: "a" });
    expect(toFileStoreError(existing, "b", "OSFailure")).toBe(existing);
  });

  it("handles values that are not errors", () => {
    expect(toFileStoreError("boom", "a.txt", "OSFailure").message).toBe(
      "OSFailure on a.txt: boom",
    );
  });
});
