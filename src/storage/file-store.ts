import type { Dirent, Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { performance } from "node:perf_hooks";
import { TextDecoder } from "node:util";
import { parseConfig } from "../config.js";
import type { FileStoreConfig, FileStoreConfigInput } from "../config.js";
import type { FileStoreErrorKind } from "../errors.js";
import { createLogger } from "../logging.js";
import type { Logger } from "../logging.js";
import type {
  CleanupSummary,
  DeleteFileOptions,
  DeleteSummary,
  FileEntry,
  FileInfo,
  ListDirectoryOptions,
  MetricsSnapshot,
  OperationKind,
  ReadTextOptions,
  SearchFilesOptions,
  StoreResult,
  WriteBinaryOptions,
  WriteSummary,
  WriteTextOptions,
} from "../types/store.js";
import { ChecksumStore } from "./checksum-store.js";
import { ContentCache } from "./content-cache.js";
import {
  TEMP_FILE_PATTERN,
  compareEntries,
  describeEntry,
  fail,
  formatBytes,
  ok,
  statOrNull,
  tempPathFor,
  toFileStoreError,
} from "./fs-utils.js";
import { ReentrantLock } from "./lock.js";
import { OperationMetrics } from "./operation-metrics.js";
import { PathValidator } from "./path-validator.js";
import type { CheckOptions } from "./path-validator.js";
import { SecurityLog } from "./security-log.js";
import { VersionArchive, removeOlderThan } from "./version-archive.js";

export const STORE_DIRECTORIES = ["logs", "temp", "archive", "versions", "metadata"] as const;

export interface FileStoreOptions {
  /** Replaces the electron-log instance built from `config.logging` */
  logger?: Logger;
}

interface AccessRecord {
  count: number;
  /** Most recent read timestamps (ms), bounded by `accessLogLimit` */
  recent: number[];
}

interface SafePath {
  absolutePath: string;
  relativePath: string;
}

/**
 * ベースディレクトリに閉じたファイルストア。
 * 公開操作はすべて StoreResult を返し、例外を外へ投げない。
 */
export class FileStore {
  readonly baseDir: string;
  readonly config: FileStoreConfig;
  private readonly logger: Logger;
  private readonly securityLog: SecurityLog;
  private readonly validator: PathValidator;
  private readonly checksums: ChecksumStore;
  private readonly versions: VersionArchive;
  private readonly cache: ContentCache;
  private readonly metrics = new OperationMetrics();
  private readonly lock = new ReentrantLock();
  private readonly accessLog = new Map<string, AccessRecord>();
  private readonly decoder: TextDecoder;
  private readonly tempDir: string;
  private openPromise: Promise<void> | null = null;
  private closed = false;

  constructor(config: FileStoreConfigInput, options: FileStoreOptions = {}) {
    this.config = parseConfig(config);
    this.baseDir = path.resolve(this.config.baseDir);
    this.tempDir = path.join(this.baseDir, "temp");

    const logsDir = path.join(this.baseDir, "logs");
    this.logger =
      options.logger ??
      createLogger({
        logId: `filekeep:${this.baseDir}`,
        logFile: path.join(logsDir, "operations.log"),
        fileLevel: this.config.logging.file,
        consoleLevel: this.config.logging.console,
        maxLogBytes: this.config.logging.maxLogBytes,
      });

    this.securityLog = new SecurityLog(path.join(logsDir, "security.log"), this.logger);
    this.validator = new PathValidator(this.baseDir, this.securityLog, STORE_DIRECTORIES);
    this.checksums = new ChecksumStore({
      filePath: path.join(this.baseDir, "metadata", "checksums.json"),
      tempDir: this.tempDir,
      persistInterval: this.config.checksumPersistInterval,
      securityLog: this.securityLog,
      logger: this.logger,
    });
    this.versions = new VersionArchive({
      baseDir: this.baseDir,
      versionsDir: path.join(this.baseDir, "versions"),
      archiveDir: path.join(this.baseDir, "archive"),
      enabled: this.config.versioning,
      logger: this.logger,
    });
    this.cache = new ContentCache({
      capacity: this.config.maxCacheEntries,
      ttlMs: this.config.cacheTtlMs,
    });
    this.decoder = new TextDecoder("utf-8", {
      fatal: this.config.strictDecoding,
      ignoreBOM: true,
    });
  }

  static async create(
    config: FileStoreConfigInput,
    options?: FileStoreOptions,
  ): Promise<FileStore> {
    const store = new FileStore(config, options);
    await store.open();
    return store;
  }

  /** Creates the directory layout and loads persisted checksums. */
  open(): Promise<void> {
    if (!this.openPromise) {
      this.openPromise = this.initialize().catch((err: unknown) => {
        this.openPromise = null;
        throw err;
      });
    }
    return this.openPromise;
  }

  private async initialize(): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
    for (const dir of STORE_DIRECTORIES) {
      await fs.mkdir(path.join(this.baseDir, dir), { recursive: true });
    }
    await this.checksums.load();
    this.logger.info(`File store opened at ${this.baseDir}`);
  }

  /** Flushes pending checksums. Later operations fail with `StoreClosed`. */
  async close(): Promise<StoreResult<void>> {
    if (this.closed) return ok(undefined);
    return this.lock.runExclusive(async () => {
      if (this.closed) return ok(undefined);
      try {
        if (this.checksums.dirty) await this.checksums.save();
      } catch (err: unknown) {
        this.logger.error("Failed to flush checksums on close", err);
        return fail("OSFailure", ".", "Failed to flush checksums on close", err);
      }
      this.closed = true;
      this.cache.clear();
      this.logger.info(`File store closed at ${this.baseDir}`);
      return ok(undefined);
    });
  }

  async readText(
    relativePath: string,
    options: ReadTextOptions = {},
  ): Promise<StoreResult<string>> {
    const { useCache = true } = options;
    return this.run("read", relativePath, "OSFailure", async () => {
      const target = await this.guard(relativePath);
      if (!target.success) return target;
      const { absolutePath, relativePath: rel } = target.data;

      return this.exclusive(rel, async () => {
        if (useCache) {
          const cached = this.cache.get(absolutePath);
          if (cached !== undefined) {
            this.recordAccess(absolutePath);
            return ok(cached);
          }
        }

        const checked = await this.requireFile(absolutePath, rel);
        if (!checked.success) return checked;

        const bytes = await fs.readFile(absolutePath);
        let content: string;
        try {
          content = this.decoder.decode(bytes);
        } catch (err: unknown) {
          return fail("DecodeError", rel, `File is not valid UTF-8: ${rel}`, err);
        }

        await this.verifyIntegrity(absolutePath, rel, bytes);
        this.cache.put(absolutePath, content);
        this.recordAccess(absolutePath);
        return ok(content);
      });
    });
  }

  async writeText(
    relativePath: string,
    content: string,
    options: WriteTextOptions = {},
  ): Promise<StoreResult<WriteSummary>> {
    const { append = false, backup = true } = options;
    return this.run("write", relativePath, "WriteFailure", async () => {
      const target = await this.guard(relativePath, { mutation: true });
      if (!target.success) return target;
      const bytes = Buffer.from(content, "utf-8");
      return this.exclusive(target.data.relativePath, () =>
        this.writeAtomically(target.data, bytes, { append, backup }),
      );
    });
  }

  async writeBinary(
    relativePath: string,
    bytes: Uint8Array,
    options: WriteBinaryOptions = {},
  ): Promise<StoreResult<WriteSummary>> {
    const { backup = true } = options;
    return this.run("write_binary", relativePath, "WriteFailure", async () => {
      const target = await this.guard(relativePath, { mutation: true });
      if (!target.success) return target;
      if (bytes.byteLength > this.config.maxBinaryBytes) {
        return fail(
          "SizeExceeded",
          target.data.relativePath,
          `Payload of ${bytes.byteLength} bytes exceeds the ${this.config.maxBinaryBytes} byte limit`,
        );
      }
      return this.exclusive(target.data.relativePath, () =>
        this.writeAtomically(target.data, bytes, { append: false, backup }),
      );
    });
  }

  async readBinary(relativePath: string): Promise<StoreResult<Buffer>> {
    return this.run("read_binary", relativePath, "OSFailure", async () => {
      const target = await this.guard(relativePath);
      if (!target.success) return target;
      const { absolutePath, relativePath: rel } = target.data;

      return this.exclusive(rel, async () => {
        const checked = await this.requireFile(absolutePath, rel);
        if (!checked.success) return checked;
        const bytes = await fs.readFile(absolutePath);
        await this.verifyIntegrity(absolutePath, rel, bytes);
        this.recordAccess(absolutePath);
        return ok(bytes);
      });
    });
  }

  async listDirectory(
    relativePath = ".",
    options: ListDirectoryOptions = {},
  ): Promise<StoreResult<FileEntry[]>> {
    const { includeDirs = false, pattern } = options;
    return this.run("list", relativePath, "OSFailure", async () => {
      const target = await this.guard(relativePath);
      if (!target.success) return target;
      const { absolutePath, relativePath: rel } = target.data;

      let matcher: RegExp | null = null;
      if (pattern !== undefined) {
        try {
          matcher = new RegExp(pattern);
        } catch (err: unknown) {
          return fail("InvalidArgument", rel, `Invalid pattern: ${pattern}`, err);
        }
      }

      const checked = await this.requireDirectory(absolutePath, rel);
      if (!checked.success) return checked;

      const found: Array<{ absolutePath: string; stats: Stats }> = [];
      for (const name of await fs.readdir(absolutePath)) {
        if (TEMP_FILE_PATTERN.test(name)) continue;
        if (matcher && !matcher.test(name)) continue;

        const entryPath = path.join(absolutePath, name);
        let stats: Stats;
        try {
          stats = await fs.stat(entryPath);
        } catch (err: unknown) {
          this.logger.debug(`Skipping ${entryPath}: cannot stat`, err);
          continue;
        }
        if (stats.isDirectory() ? !includeDirs : !stats.isFile()) continue;
        found.push({ absolutePath: entryPath, stats });
      }

      const entries = await this.describeAll(found);
      return ok(entries.sort(compareEntries));
    });
  }

  async createDirectory(
    relativePath: string,
    permissions = 0o755,
  ): Promise<StoreResult<string>> {
    return this.run("create_dir", relativePath, "OSFailure", async () => {
      const target = await this.guard(relativePath, { mutation: true });
      if (!target.success) return target;
      const { absolutePath, relativePath: rel } = target.data;

      const existing = await statOrNull(absolutePath);
      if (existing && !existing.isDirectory()) {
        return fail("NotADirectory", rel, `A file already exists at ${rel}`);
      }
      await fs.mkdir(absolutePath, { recursive: true, mode: permissions });
      if (absolutePath !== this.baseDir) {
        // mkdir's mode is filtered through the umask
        await fs.chmod(absolutePath, permissions);
      }
      return ok(rel);
    });
  }

  async deleteFile(
    relativePath: string,
    options: DeleteFileOptions = {},
  ): Promise<StoreResult<DeleteSummary>> {
    const { archive = true } = options;
    return this.run("delete", relativePath, "OSFailure", async () => {
      const target = await this.guard(relativePath, { mutation: true });
      if (!target.success) return target;
      const { absolutePath, relativePath: rel } = target.data;

      return this.exclusive(rel, async () => {
        const checked = await this.requireFile(absolutePath, rel);
        if (!checked.success) return checked;

        let archivedTo: string | null = null;
        if (archive) {
          archivedTo = await this.versions.archive(absolutePath);
        } else {
          await fs.unlink(absolutePath);
        }

        this.cache.invalidate(absolutePath);
        await this.checksums.delete(absolutePath);
        this.accessLog.delete(absolutePath);
        this.logger.info(
          archivedTo ? `Archived ${rel} to ${archivedTo}` : `Deleted ${rel}`,
        );
        return ok({ path: rel, archivedTo });
      });
    });
  }

  async moveFile(source: string, destination: string): Promise<StoreResult<FileEntry>> {
    return this.run("move", source, "OSFailure", async () => {
      const pair = await this.guardPair(source, destination, { mutation: true });
      if (!pair.success) return pair;
      const [from, to] = pair.data;

      return this.exclusive(from.relativePath, async () => {
        const ready = await this.prepareTransfer(from, to);
        if (!ready.success) return ready;
        if (from.absolutePath === to.absolutePath) {
          return ok(await this.describe(to));
        }

        await fs.rename(from.absolutePath, to.absolutePath);

        if (this.checksums.get(from.absolutePath) !== undefined) {
          await this.checksums.move(from.absolutePath, to.absolutePath);
        } else {
          await this.checksums.delete(to.absolutePath);
        }
        this.cache.invalidate(from.absolutePath);
        this.cache.invalidate(to.absolutePath);
        this.accessLog.delete(from.absolutePath);
        this.logger.info(`Moved ${from.relativePath} to ${to.relativePath}`);
        return ok(await this.describe(to));
      });
    });
  }

  async copyFile(source: string, destination: string): Promise<StoreResult<FileEntry>> {
    return this.run("copy", source, "WriteFailure", async () => {
      const pair = await this.guardPair(source, destination, {});
      if (!pair.success) return pair;
      const [from, to] = pair.data;

      return this.exclusive(from.relativePath, async () => {
        const ready = await this.prepareTransfer(from, to);
        if (!ready.success) return ready;
        if (from.absolutePath === to.absolutePath) {
          return ok(await this.describe(to));
        }

        const tmpPath = tempPathFor(to.absolutePath);
        try {
          await fs.copyFile(from.absolutePath, tmpPath);
          await fs.rename(tmpPath, to.absolutePath);
        } catch (err: unknown) {
          await this.removeTemp(tmpPath);
          throw err;
        }

        const digest = this.checksums.get(from.absolutePath);
        if (digest !== undefined) {
          await this.checksums.set(to.absolutePath, digest);
        } else {
          await this.checksums.update(to.absolutePath, await fs.readFile(to.absolutePath));
        }
        this.cache.invalidate(to.absolutePath);
        this.logger.info(`Copied ${from.relativePath} to ${to.relativePath}`);
        return ok(await this.describe(to));
      });
    });
  }

  async getFileInfo(relativePath: string): Promise<StoreResult<FileInfo>> {
    return this.run("info", relativePath, "OSFailure", async () => {
      const target = await this.guard(relativePath);
      if (!target.success) return target;
      const { absolutePath, relativePath: rel } = target.data;

      const stats = await statOrNull(absolutePath);
      if (!stats) return fail("NotFound", rel, `File not found: ${rel}`);

      return this.exclusive(rel, async () => {
        const entry = describeEntry(rel, stats, this.checksums.get(absolutePath) ?? null);
        const access = this.accessLog.get(absolutePath);
        const last = access?.recent[access.recent.length - 1];
        return ok({
          ...entry,
          sizeHuman: formatBytes(entry.size),
          cached: this.cache.has(absolutePath),
          accessCount: access?.count ?? 0,
          lastAccessedAt: last === undefined ? null : new Date(last).toISOString(),
        });
      });
    });
  }

  async searchFiles(
    term: string,
    directory = ".",
    options: SearchFilesOptions = {},
  ): Promise<StoreResult<FileEntry[]>> {
    return this.run("search", directory, "OSFailure", async () => {
      const target = await this.guard(directory);
      if (!target.success) return target;
      const { absolutePath, relativePath: rel } = target.data;

      const checked = await this.requireDirectory(absolutePath, rel);
      if (!checked.success) return checked;

      const needle = term.toLowerCase();
      const extensions = options.extensions?.length
        ? options.extensions.map((ext) =>
            (ext.startsWith(".") ? ext : `.${ext}`).toLowerCase(),
          )
        : null;

      const found: Array<{ absolutePath: string; stats: Stats }> = [];
      const walk = async (dir: string): Promise<void> => {
        let dirents: Dirent[];
        try {
          dirents = await fs.readdir(dir, { withFileTypes: true });
        } catch (err: unknown) {
          this.logger.debug(`Skipping unreadable directory ${dir}`, err);
          return;
        }
        for (const dirent of dirents) {
          const entryPath = path.join(dir, dirent.name);
          if (dirent.isDirectory()) {
            if (dirent.name.startsWith(".")) continue;
            if (dir === this.baseDir && isStoreDirectory(dirent.name)) continue;
            await walk(entryPath);
            continue;
          }
          if (!dirent.isFile() || TEMP_FILE_PATTERN.test(dirent.name)) continue;

          const name = dirent.name.toLowerCase();
          if (!name.includes(needle)) continue;
          if (extensions && !extensions.includes(path.extname(name))) continue;
          try {
            found.push({ absolutePath: entryPath, stats: await fs.stat(entryPath) });
          } catch (err: unknown) {
            this.logger.debug(`Skipping ${entryPath}: cannot stat`, err);
          }
        }
      };
      await walk(absolutePath);

      const entries = await this.describeAll(found);
      return ok(entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)));
    });
  }

  async listVersions(relativePath: string): Promise<StoreResult<string[]>> {
    return this.run("versions", relativePath, "OSFailure", async () => {
      const target = await this.guard(relativePath);
      if (!target.success) return target;
      return ok(await this.versions.listVersions(target.data.relativePath));
    });
  }

  /** Removes version, archive and stray temp entries past their retention. */
  async cleanupExpired(
    options: { maxAgeDays?: number } = {},
  ): Promise<StoreResult<CleanupSummary>> {
    const maxAgeDays = options.maxAgeDays ?? this.config.retentionDays;
    return this.run("cleanup", ".", "OSFailure", async () => {
      if (!(maxAgeDays > 0)) {
        return fail("InvalidArgument", ".", `maxAgeDays must be positive, got ${maxAgeDays}`);
      }
      return this.exclusive(".", async () => {
        const swept = await this.versions.cleanup(maxAgeDays);
        const tempRemoved = await removeOlderThan(
          this.tempDir,
          Date.now() - this.config.staleTempMs,
          this.logger,
        );
        return ok({
          versionsRemoved: swept.versions,
          archiveRemoved: swept.archive,
          tempRemoved,
        });
      });
    });
  }

  async getChecksum(relativePath: string): Promise<string | null> {
    const check = await this.validator.validate(relativePath);
    if (!check.safe) return null;
    return this.lock.runExclusive(
      async () => this.checksums.get(check.absolutePath) ?? null,
    );
  }

  async isSafe(relativePath: string): Promise<boolean> {
    return this.validator.isSafe(relativePath);
  }

  metricsSnapshot(): MetricsSnapshot {
    return {
      operations: this.metrics.snapshot(),
      cache: this.cache.stats(),
      checksums: this.checksums.size,
      securityEvents: this.securityLog.eventCount,
    };
  }

  private async run<T>(
    kind: OperationKind,
    subject: string,
    fallback: FileStoreErrorKind,
    operation: () => Promise<StoreResult<T>>,
  ): Promise<StoreResult<T>> {
    const started = performance.now();
    let success = false;
    try {
      if (this.closed) {
        return fail("StoreClosed", subject, "File store is closed");
      }
      await this.open();
      const result = await operation();
      success = result.success;
      if (!result.success) {
        this.logger.debug(`${kind} ${subject}: ${result.error.kind} ${result.error.message}`);
      }
      return result;
    } catch (err: unknown) {
      const error = toFileStoreError(err, subject, fallback);
      this.logger.error(`${kind} failed for ${JSON.stringify(subject)} (${error.kind})`, err);
      return { success: false, error };
    } finally {
      this.metrics.record(kind, (performance.now() - started) / 1000, success);
    }
  }

  /** Runs under the lock, re-checking `closed` once the lock is held. */
  private exclusive<T>(
    subject: string,
    operation: () => Promise<StoreResult<T>>,
  ): Promise<StoreResult<T>> {
    return this.lock.runExclusive(async () => {
      if (this.closed) return fail("StoreClosed", subject, "File store is closed");
      return operation();
    });
  }

  private async guard(
    relativePath: string,
    options: CheckOptions = {},
  ): Promise<StoreResult<SafePath>> {
    const check = await this.validator.validate(relativePath, options);
    if (!check.safe) {
      return fail("AccessDenied", relativePath, `Access denied: ${check.reason}`);
    }
    return ok({ absolutePath: check.absolutePath, relativePath: check.relativePath });
  }

  /** The destination is always mutated; `sourceOptions` says whether the source is too. */
  private async guardPair(
    source: string,
    destination: string,
    sourceOptions: CheckOptions,
  ): Promise<StoreResult<[SafePath, SafePath]>> {
    const from = await this.guard(source, sourceOptions);
    if (!from.success) return from;
    const to = await this.guard(destination, { mutation: true });
    if (!to.success) return to;
    return ok<[SafePath, SafePath]>([from.data, to.data]);
  }

  private async requireFile(absolutePath: string, rel: string): Promise<StoreResult<Stats>> {
    const stats = await statOrNull(absolutePath);
    if (!stats) return fail("NotFound", rel, `File not found: ${rel}`);
    if (!stats.isFile()) return fail("NotAFile", rel, `Not a file: ${rel}`);
    return ok(stats);
  }

  private async requireDirectory(absolutePath: string, rel: string): Promise<StoreResult<Stats>> {
    const stats = await statOrNull(absolutePath);
    if (!stats) return fail("NotFound", rel, `Directory not found: ${rel}`);
    if (!stats.isDirectory()) return fail("NotADirectory", rel, `Not a directory: ${rel}`);
    return ok(stats);
  }

  /** Source must be a file; the destination's parents are created; an existing destination is versioned. */
  private async prepareTransfer(from: SafePath, to: SafePath): Promise<StoreResult<void>> {
    const source = await this.requireFile(from.absolutePath, from.relativePath);
    if (!source.success) return source;
    if (to.absolutePath === this.baseDir) {
      return fail("NotAFile", to.relativePath, "Destination is the base directory");
    }

    const existing = await statOrNull(to.absolutePath);
    if (existing && !existing.isFile()) {
      return fail("NotAFile", to.relativePath, `Destination is not a file: ${to.relativePath}`);
    }
    await fs.mkdir(path.dirname(to.absolutePath), { recursive: true });
    if (existing && from.absolutePath !== to.absolutePath) {
      await this.versions.snapshot(to.absolutePath);
    }
    return ok(undefined);
  }

  private async writeAtomically(
    target: SafePath,
    bytes: Uint8Array,
    options: { append: boolean; backup: boolean },
  ): Promise<StoreResult<WriteSummary>> {
    const { absolutePath, relativePath: rel } = target;
    if (absolutePath === this.baseDir) {
      return fail("NotAFile", rel, "Cannot write to the base directory");
    }

    const existing = await statOrNull(absolutePath);
    if (existing && !existing.isFile()) {
      return fail("NotAFile", rel, `Not a file: ${rel}`);
    }

    const dir = path.dirname(absolutePath);
    await fs.mkdir(dir, { recursive: true });

    const version =
      options.backup && existing ? await this.versions.snapshot(absolutePath) : null;

    let payload: Uint8Array = bytes;
    if (options.append && existing) {
      payload = Buffer.concat([await fs.readFile(absolutePath), bytes]);
    }

    const tmpPath = tempPathFor(absolutePath);
    try {
      await fs.writeFile(
        tmpPath,
        payload,
        existing ? { mode: existing.mode & 0o777 } : undefined,
      );
      await fs.rename(tmpPath, absolutePath);
    } catch (err: unknown) {
      await this.removeTemp(tmpPath);
      throw err;
    }

    const checksum = await this.checksums.update(absolutePath, payload);
    this.cache.invalidate(absolutePath);
    await this.sweepStaleTemps(dir);

    this.logger.info(`Wrote ${rel} (${payload.byteLength} bytes)`);
    return ok({ path: rel, size: payload.byteLength, checksum, version });
  }

  private async verifyIntegrity(
    absolutePath: string,
    rel: string,
    bytes: Uint8Array,
  ): Promise<void> {
    if (this.checksums.get(absolutePath) === undefined) {
      await this.checksums.update(absolutePath, bytes);
      return;
    }
    const intact = await this.checksums.verify(absolutePath, bytes);
    if (!intact) {
      this.logger.warn(`Checksum mismatch for ${rel}, content changed outside the store`);
    }
  }

  private recordAccess(absolutePath: string): void {
    let record = this.accessLog.get(absolutePath);
    if (!record) {
      record = { count: 0, recent: [] };
      this.accessLog.set(absolutePath, record);
    }
    record.count++;
    record.recent.push(Date.now());
    if (record.recent.length > this.config.accessLogLimit) {
      record.recent.splice(0, record.recent.length - this.config.accessLogLimit);
    }
  }

  private async describe(target: SafePath): Promise<FileEntry> {
    const stats = await fs.stat(target.absolutePath);
    return describeEntry(
      target.relativePath,
      stats,
      this.checksums.get(target.absolutePath) ?? null,
    );
  }

  private async describeAll(
    found: Array<{ absolutePath: string; stats: Stats }>,
  ): Promise<FileEntry[]> {
    return this.lock.runExclusive(async () =>
      found.map(({ absolutePath, stats }) =>
        describeEntry(
          this.validator.toRelative(absolutePath),
          stats,
          this.checksums.get(absolutePath) ?? null,
        ),
      ),
    );
  }

  private async removeTemp(tmpPath: string): Promise<void> {
    try {
      await fs.rm(tmpPath, { force: true });
    } catch (err: unknown) {
      this.logger.warn(`Failed to remove temp file ${tmpPath}`, err);
    }
  }

  /** Temp files left behind by an interrupted write in the same directory. */
  private async sweepStaleTemps(dir: string): Promise<void> {
    const cutoff = Date.now() - this.config.staleTempMs;
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (err: unknown) {
      this.logger.debug(`Cannot scan ${dir} for stale temp files`, err);
      return;
    }
    for (const name of names) {
      if (!TEMP_FILE_PATTERN.test(name)) continue;
      const tmpPath = path.join(dir, name);
      try {
        const stats = await fs.lstat(tmpPath);
        if (stats.mtimeMs < cutoff) {
          await fs.rm(tmpPath, { force: true });
          this.logger.info(`Removed stale temp file ${tmpPath}`);
        }
      } catch (err: unknown) {
        this.logger.debug(`Cannot inspect temp file ${tmpPath}`, err);
      }
    }
  }
}

const STORE_DIRECTORY_NAMES: ReadonlySet<string> = new Set(STORE_DIRECTORIES);

function isStoreDirectory(name: string): boolean {
  return STORE_DIRECTORY_NAMES.has(name);
}
