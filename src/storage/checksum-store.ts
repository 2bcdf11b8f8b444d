import { createHash, randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { Logger } from "../logging.js";
import type { SecurityLog } from "./security-log.js";

const ChecksumFileSchema = z.record(z.string(), z.string());

export function sha256Hex(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

export interface ChecksumStoreOptions {
  /** Where the mapping is persisted (`metadata/checksums.json`) */
  filePath: string;
  /** Staging directory for the temp file renamed over `filePath` */
  tempDir: string;
  /** Persist after this many updates; `close()` persists the rest */
  persistInterval: number;
  securityLog: SecurityLog;
  logger: Logger;
}

/**
 * Absolute path → SHA-256 of the last content the store wrote or verified.
 * A mismatch on read is reported, never enforced.
 */
export class ChecksumStore {
  private readonly entries = new Map<string, string>();
  private readonly filePath: string;
  private readonly tempDir: string;
  private readonly persistInterval: number;
  private readonly securityLog: SecurityLog;
  private readonly logger: Logger;
  private pendingUpdates = 0;

  constructor(options: ChecksumStoreOptions) {
    this.filePath = options.filePath;
    this.tempDir = options.tempDir;
    this.persistInterval = options.persistInterval;
    this.securityLog = options.securityLog;
    this.logger = options.logger;
  }

  get size(): number {
    return this.entries.size;
  }

  get dirty(): boolean {
    return this.pendingUpdates > 0;
  }

  checksum(content: string | Uint8Array): string {
    return sha256Hex(content);
  }

  get(absolutePath: string): string | undefined {
    return this.entries.get(absolutePath);
  }

  async verify(absolutePath: string, content: string | Uint8Array): Promise<boolean> {
    const expected = this.entries.get(absolutePath);
    if (expected === undefined) return true;

    const actual = sha256Hex(content);
    if (actual === expected) return true;

    await this.securityLog.record(
      "integrity_violation",
      absolutePath,
      `expected ${expected} got ${actual}`,
    );
    return false;
  }

  async update(absolutePath: string, content: string | Uint8Array): Promise<string> {
    const digest = sha256Hex(content);
    await this.set(absolutePath, digest);
    return digest;
  }

  async set(absolutePath: string, digest: string): Promise<void> {
    this.entries.set(absolutePath, digest);
    await this.markDirty();
  }

  async delete(absolutePath: string): Promise<boolean> {
    const removed = this.entries.delete(absolutePath);
    if (removed) await this.markDirty();
    return removed;
  }

  async move(fromPath: string, toPath: string): Promise<void> {
    const digest = this.entries.get(fromPath);
    if (digest === undefined) return;
    this.entries.delete(fromPath);
    await this.set(toPath, digest);
  }

  /** A missing or unreadable file leaves the mapping empty. */
  async load(): Promise<void> {
    this.entries.clear();
    this.pendingUpdates = 0;

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return;
      this.logger.warn(`Cannot read checksum file ${this.filePath}, starting empty`, err);
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err: unknown) {
      this.logger.warn(`Corrupt checksum file ${this.filePath}, starting empty`, err);
      return;
    }

    const parsed = ChecksumFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`Unexpected checksum file shape at ${this.filePath}, starting empty`);
      return;
    }
    for (const [key, digest] of Object.entries(parsed.data)) {
      this.entries.set(key, digest);
    }
    this.logger.debug(`Loaded ${this.entries.size} checksums`);
  }

  async save(): Promise<void> {
    const data = Object.fromEntries(this.entries);
    const tmpPath = path.join(this.tempDir, `checksums.${randomUUID()}.tmp`);
    await fs.mkdir(this.tempDir, { recursive: true });
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf-8");
      await fs.rename(tmpPath, this.filePath);
    } catch (err: unknown) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
    this.pendingUpdates = 0;
  }

  private async markDirty(): Promise<void> {
    this.pendingUpdates++;
    if (this.pendingUpdates < this.persistInterval) return;
    try {
      await this.save();
    } catch (err: unknown) {
      // stays dirty, the next update or close() retries
      this.logger.error(`Failed to persist checksums to ${this.filePath}`, err);
    }
  }
}
