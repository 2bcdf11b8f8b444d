import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "../logging.js";

export type SecurityEventType = "path_rejected" | "integrity_violation";

/**
 * Append-only audit trail for rejected paths and checksum mismatches.
 * One line per event: `<ISO timestamp> <event> <subject as JSON> <reason>`.
 */
export class SecurityLog {
  readonly filePath: string;
  private readonly logger: Logger;
  private events = 0;

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  get eventCount(): number {
    return this.events;
  }

  async record(
    event: SecurityEventType,
    subject: string,
    reason: string,
  ): Promise<void> {
    this.events++;
    // JSON keeps a hostile subject (newlines included) on a single line
    const quoted = JSON.stringify(subject);
    this.logger.warn(`Security event ${event}: ${quoted} ${reason}`);

    const line = `${new Date().toISOString()} ${event} ${quoted} ${reason}\n`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, "utf-8");
    } catch (err: unknown) {
      this.logger.error(`Failed to append to security log ${this.filePath}`, err);
    }
  }
}
