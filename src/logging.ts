import log from "electron-log/node";
import type { LogLevelOption } from "./config.js";

export interface Logger {
  error(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  info(...params: unknown[]): void;
  debug(...params: unknown[]): void;
}

export interface LoggerOptions {
  logId: string;
  /** Absolute path of the operations log */
  logFile: string;
  fileLevel: LogLevelOption;
  consoleLevel: LogLevelOption;
  /** electron-log moves the file to `<name>.old.log` once it grows past this */
  maxLogBytes: number;
}

const LINE_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}";

export function createLogger(options: LoggerOptions): Logger {
  const logger = log.create({ logId: options.logId });

  logger.transports.file.level = options.fileLevel;
  logger.transports.file.resolvePathFn = () => options.logFile;
  logger.transports.file.maxSize = options.maxLogBytes;
  logger.transports.file.format = LINE_FORMAT;

  logger.transports.console.level = options.consoleLevel;
  logger.transports.console.format = `{h}:{i}:{s}.{ms} [${options.logId}] {text}`;

  return logger;
}

export const silentLogger: Logger = {
  error() {},
  warn() {},
  info() {},
  debug() {},
};
