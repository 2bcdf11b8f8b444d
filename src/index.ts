// Types
export type {
  StoreResult,
  OperationKind,
  FileEntry,
  FileInfo,
  WriteSummary,
  DeleteSummary,
  CleanupSummary,
  OperationStats,
  CacheStats,
  MetricsSnapshot,
  ReadTextOptions,
  WriteTextOptions,
  WriteBinaryOptions,
  ListDirectoryOptions,
  DeleteFileOptions,
  SearchFilesOptions,
  ToolDefinition,
} from "./types/index.js";

// Errors
export {
  FileKeepError,
  FileStoreError,
  ConfigError,
  ToolExecutionError,
} from "./errors.js";
export type { FileStoreErrorKind, ConfigIssue } from "./errors.js";

// Config
export {
  FileStoreConfigSchema,
  LogLevelSchema,
  loadConfig,
  parseConfig,
} from "./config.js";
export type {
  FileStoreConfig,
  FileStoreConfigInput,
  LoadConfigOptions,
  LogLevelOption,
} from "./config.js";

// Logging
export { createLogger, silentLogger } from "./logging.js";
export type { Logger, LoggerOptions } from "./logging.js";

// Storage
export { FileStore, STORE_DIRECTORIES } from "./storage/file-store.js";
export type { FileStoreOptions } from "./storage/file-store.js";
export { PathValidator } from "./storage/path-validator.js";
export type { PathCheck } from "./storage/path-validator.js";
export { SecurityLog } from "./storage/security-log.js";
export type { SecurityEventType } from "./storage/security-log.js";
export { ChecksumStore, sha256Hex } from "./storage/checksum-store.js";
export { VersionArchive, versionName } from "./storage/version-archive.js";
export { ContentCache } from "./storage/content-cache.js";
export { OperationMetrics } from "./storage/operation-metrics.js";
export { ReentrantLock } from "./storage/lock.js";
export { formatBytes } from "./storage/fs-utils.js";

// Built-in tools
export { createFileStoreTools } from "./tools/file-store.js";
