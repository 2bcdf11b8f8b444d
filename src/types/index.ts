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
} from "./store.js";

export type { ToolDefinition } from "./tool.js";
