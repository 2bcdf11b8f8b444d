import type { FileStoreError } from "../errors.js";

export type StoreResult<T> =
  | { success: true; data: T }
  | { success: false; error: FileStoreError };

export type OperationKind =
  | "read"
  | "write"
  | "write_binary"
  | "read_binary"
  | "list"
  | "create_dir"
  | "delete"
  | "move"
  | "copy"
  | "info"
  | "search"
  | "cleanup"
  | "versions";

export interface FileEntry {
  name: string;
  /** Relative to the base directory, always `/`-separated */
  path: string;
  size: number;
  modifiedAt: string;
  createdAt: string;
  isFile: boolean;
  isDirectory: boolean;
  mimeType: string | null;
  /** Octal permission bits, e.g. "644" */
  permissions: string;
  checksum: string | null;
}

export interface FileInfo extends FileEntry {
  sizeHuman: string;
  cached: boolean;
  accessCount: number;
  lastAccessedAt: string | null;
}

export interface WriteSummary {
  path: string;
  size: number;
  checksum: string;
  /** Relative path of the snapshot taken before the overwrite */
  version: string | null;
}

export interface DeleteSummary {
  path: string;
  /** Relative path inside the archive, or null for a permanent delete */
  archivedTo: string | null;
}

export interface CleanupSummary {
  versionsRemoved: number;
  archiveRemoved: number;
  tempRemoved: number;
}

export interface OperationStats {
  count: number;
  totalTime: number;
  errors: number;
  averageTime: number;
  errorRate: number;
}

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export interface MetricsSnapshot {
  operations: Partial<Record<OperationKind, OperationStats>>;
  cache: CacheStats;
  checksums: number;
  securityEvents: number;
}

export interface ReadTextOptions {
  useCache?: boolean;
}

export interface WriteTextOptions {
  append?: boolean;
  backup?: boolean;
}

export interface WriteBinaryOptions {
  backup?: boolean;
}

export interface ListDirectoryOptions {
  includeDirs?: boolean;
  pattern?: string;
}

export interface DeleteFileOptions {
  archive?: boolean;
}

export interface SearchFilesOptions {
  extensions?: string[];
}
