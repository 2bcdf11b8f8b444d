export class FileKeepError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FileKeepError";
  }
}

export type FileStoreErrorKind =
  | "AccessDenied"
  | "NotFound"
  | "NotAFile"
  | "NotADirectory"
  | "PermissionDenied"
  | "DecodeError"
  | "SizeExceeded"
  | "OSFailure"
  | "WriteFailure"
  | "InvalidArgument"
  | "StoreClosed";

export class FileStoreError extends FileKeepError {
  readonly kind: FileStoreErrorKind;
  readonly path: string;

  constructor(
    message: string,
    options: { kind: FileStoreErrorKind; path: string; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "FileStoreError";
    this.kind = options.kind;
    this.path = options.path;
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends FileKeepError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: { issues?: ConfigIssue[]; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }
}

export class ToolExecutionError extends FileKeepError {
  readonly toolName: string;
  readonly kind?: FileStoreErrorKind;

  constructor(
    message: string,
    options: { toolName: string; kind?: FileStoreErrorKind; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "ToolExecutionError";
    this.toolName = options.toolName;
    this.kind = options.kind;
  }
}
