import { z } from "zod";
import { ToolExecutionError } from "../errors.js";
import type { FileStore } from "../storage/file-store.js";
import type { StoreResult } from "../types/store.js";
import type { ToolDefinition } from "../types/tool.js";

function unwrap<T>(toolName: string, result: StoreResult<T>): T {
  if (result.success) return result.data;
  throw new ToolExecutionError(result.error.message, {
    toolName,
    kind: result.error.kind,
    cause: result.error,
  });
}

/** Tool definitions that route every call through the store's guards. */
export function createFileStoreTools(options: { store: FileStore }): ToolDefinition[] {
  const { store } = options;

  const readFileParams = z.object({
    path: z.string().describe("The file path to read, relative to the store root"),
  });
  const readFile: ToolDefinition<typeof readFileParams> = {
    name: "ReadFile",
    description: "Read a text file from the store.",
    parameters: readFileParams,
    async execute(params) {
      return unwrap("ReadFile", await store.readText(params.path));
    },
  };

  const writeFileParams = z.object({
    path: z.string().describe("The file path to write, relative to the store root"),
    content: z.string().describe("The content to write to the file"),
    append: z.boolean().default(false).describe("Append instead of replacing"),
  });
  const writeFile: ToolDefinition<typeof writeFileParams> = {
    name: "WriteFile",
    description:
      "Write text to a file in the store. Creates parent directories and keeps the previous content as a version.",
    parameters: writeFileParams,
    async execute(params) {
      const summary = unwrap(
        "WriteFile",
        await store.writeText(params.path, params.content, { append: params.append }),
      );
      return `File written: ${summary.path} (${summary.size} bytes)`;
    },
  };

  const listDirectoryParams = z.object({
    path: z.string().describe("The directory path to list, relative to the store root").default("."),
    includeDirs: z.boolean().default(true),
    pattern: z.string().optional().describe("Regular expression matched against entry names"),
  });
  const listDirectory: ToolDefinition<typeof listDirectoryParams> = {
    name: "ListDirectory",
    description: "List files, and optionally directories, at the given path.",
    parameters: listDirectoryParams,
    async execute(params) {
      const entries = unwrap(
        "ListDirectory",
        await store.listDirectory(params.path, {
          includeDirs: params.includeDirs,
          pattern: params.pattern,
        }),
      );
      return entries.map((e) => ({
        name: e.name,
        type: e.isDirectory ? "directory" : "file",
        size: e.size,
      }));
    },
  };

  const makeDirectoryParams = z.object({
    path: z.string().describe("The directory path to create, relative to the store root"),
  });
  const makeDirectory: ToolDefinition<typeof makeDirectoryParams> = {
    name: "MakeDirectory",
    description: "Create a directory, including any necessary parent directories.",
    parameters: makeDirectoryParams,
    async execute(params) {
      const created = unwrap("MakeDirectory", await store.createDirectory(params.path));
      return `Directory created: ${created}`;
    },
  };

  const deleteFileParams = z.object({
    path: z.string().describe("The file path to delete, relative to the store root"),
    permanent: z.boolean().default(false),
  });
  const deleteFile: ToolDefinition<typeof deleteFileParams> = {
    name: "DeleteFile",
    description: "Delete a file. The file is moved to the archive unless permanent is set.",
    parameters: deleteFileParams,
    async execute(params) {
      const summary = unwrap(
        "DeleteFile",
        await store.deleteFile(params.path, { archive: !params.permanent }),
      );
      return summary.archivedTo
        ? `File archived: ${summary.path} -> ${summary.archivedTo}`
        : `File deleted: ${summary.path}`;
    },
  };

  const searchFilesParams = z.object({
    term: z.string().min(1).describe("Substring to look for in file names"),
    directory: z.string().default("."),
    extensions: z.array(z.string()).optional().describe('Only these extensions, e.g. [".md"]'),
  });
  const searchFiles: ToolDefinition<typeof searchFilesParams> = {
    name: "SearchFiles",
    description: "Find files whose name contains the search term (case-insensitive).",
    parameters: searchFilesParams,
    async execute(params) {
      const entries = unwrap(
        "SearchFiles",
        await store.searchFiles(params.term, params.directory, {
          extensions: params.extensions,
        }),
      );
      return entries.map((e) => e.path);
    },
  };

  const fileInfoParams = z.object({
    path: z.string().describe("The path to inspect, relative to the store root"),
  });
  const fileInfo: ToolDefinition<typeof fileInfoParams> = {
    name: "FileInfo",
    description: "Show size, timestamps, checksum and access statistics for a path.",
    parameters: fileInfoParams,
    async execute(params) {
      return unwrap("FileInfo", await store.getFileInfo(params.path));
    },
  };

  return [readFile, writeFile, listDirectory, makeDirectory, deleteFile, searchFiles, fileInfo];
}
