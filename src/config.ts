import * as fs from "node:fs";
import * as path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const LogLevelSchema = z.union([
  z.enum(["error", "warn", "info", "verbose", "debug", "silly"]),
  z.literal(false),
]);

export const FileStoreConfigSchema = z.object({
  baseDir: z.string().min(1),
  maxCacheEntries: z.number().int().positive().default(100),
  cacheTtlMs: z.number().int().positive().default(5 * 60 * 1000),
  maxBinaryBytes: z.number().int().positive().default(100_000_000),
  versioning: z.boolean().default(true),
  checksumPersistInterval: z.number().int().positive().default(10),
  accessLogLimit: z.number().int().positive().default(100),
  retentionDays: z.number().positive().default(30),
  staleTempMs: z.number().int().nonnegative().default(10 * 60 * 1000),
  strictDecoding: z.boolean().default(false),
  logging: z
    .object({
      file: LogLevelSchema.default("info"),
      console: LogLevelSchema.default("warn"),
      maxLogBytes: z.number().int().positive().default(10 * 1024 * 1024),
    })
    .default({}),
});

export type LogLevelOption = z.infer<typeof LogLevelSchema>;
export type FileStoreConfig = z.infer<typeof FileStoreConfigSchema>;
export type FileStoreConfigInput = z.input<typeof FileStoreConfigSchema>;

export interface LoadConfigOptions {
  /** YAML file; a relative `baseDir` inside it resolves against the file's directory */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<FileStoreConfigInput>;
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseConfig(input: unknown): FileStoreConfig {
  const parsed = FileStoreConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid file store configuration: ${summary}`, {
      issues,
    });
  }
  return parsed.data;
}

export function loadConfig(options: LoadConfigOptions = {}): FileStoreConfig {
  const env = options.env ?? process.env;
  const fromFile = options.configFile ? readConfigFile(options.configFile) : {};
  const merged = mergeConfig(fromFile, configFromEnv(env), options.overrides ?? {});
  return parseConfig(merged);
}

function readConfigFile(configFile: string): ConfigRecord {
  let raw: string;
  try {
    raw = fs.readFileSync(configFile, "utf-8");
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read config file: ${configFile}`, {
      cause: err,
    });
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err: unknown) {
    throw new ConfigError(`Invalid YAML in config file: ${configFile}`, {
      cause: err,
    });
  }

  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) {
    throw new ConfigError(
      `Invalid config file at ${configFile}: expected a mapping at the top level`,
    );
  }

  if (typeof doc.baseDir === "string" && !path.isAbsolute(doc.baseDir)) {
    return {
      ...doc,
      baseDir: path.resolve(path.dirname(configFile), doc.baseDir),
    };
  }
  return doc;
}

function configFromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
  const logging: ConfigRecord = {};
  if (env.FILEKEEP_LOG_LEVEL) logging.file = envLogLevel(env.FILEKEEP_LOG_LEVEL);
  if (env.FILEKEEP_CONSOLE_LOG_LEVEL) {
    logging.console = envLogLevel(env.FILEKEEP_CONSOLE_LOG_LEVEL);
  }

  return {
    baseDir: env.FILEKEEP_BASE_DIR || undefined,
    maxCacheEntries: envNumber(env.FILEKEEP_CACHE_SIZE),
    cacheTtlMs: envNumber(env.FILEKEEP_CACHE_TTL_MS),
    versioning: envBoolean(env.FILEKEEP_VERSIONING),
    retentionDays: envNumber(env.FILEKEEP_RETENTION_DAYS),
    logging: Object.keys(logging).length > 0 ? logging : undefined,
  };
}

// Unparseable values are passed through as strings so the schema reports them.
function envNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : value;
}

function envBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return value;
}

function envLogLevel(value: string): string | false {
  const normalized = value.trim().toLowerCase();
  return normalized === "false" || normalized === "off" ? false : normalized;
}

function mergeConfig(...layers: ConfigRecord[]): ConfigRecord {
  const result: ConfigRecord = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const current = result[key];
      result[key] =
        isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
    }
  }
  return result;
}
