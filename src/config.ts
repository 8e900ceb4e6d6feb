import * as path from "path";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "./activityLister";
import { DEFAULT_BASE_URL } from "./shared/http";
import { ExportFormat, parseExportFormat } from "./shared/types";

export const DEFAULT_BACKUP_DIR = "./coros_activities";
export const DEFAULT_FORMATS: ExportFormat[] = [ExportFormat.FIT, ExportFormat.TCX];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
    this.name = "ConfigError";
  }
}

export interface BackupConfig {
  email?: string;
  password?: string;
  backupDir: string;
  formats: ExportFormat[];
  baseUrl: string;
  pageSize: number;
  concurrency: number;
  mockMode: boolean;
  statsOnly: boolean;
}

type Env = Record<string, string | undefined>;

const getArgValues = (argv: string[], flag: string): string[] => {
  const values: string[] = [];
  argv.forEach((arg, index) => {
    if (arg === flag && index + 1 < argv.length) {
      values.push(argv[index + 1]);
    } else if (arg.startsWith(`${flag}=`)) {
      values.push(arg.slice(flag.length + 1));
    }
  });
  return values;
};

const getArgValue = (argv: string[], flag: string): string | undefined => {
  const values = getArgValues(argv, flag);
  return values[values.length - 1];
};

export const parseFormats = (raw: string[]): ExportFormat[] => {
  const formats: ExportFormat[] = [];
  for (const entry of raw.flatMap((value) => value.split(","))) {
    if (!entry.trim()) continue;
    const format = parseExportFormat(entry);
    if (!format) {
      throw new ConfigError(
        `Invalid format "${entry.trim()}" (expected one of: ${Object.values(ExportFormat).join(", ")})`
      );
    }
    if (!formats.includes(format)) formats.push(format);
  }
  return formats;
};

const parsePositiveInt = (raw: string | undefined, name: string, fallback: number, max?: number): number => {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
    const range = max !== undefined ? ` between 1 and ${max}` : "";
    throw new ConfigError(`${name} must be an integer${range}, got "${raw}"`);
  }
  return value;
};

/**
 * Resolve settings from CLI flags, falling back to environment variables
 * (`.env` is loaded by the entry point).
 */
export const loadConfig = (argv: string[], env: Env): BackupConfig => {
  const cliFormats = getArgValues(argv, "--format");
  const formats = parseFormats(
    cliFormats.length > 0 ? cliFormats : [env.COROS_FORMATS ?? DEFAULT_FORMATS.join(",")]
  );
  if (formats.length === 0) {
    throw new ConfigError("At least one export format is required");
  }

  return {
    email: env.COROS_EMAIL || undefined,
    password: env.COROS_PASSWORD || undefined,
    backupDir: path.resolve(
      getArgValue(argv, "--backup-dir") || env.COROS_BACKUP_DIR || DEFAULT_BACKUP_DIR
    ),
    formats,
    baseUrl: env.COROS_API_BASE_URL || DEFAULT_BASE_URL,
    pageSize: parsePositiveInt(
      getArgValue(argv, "--page-size") ?? env.COROS_PAGE_SIZE,
      "Page size",
      DEFAULT_PAGE_SIZE,
      MAX_PAGE_SIZE
    ),
    concurrency: parsePositiveInt(
      getArgValue(argv, "--concurrency") ?? env.COROS_CONCURRENCY,
      "Concurrency",
      1
    ),
    mockMode: env.MOCK_MODE === "true" || argv.includes("--mock"),
    statsOnly: argv.includes("--stats"),
  };
};
