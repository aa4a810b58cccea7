import fs from "node:fs";
import path from "node:path";
import { parse } from "@iarna/toml";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors";

export const CONFIG_FILE_NAME = "order-flow.config.toml";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const ServerSectionSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
});

const StorageSectionSchema = z.object({
  /** CSV file holding the live order table */
  data_file: z.string().min(1).optional(),
  /** CSV file used when a request carries `test=1` */
  test_data_file: z.string().min(1).optional(),
});

const DisplaySectionSchema = z.object({
  currency_symbol: z.string().optional(),
  /** Standard PDF fonts have no rupee glyph, so reports use a text label */
  pdf_currency_symbol: z.string().optional(),
});

const LoggingSectionSchema = z.object({
  level: z.enum(LOG_LEVELS).optional(),
});

/**
 * Project configuration from order-flow.config.toml
 */
export const ProjectConfigSchema = z.object({
  server: ServerSectionSchema.optional(),
  storage: StorageSectionSchema.optional(),
  display: DisplaySectionSchema.optional(),
  logging: LoggingSectionSchema.optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Walks up the directory tree looking for `fileName`.
 */
export function findUp(
  fileName: string,
  startDir: string = process.cwd(),
): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const candidate = path.join(currentDir, fileName);
    if (fs.existsSync(candidate)) {
      return candidate;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root directory
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

export function parseProjectConfig(
  content: string,
  source = CONFIG_FILE_NAME,
): ProjectConfig {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${source}: ${errorMessage(error)}`);
  }

  const result = ProjectConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Reads and parses the project configuration. Returns null when no config
 * file exists in the working directory or any parent directory.
 */
export function readProjectConfig(
  configPath?: string,
): { path: string; config: ProjectConfig } | null {
  const resolved = configPath ?? findUp(CONFIG_FILE_NAME);
  if (!resolved) {
    return null;
  }
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Config file not found: ${resolved}`);
  }

  const content = fs.readFileSync(resolved, "utf-8");
  return { path: resolved, config: parseProjectConfig(content, resolved) };
}
