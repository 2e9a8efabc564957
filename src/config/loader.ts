/**
 * Config file lookup, ${ENV} substitution, validation and ~ expansion.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { homedir } from "os";
import { ZodError } from "zod";
import { ConfigError } from "../errors.js";
import { AppConfigSchema } from "./schema.js";
import type { AppConfig } from "./schema.js";

export const DEFAULT_DATA_DIR = join(homedir(), ".session-shipper");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_DATA_DIR, "config.json");
export const CONFIG_ENV_VAR = "SESSION_SHIPPER_CONFIG";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

export interface LoadedConfig {
  config: AppConfig;
  path: string;
  created: boolean;
}

/**
 * Replace ${ENV_VAR} in every string of a parsed JSON value.
 * Unknown variables are left as written.
 */
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_VAR_PATTERN, (match, name: string) => process.env[name] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item));
  }
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvVars(item);
    }
    return result;
  }
  return value;
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

export function resolveConfigPath(explicitPath?: string): string {
  if (explicitPath) return resolve(explicitPath);
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (fromEnv) return resolve(fromEnv);
  return DEFAULT_CONFIG_PATH;
}

function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(resolveEnvVars(raw));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(result.error)}`);
  }
  const config = result.data;
  return {
    ...config,
    monitor: { ...config.monitor, conversationDir: expandHome(config.monitor.conversationDir) },
    sqlite: { ...config.sqlite, databasePath: expandHome(config.sqlite.databasePath) },
  };
}

/**
 * Load config from disk. With createIfMissing, a missing file is written
 * with the defaults first.
 */
export function loadConfig(
  path: string,
  options: { createIfMissing?: boolean } = {},
): LoadedConfig {
  if (!existsSync(path)) {
    if (!options.createIfMissing) {
      return { config: parseConfig({}), path, created: false };
    }
    const defaults = AppConfigSchema.parse({});
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(defaults, null, 2) + "\n");
    return { config: parseConfig(defaults), path, created: true };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Could not read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return { config: parseConfig(raw), path, created: false };
}
