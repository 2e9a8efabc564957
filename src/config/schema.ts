/**
 * Zod schema for the shipper's config.json, with defaults for every field.
 */

import { z } from "zod";

export const MonitorConfigSchema = z.object({
  conversationDir: z.string().default("~/.claude/projects"),
  // Only process files whose relative path starts with this prefix.
  debugFilterProject: z.string().min(1).nullable().default(null),
  malformedLines: z.enum(["skip", "quarantine"]).default("skip"),
});

export const SqliteConfigSchema = z.object({
  enabled: z.boolean().default(true),
  databasePath: z.string().default("~/.session-shipper/events.db"),
  userName: z.string().default(process.env.USER ?? "unknown"),
});

export const ApiConfigSchema = z.object({
  enabled: z.boolean().default(false),
  url: z.string().default(""),
  apiKey: z.string().default(""),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const SyncConfigSchema = z.object({
  batchSize: z.number().int().min(1).max(1000).default(50),
  idleMs: z.number().int().min(0).default(60_000),
  throttleMs: z.number().int().min(0).default(100),
  initialBackoffMs: z.number().int().positive().default(100),
  maxBackoffMs: z.number().int().positive().default(300_000),
  stopTimeoutMs: z.number().int().positive().default(5_000),
});

export const AppConfigSchema = z
  .object({
    monitor: MonitorConfigSchema.default({}),
    sqlite: SqliteConfigSchema.default({}),
    api: ApiConfigSchema.default({}),
    sync: SyncConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.api.enabled && (!config.api.url || !config.api.apiKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["api"],
        message: "api.url and api.apiKey are required when api.enabled is true",
      });
    }
    if (config.sync.initialBackoffMs > config.sync.maxBackoffMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["sync", "initialBackoffMs"],
        message: "initialBackoffMs must not exceed maxBackoffMs",
      });
    }
  });

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;
export type SqliteConfig = z.infer<typeof SqliteConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type MalformedLinePolicy = MonitorConfig["malformedLines"];
