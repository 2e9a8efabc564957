#!/usr/bin/env node
/**
 * CLI entry point for session-shipper.
 */

import { Command } from "commander";
import { loadConfig, resolveConfigPath } from "./config/loader.js";
import { describeError, setLogLevel } from "./log.js";
import { VERSION } from "./version.js";

interface ConfigOption {
  config?: string;
}

/**
 * Run a command body, reporting failures on stderr with exit code 1.
 */
async function guarded(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name("session-shipper")
  .description("Record coding-assistant session logs locally and ship them to a remote collector")
  .version(VERSION);

program
  .command("run")
  .description("Watch the session directory and record new events (foreground)")
  .option("--skip-backlog", "Mark existing lines as ingested before watching")
  .option("--config <path>", "Config file path")
  .option("--verbose", "Show debug logging")
  .action(async (opts: ConfigOption & { skipBacklog?: boolean; verbose?: boolean }) => {
    await guarded(async () => {
      if (opts.verbose) setLogLevel("debug");
      const { config, path, created } = loadConfig(resolveConfigPath(opts.config), { createIfMissing: true });
      if (created) console.log(`Created default config at ${path}`);
      const { runMonitor } = await import("./cli/run.js");
      await runMonitor({ config, configPath: path, skipBacklog: opts.skipBacklog });
    });
  });

program
  .command("status")
  .description("Show tracked files and sync progress")
  .option("--config <path>", "Config file path")
  .action(async (opts: ConfigOption) => {
    await guarded(async () => {
      const { config, path } = loadConfig(resolveConfigPath(opts.config));
      const { runStatus } = await import("./cli/status.js");
      runStatus(config, path);
    });
  });

program
  .command("search")
  .description("Full-text search over recorded messages")
  .argument("<query>", "FTS5 query, e.g. auth* or \"user login\"")
  .option("--limit <n>", "Max results", "20")
  .option("--session <id>", "Only search one session")
  .option("--config <path>", "Config file path")
  .action(async (query: string, opts: ConfigOption & { limit: string; session?: string }) => {
    await guarded(async () => {
      const limit = parseInt(opts.limit, 10);
      if (!Number.isInteger(limit) || limit < 1) throw new Error(`Invalid --limit: ${opts.limit}`);
      const { config } = loadConfig(resolveConfigPath(opts.config));
      const { runSearch } = await import("./cli/search.js");
      runSearch({ dbPath: config.sqlite.databasePath, query, limit, sessionId: opts.session });
    });
  });

program
  .command("skip-backlog")
  .description("Fast-forward every file cursor to the current end of file and exit")
  .option("--config <path>", "Config file path")
  .action(async (opts: ConfigOption) => {
    await guarded(async () => {
      setLogLevel("warn");
      const { config } = loadConfig(resolveConfigPath(opts.config));
      const { runSkipBacklog } = await import("./cli/skip-backlog.js");
      runSkipBacklog(config);
    });
  });

await program.parseAsync();
