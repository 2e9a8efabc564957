/**
 * Run command: the foreground monitor. Stops cleanly on SIGINT/SIGTERM.
 */

import { dirname } from "path";
import { describeError, log } from "../log.js";
import { Monitor } from "../monitor.js";
import type { AppConfig } from "../config/schema.js";

export interface RunOptions {
  config: AppConfig;
  configPath: string;
  skipBacklog?: boolean;
}

export async function runMonitor(options: RunOptions): Promise<Monitor> {
  log.info(`Using config: ${options.configPath}`);
  const monitor = new Monitor({
    config: options.config,
    skipBacklog: options.skipBacklog,
    dataDir: dirname(options.configPath),
  });

  const shutdown = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}`);
    monitor.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error(`Shutdown failed: ${describeError(err)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await monitor.start();
  } catch (err) {
    await monitor.stop();
    throw err;
  }
  return monitor;
}
