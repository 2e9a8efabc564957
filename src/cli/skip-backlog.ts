/**
 * skip-backlog command: mark every existing line as already ingested.
 */

import { CursorTracker } from "../db/cursor.js";
import { EventStore } from "../db/database.js";
import type { AppConfig } from "../config/schema.js";

export function runSkipBacklog(config: AppConfig): number {
  const store = new EventStore(config.sqlite.databasePath, config.sqlite.userName);
  try {
    const cursor = new CursorTracker(store.db);
    const count = cursor.fastForwardAll(config.monitor.conversationDir, config.monitor.debugFilterProject);
    console.log(`Fast-forwarded ${count} file(s).`);
    return count;
  } finally {
    store.close();
  }
}
