/**
 * Status command: show what has been recorded and synced.
 */

import { existsSync } from "fs";
import { openReadOnly } from "../db/database.js";
import { getSessionSummary, getSyncStats, getTrackedFileCount } from "../db/queries.js";
import type { AppConfig } from "../config/schema.js";

export function runStatus(config: AppConfig, configPath: string): void {
  const dbPath = config.sqlite.databasePath;

  console.log("session-shipper status\n");
  console.log(`  Config:        ${configPath}`);
  console.log(`  Watching:      ${config.monitor.conversationDir}`);
  console.log(`  Remote sync:   ${config.api.enabled ? config.api.url : "disabled"}`);
  console.log(`  Database:      ${dbPath}`);

  if (!existsSync(dbPath)) {
    console.log("\nNo database found. Run 'session-shipper run' first.");
    return;
  }

  const db = openReadOnly(dbPath);
  try {
    const stats = getSyncStats(db);
    console.log(`  Tracked files: ${getTrackedFileCount(db).toLocaleString()}`);
    console.log(`  Events:        ${stats.total.toLocaleString()}`);
    console.log(`  Synced:        ${stats.synced.toLocaleString()}`);
    console.log(`  Pending:       ${stats.pending.toLocaleString()}`);

    const latest = getSessionSummary(db);
    if (latest) {
      console.log(`\nLatest session: ${latest.session_id} (${latest.file_name})`);
      console.log(`  Last activity: ${latest.last_activity ?? "unknown"}`);
      console.log(`  Messages:      ${latest.user_messages} user, ${latest.assistant_messages} assistant, ${latest.total_events} events`);
      if (latest.git_remote_url) {
        console.log(`  Repository:    ${latest.git_remote_url}${latest.git_branch ? ` (${latest.git_branch})` : ""}`);
      }
    }
  } finally {
    db.close();
  }
}
