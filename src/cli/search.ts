/**
 * Search command: full-text search over stored messages.
 */

import { existsSync } from "fs";
import { openReadOnly } from "../db/database.js";
import { searchEvents } from "../db/queries.js";

export interface SearchOptions {
  dbPath: string;
  query: string;
  limit?: number;
  sessionId?: string;
}

export function runSearch(options: SearchOptions): void {
  const { dbPath, query, limit = 20, sessionId } = options;

  if (!existsSync(dbPath)) {
    console.log("No database found. Run 'session-shipper run' first.");
    return;
  }

  const db = openReadOnly(dbPath);
  try {
    const results = searchEvents(db, query, { limit, sessionId });
    if (results.length === 0) {
      console.log(`No results found for '${query}'.`);
      return;
    }

    console.log(`Search results for "${query}":\n`);
    for (const r of results) {
      const when = r.event_timestamp?.slice(0, 19).replace("T", " ") || "unknown";
      const repo = r.git_remote_url ? ` ${repoName(r.git_remote_url)}` : "";
      console.log(`  [${r.id}] ${when} (${r.event_type ?? "?"})${repo} ${r.file_name}:${r.line_number}`);
      console.log(`       ${r.snippet.replace(/\s+/g, " ")}`);
    }
  } finally {
    db.close();
  }
}

export function repoName(remoteUrl: string): string {
  const last = remoteUrl.split("/").pop() ?? remoteUrl;
  return last.replace(/\.git$/, "");
}
