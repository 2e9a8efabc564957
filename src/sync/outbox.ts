/**
 * Queue of events waiting for the collector, used in place of the event
 * store when local recording is unavailable. It shares a database with the
 * fallback cursor, so a queued line and its cursor survive a restart
 * together. Entries are deleted once the collector has them.
 */

import type Database from "better-sqlite3";
import { log } from "../log.js";
import { OUTBOX_TABLE_SQL } from "../db/schema.js";
import { parseEventLine } from "../ingest/extract.js";
import type { PendingEvent, SyncSource } from "../db/database.js";

export type OutboxEntry = Omit<PendingEvent, "id">;

interface OutboxRow {
  id: number;
  file_name: string;
  line_number: number;
  event_data: string;
  git_remote_url: string | null;
  git_commit_hash: string | null;
}

export class Outbox implements SyncSource {
  readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.db.exec(OUTBOX_TABLE_SQL);
  }

  /**
   * Queue events in one transaction. A line already queued is ignored.
   * Returns the rows added, or the batch size when nothing was new.
   */
  enqueue(entries: OutboxEntry[]): number {
    const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO outbox (file_name, line_number, event_data, git_remote_url, git_commit_hash)
      VALUES (?, ?, ?, ?, ?)
    `);
    const insertAll = this.db.transaction((items: OutboxEntry[]) => {
      let changes = 0;
      for (const e of items) {
        changes += stmt.run(e.fileName, e.lineNumber, JSON.stringify(e.eventData), e.gitRemoteUrl, e.gitCommitHash).changes;
      }
      return changes;
    });
    const changes = insertAll(entries);
    return changes > 0 ? changes : entries.length;
  }

  /** Newest first, matching the event store. */
  getUnsynced(limit: number): PendingEvent[] {
    if (limit <= 0) return [];
    const rows = this.db.prepare(`
      SELECT id, file_name, line_number, event_data, git_remote_url, git_commit_hash
      FROM outbox
      WHERE CASE WHEN json_valid(event_data) THEN json_type(event_data) END = 'object'
      ORDER BY id DESC
      LIMIT ?
    `).all(limit) as OutboxRow[];

    const pending: PendingEvent[] = [];
    for (const row of rows) {
      const parsed = parseEventLine(row.event_data);
      if (!parsed.ok) {
        log.warn(`Queued event ${row.id} is not valid JSON (${parsed.reason}); leaving it queued`);
        continue;
      }
      pending.push({
        id: row.id,
        fileName: row.file_name,
        lineNumber: row.line_number,
        eventData: parsed.event,
        gitRemoteUrl: row.git_remote_url,
        gitCommitHash: row.git_commit_hash,
      });
    }
    return pending;
  }

  markSynced(id: number): boolean {
    return this.db.prepare("DELETE FROM outbox WHERE id = ?").run(id).changes > 0;
  }

  get size(): number {
    return (this.db.prepare("SELECT COUNT(*) as count FROM outbox").get() as { count: number }).count;
  }
}
