/**
 * EventStore wraps better-sqlite3.
 * Opens the database in WAL mode, migrates the schema on construction, and
 * owns every write to the events table.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { describeError, log } from "../log.js";
import { deriveFields, parseEventLine } from "../ingest/extract.js";
import type { JsonObject } from "../ingest/extract.js";
import { migrateSchema } from "./migrate.js";
import type { MigrationStep } from "./migrate.js";
import { getSessionEvents, getSyncStats, searchEvents } from "./queries.js";
import type { EventRow, SearchHit, SyncStats } from "./queries.js";

export interface NewEvent {
  fileName: string;
  lineNumber: number;
  /** The line exactly as read from the file. */
  raw: string;
  event: JsonObject;
  gitRemoteUrl: string | null;
  gitCommitHash: string | null;
}

export interface PendingEvent {
  id: number;
  fileName: string;
  lineNumber: number;
  eventData: JsonObject;
  gitRemoteUrl: string | null;
  gitCommitHash: string | null;
}

/**
 * Where the sync worker reads pending events from and acknowledges them.
 */
export interface SyncSource {
  getUnsynced(limit: number): PendingEvent[];
  markSynced(id: number): boolean;
}

interface UnsyncedRow {
  id: number;
  file_name: string;
  line_number: number;
  event_data: string;
  git_remote_url: string | null;
  git_commit_hash: string | null;
}

export class EventStore implements SyncSource {
  db: Database.Database;
  readonly userName: string;
  readonly migrationSteps: MigrationStep[];

  constructor(dbPath: string, userName: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });

    this.db = new Database(dbPath);
    this.userName = userName;
    this.migrationSteps = this.initialize();
  }

  private initialize(): MigrationStep[] {
    try {
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("synchronous = NORMAL");
      this.db.pragma("busy_timeout = 30000");
      return migrateSchema(this.db, this.userName);
    } catch (err) {
      this.db.close();
      throw err;
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  /**
   * Insert a batch of events in one transaction. Lines already stored are
   * ignored. Returns the rows changed, or the batch size when nothing
   * changed; callers track progress through the cursor, not this count.
   */
  insertBatch(events: NewEvent[]): number {
    if (events.length === 0) return 0;
    const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO events (
        file_name, line_number, event_data, user_name,
        event_type, event_message, event_session_id, event_uuid, event_git_branch,
        event_timestamp, event_model, event_input_tokens, event_cache_creation_input_tokens,
        event_cache_read_input_tokens, event_output_tokens,
        git_remote_url, git_commit_hash
      ) VALUES (
        @file_name, @line_number, @event_data, @user_name,
        @event_type, @event_message, @event_session_id, @event_uuid, @event_git_branch,
        @event_timestamp, @event_model, @event_input_tokens, @event_cache_creation_input_tokens,
        @event_cache_read_input_tokens, @event_output_tokens,
        @git_remote_url, @git_commit_hash
      )
    `);
    const insertAll = this.db.transaction((items: NewEvent[]) => {
      let changes = 0;
      for (const e of items) {
        changes += stmt.run({
          file_name: e.fileName,
          line_number: e.lineNumber,
          event_data: e.raw,
          user_name: this.userName,
          ...deriveFields(e.event),
          git_remote_url: e.gitRemoteUrl,
          git_commit_hash: e.gitCommitHash,
        }).changes;
      }
      return changes;
    });
    const changes = insertAll(events);
    return changes > 0 ? changes : events.length;
  }

  /**
   * Events not yet acknowledged by the collector, newest first. Rows whose
   * payload is not a JSON object are never returned, so they cannot fill
   * the limit.
   */
  getUnsynced(limit: number): PendingEvent[] {
    const rows = this.db.prepare(`
      SELECT id, file_name, line_number, event_data, git_remote_url, git_commit_hash
      FROM events
      WHERE synced_at IS NULL
        AND CASE WHEN json_valid(event_data) THEN json_type(event_data) END = 'object'
      ORDER BY id DESC
      LIMIT ?
    `).all(limit) as UnsyncedRow[];

    const pending: PendingEvent[] = [];
    for (const row of rows) {
      const parsed = parseEventLine(row.event_data);
      if (!parsed.ok) {
        log.warn(`Stored event ${row.id} is not valid JSON (${parsed.reason}); leaving it unsynced`);
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

  /**
   * Stamp synced_at on an event. Returns false if it was already synced or
   * does not exist.
   */
  markSynced(id: number): boolean {
    const info = this.db
      .prepare("UPDATE events SET synced_at = CURRENT_TIMESTAMP WHERE id = ? AND synced_at IS NULL")
      .run(id);
    return info.changes > 0;
  }

  syncStats(): SyncStats {
    return getSyncStats(this.db);
  }

  search(query: string, limit = 20): SearchHit[] {
    return searchEvents(this.db, query, { limit });
  }

  sessionEvents(sessionId: string): EventRow[] {
    return getSessionEvents(this.db, sessionId);
  }
}

/**
 * Open the store for ingestion. Logs and returns null on failure so the
 * caller can carry on without local recording.
 */
export function openEventStore(dbPath: string, userName: string): EventStore | null {
  try {
    const store = new EventStore(dbPath, userName);
    log.info(`SQLite database ready: ${dbPath}`);
    return store;
  } catch (err) {
    log.error(`Failed to open SQLite database ${dbPath}: ${describeError(err)}`);
    return null;
  }
}

/**
 * Open an existing database for local readers. Never writes or migrates.
 */
export function openReadOnly(dbPath: string): Database.Database {
  if (!existsSync(dbPath)) {
    throw new Error(`Database not found: ${dbPath}`);
  }
  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  db.pragma("busy_timeout = 30000");
  return db;
}
