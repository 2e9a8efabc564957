/**
 * DDL for the session-shipper SQLite database.
 * Integer autoincrement PKs, UNIQUE(file_name, line_number) for dedup,
 * derived event_* columns filled at insert time, external-content FTS5
 * table kept in sync by triggers. Applied by migrate.ts, which creates
 * indexes and search only once the events table has its current shape.
 */

export const EVENTS_TABLE = "events";
export const FTS_TABLE = "events_fts";
export const FILE_STATE_TABLE = "file_state";

/** Columns that come from the caller, not from the payload. */
export const BASE_COLUMNS = ["id", "file_name", "line_number", "event_data", "user_name", "inserted_at"] as const;

export const PROVENANCE_COLUMNS = ["git_remote_url", "git_commit_hash"] as const;

export function eventsTableSql(tableName: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${tableName} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      file_name TEXT NOT NULL,
      line_number INTEGER NOT NULL,
      event_data TEXT NOT NULL,
      user_name TEXT NOT NULL,
      inserted_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      event_type TEXT,
      event_message TEXT,
      event_session_id TEXT,
      event_uuid TEXT,
      event_git_branch TEXT,
      event_timestamp TEXT,
      event_model TEXT,
      event_input_tokens INTEGER,
      event_cache_creation_input_tokens INTEGER,
      event_cache_read_input_tokens INTEGER,
      event_output_tokens INTEGER,
      git_remote_url TEXT,
      git_commit_hash TEXT,
      synced_at DATETIME DEFAULT NULL,
      UNIQUE(file_name, line_number)
    )
  `;
}

export const EVENTS_INDEXES_SQL = `
  CREATE INDEX IF NOT EXISTS idx_events_file_name ON events(file_name);
  CREATE INDEX IF NOT EXISTS idx_events_user_name ON events(user_name);
  CREATE INDEX IF NOT EXISTS idx_events_inserted_at ON events(inserted_at);
  CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type);
  CREATE INDEX IF NOT EXISTS idx_events_session_id ON events(event_session_id);
  CREATE INDEX IF NOT EXISTS idx_events_uuid ON events(event_uuid);
  CREATE INDEX IF NOT EXISTS idx_events_git_branch ON events(event_git_branch);
  CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events(event_timestamp);
  CREATE INDEX IF NOT EXISTS idx_events_model ON events(event_model);
  CREATE INDEX IF NOT EXISTS idx_events_git_remote_url ON events(git_remote_url);
  CREATE INDEX IF NOT EXISTS idx_events_git_commit_hash ON events(git_commit_hash);
  CREATE INDEX IF NOT EXISTS idx_events_synced_at ON events(synced_at);
`;

export const SYNCED_AT_INDEX_SQL = "CREATE INDEX IF NOT EXISTS idx_events_synced_at ON events(synced_at)";

export const FTS_TABLE_SQL = `
  CREATE VIRTUAL TABLE IF NOT EXISTS events_fts USING fts5(
    event_message,
    event_type,
    event_session_id,
    content=events,
    content_rowid=id
  )
`;

// External-content FTS5: removals must be issued as 'delete' commands
// carrying the old values. Only rows with a message are ever indexed.
export const FTS_TRIGGERS_SQL = `
  CREATE TRIGGER IF NOT EXISTS events_fts_insert
  AFTER INSERT ON events
  WHEN new.event_message IS NOT NULL
  BEGIN
    INSERT INTO events_fts(rowid, event_message, event_type, event_session_id)
    VALUES (new.id, new.event_message, new.event_type, new.event_session_id);
  END;

  CREATE TRIGGER IF NOT EXISTS events_fts_delete
  AFTER DELETE ON events
  WHEN old.event_message IS NOT NULL
  BEGIN
    INSERT INTO events_fts(events_fts, rowid, event_message, event_type, event_session_id)
    VALUES ('delete', old.id, old.event_message, old.event_type, old.event_session_id);
  END;

  CREATE TRIGGER IF NOT EXISTS events_fts_update
  AFTER UPDATE OF event_message, event_type, event_session_id ON events
  BEGIN
    INSERT INTO events_fts(events_fts, rowid, event_message, event_type, event_session_id)
    SELECT 'delete', old.id, old.event_message, old.event_type, old.event_session_id
    WHERE old.event_message IS NOT NULL;
    INSERT INTO events_fts(rowid, event_message, event_type, event_session_id)
    SELECT new.id, new.event_message, new.event_type, new.event_session_id
    WHERE new.event_message IS NOT NULL;
  END;
`;

export const FTS_TRIGGER_NAMES = ["events_fts_insert", "events_fts_delete", "events_fts_update"] as const;

/** Redacted events waiting for the collector when there is no event store. */
export const OUTBOX_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS outbox (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    file_name TEXT NOT NULL,
    line_number INTEGER NOT NULL,
    event_data TEXT NOT NULL,
    git_remote_url TEXT,
    git_commit_hash TEXT,
    queued_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    UNIQUE(file_name, line_number)
  )
`;

export const FILE_STATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS file_state (
    file_name TEXT PRIMARY KEY,
    last_line INTEGER NOT NULL DEFAULT 0,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  )
`;
