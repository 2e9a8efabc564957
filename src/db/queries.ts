/**
 * Prepared query functions for search, session timelines, and stats.
 * Shared by the EventStore and the read-only CLI commands.
 */

import type Database from "better-sqlite3";

export interface EventRow {
  id: number;
  file_name: string;
  line_number: number;
  event_data: string;
  user_name: string;
  inserted_at: string | null;
  event_type: string | null;
  event_message: string | null;
  event_session_id: string | null;
  event_uuid: string | null;
  event_git_branch: string | null;
  event_timestamp: string | null;
  event_model: string | null;
  event_input_tokens: number | null;
  event_cache_creation_input_tokens: number | null;
  event_cache_read_input_tokens: number | null;
  event_output_tokens: number | null;
  git_remote_url: string | null;
  git_commit_hash: string | null;
  synced_at: string | null;
}

export interface SearchHit {
  id: number;
  file_name: string;
  line_number: number;
  event_type: string | null;
  event_session_id: string | null;
  event_timestamp: string | null;
  git_remote_url: string | null;
  snippet: string;
}

export interface SessionSummary {
  session_id: string;
  file_name: string;
  started_at: string | null;
  last_activity: string | null;
  total_events: number;
  user_messages: number;
  assistant_messages: number;
  git_remote_url: string | null;
  git_branch: string | null;
}

export interface SyncStats {
  total: number;
  synced: number;
  pending: number;
}

/**
 * Full-text search over event messages, best match first.
 */
export function searchEvents(
  db: Database.Database,
  query: string,
  options: { sessionId?: string; limit?: number } = {},
): SearchHit[] {
  const params: unknown[] = [query];
  let sessionClause = "";
  if (options.sessionId) {
    sessionClause = "AND e.event_session_id = ?";
    params.push(options.sessionId);
  }
  params.push(options.limit ?? 20);

  const stmt = db.prepare(`
    SELECT
      e.id,
      e.file_name,
      e.line_number,
      e.event_type,
      e.event_session_id,
      e.event_timestamp,
      e.git_remote_url,
      substr(e.event_message, 1, 150) as snippet
    FROM events_fts f
    JOIN events e ON e.id = f.rowid
    WHERE events_fts MATCH ?
    ${sessionClause}
    ORDER BY f.rank, e.event_timestamp DESC
    LIMIT ?
  `);

  return stmt.all(...params) as SearchHit[];
}

/**
 * All events of one session in file order.
 */
export function getSessionEvents(db: Database.Database, sessionId: string): EventRow[] {
  return db.prepare(
    "SELECT * FROM events WHERE event_session_id = ? ORDER BY file_name, line_number",
  ).all(sessionId) as EventRow[];
}

/**
 * Summary of one session, or of the most recently active one when no id is given.
 */
export function getSessionSummary(db: Database.Database, sessionId?: string): SessionSummary | null {
  const select = `
    SELECT
      event_session_id as session_id,
      MIN(file_name) as file_name,
      MIN(event_timestamp) as started_at,
      MAX(event_timestamp) as last_activity,
      COUNT(*) as total_events,
      COUNT(CASE WHEN event_type = 'user' THEN 1 END) as user_messages,
      COUNT(CASE WHEN event_type = 'assistant' THEN 1 END) as assistant_messages,
      MAX(git_remote_url) as git_remote_url,
      MAX(event_git_branch) as git_branch
    FROM events
  `;
  const row = sessionId
    ? db.prepare(`${select} WHERE event_session_id = ? GROUP BY event_session_id`).get(sessionId)
    : db.prepare(`
        ${select}
        WHERE event_session_id IS NOT NULL
        GROUP BY event_session_id
        ORDER BY MAX(event_timestamp) DESC
        LIMIT 1
      `).get();
  return (row as SessionSummary | undefined) ?? null;
}

export function getSyncStats(db: Database.Database): SyncStats {
  const row = db.prepare(`
    SELECT
      COUNT(*) as total,
      COUNT(synced_at) as synced
    FROM events
  `).get() as { total: number; synced: number };
  return { total: row.total, synced: row.synced, pending: row.total - row.synced };
}

export function getTrackedFileCount(db: Database.Database): number {
  return (db.prepare("SELECT COUNT(*) as count FROM file_state").get() as { count: number }).count;
}
