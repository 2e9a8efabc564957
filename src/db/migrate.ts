/**
 * In-place schema migration for the events database.
 *
 * Every step looks at the live shape of the database (PRAGMA table_xinfo,
 * sqlite_master) instead of a stored version, so running it twice, or after
 * an interrupted run, is safe.
 */

import type Database from "better-sqlite3";
import { log } from "../log.js";
import { deriveFields, DERIVED_COLUMNS, parseEventLine } from "../ingest/extract.js";
import {
  BASE_COLUMNS,
  EVENTS_INDEXES_SQL,
  EVENTS_TABLE,
  FILE_STATE_TABLE_SQL,
  FTS_TABLE,
  FTS_TABLE_SQL,
  FTS_TRIGGER_NAMES,
  FTS_TRIGGERS_SQL,
  PROVENANCE_COLUMNS,
  SYNCED_AT_INDEX_SQL,
  eventsTableSql,
} from "./schema.js";

const SHADOW_TABLE = `${EVENTS_TABLE}_new`;
const COPY_PAGE_SIZE = 1000;

export type MigrationStep = "added_synced_at" | "rebuilt_events_table" | "created_search_index" | "repopulated_search_index";

interface ColumnInfo {
  name: string;
  hidden: number;
}

interface ViewDefinition {
  name: string;
  sql: string | null;
}

export function tableColumns(db: Database.Database, table: string): ColumnInfo[] {
  return db.prepare(`PRAGMA table_xinfo(${table})`).all() as ColumnInfo[];
}

function tableExists(db: Database.Database, name: string): boolean {
  const row = db.prepare("SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ?").get(name);
  return row !== undefined;
}

/**
 * Columns that need a full rebuild to fix: missing derived or provenance
 * columns, and derived columns declared as GENERATED (hidden 2 or 3), which
 * an INSERT cannot fill.
 */
export function columnsNeedingRebuild(columns: ColumnInfo[]): string[] {
  const byName = new Map(columns.map((c) => [c.name, c]));
  const problems: string[] = [];
  for (const name of [...DERIVED_COLUMNS, ...PROVENANCE_COLUMNS]) {
    const col = byName.get(name);
    if (!col || col.hidden === 2 || col.hidden === 3) problems.push(name);
  }
  return problems;
}

/**
 * Bring the database to the current schema. Must complete before ingestion
 * starts. Returns the steps that actually ran.
 */
export function migrateSchema(db: Database.Database, userName: string): MigrationStep[] {
  const steps: MigrationStep[] = [];

  db.exec(eventsTableSql(EVENTS_TABLE));
  db.exec(FILE_STATE_TABLE_SQL);

  if (tableExists(db, SHADOW_TABLE)) {
    log.warn(`Dropping leftover ${SHADOW_TABLE} from an interrupted migration`);
    db.exec(`DROP TABLE ${SHADOW_TABLE}`);
  }

  let columns = tableColumns(db, EVENTS_TABLE);
  if (!columns.some((c) => c.name === "synced_at")) {
    log.info("Migrating schema: adding synced_at column...");
    db.exec("ALTER TABLE events ADD COLUMN synced_at DATETIME DEFAULT NULL");
    db.exec(SYNCED_AT_INDEX_SQL);
    steps.push("added_synced_at");
    columns = tableColumns(db, EVENTS_TABLE);
  }

  const ftsExisted = tableExists(db, FTS_TABLE);
  const missing = columnsNeedingRebuild(columns);
  if (missing.length > 0) {
    log.info(`Migrating schema: rebuilding events table for ${missing.join(", ")}...`);
    rebuildEventsTable(db, columns, userName);
    steps.push("rebuilt_events_table");
  }

  db.exec(EVENTS_INDEXES_SQL);

  db.exec(FTS_TABLE_SQL);
  db.exec(FTS_TRIGGERS_SQL);

  if (!ftsExisted) {
    const count = populateSearchIndex(db);
    log.info(`Created full-text search index (${count.toLocaleString()} messages)`);
    steps.push("created_search_index");
  } else if (steps.includes("rebuilt_events_table") || searchIndexIsEmpty(db)) {
    const count = populateSearchIndex(db);
    log.info(`Repopulated full-text search index (${count.toLocaleString()} messages)`);
    steps.push("repopulated_search_index");
  }

  return steps;
}

function searchIndexIsEmpty(db: Database.Database): boolean {
  // Counting events_fts itself would read the content table; docsize holds
  // one row per indexed document.
  const indexed = (db.prepare(`SELECT COUNT(*) AS count FROM ${FTS_TABLE}_docsize`).get() as { count: number }).count;
  if (indexed > 0) return false;
  const messages = (db.prepare("SELECT COUNT(*) AS count FROM events WHERE event_message IS NOT NULL").get() as { count: number }).count;
  return messages > 0;
}

/**
 * Clear and refill the FTS index from events that carry a message, matching
 * what the triggers would have written.
 */
export function populateSearchIndex(db: Database.Database): number {
  return db.transaction(() => {
    db.exec(`INSERT INTO ${FTS_TABLE}(${FTS_TABLE}) VALUES ('delete-all')`);
    const info = db.prepare(`
      INSERT INTO ${FTS_TABLE}(rowid, event_message, event_type, event_session_id)
      SELECT id, event_message, event_type, event_session_id
      FROM events
      WHERE event_message IS NOT NULL
      ORDER BY id
    `).run();
    return info.changes;
  })();
}

/**
 * Shadow-table rebuild: new table with the current schema, non-derived
 * columns copied across, derived columns recomputed from each payload, old
 * table swapped out, indexes and dependent views recreated.
 */
function rebuildEventsTable(db: Database.Database, oldColumns: ColumnInfo[], userName: string): void {
  const copyable = new Set(
    oldColumns.filter((c) => c.hidden !== 2 && c.hidden !== 3).map((c) => c.name),
  );
  const carried = [...BASE_COLUMNS, ...PROVENANCE_COLUMNS, "synced_at"].filter((name) => copyable.has(name));
  const rowCount = (db.prepare("SELECT COUNT(*) AS count FROM events").get() as { count: number }).count;
  log.info(`Migration: processing ${rowCount.toLocaleString()} rows...`);

  db.transaction(() => {
    const views = db
      .prepare("SELECT name, sql FROM sqlite_master WHERE type = 'view' AND sql LIKE '%events%'")
      .all() as ViewDefinition[];
    if (views.length > 0) {
      log.info(`Migration: preserving ${views.length} dependent view(s)`);
    }
    for (const view of views) {
      db.exec(`DROP VIEW IF EXISTS "${view.name}"`);
    }
    for (const trigger of FTS_TRIGGER_NAMES) {
      db.exec(`DROP TRIGGER IF EXISTS ${trigger}`);
    }

    db.exec(eventsTableSql(SHADOW_TABLE));

    const targetColumns = [
      "id", "file_name", "line_number", "event_data", "user_name", "inserted_at",
      "git_remote_url", "git_commit_hash", "synced_at",
      ...DERIVED_COLUMNS,
    ];
    const insert = db.prepare(`
      INSERT INTO ${SHADOW_TABLE} (${targetColumns.join(", ")})
      VALUES (${targetColumns.map((c) => `@${c}`).join(", ")})
    `);
    const page = db.prepare(`
      SELECT ${carried.join(", ")} FROM events WHERE id > ? ORDER BY id LIMIT ${COPY_PAGE_SIZE}
    `);

    let lastId = 0;
    for (;;) {
      const rows = page.all(lastId) as Record<string, unknown>[];
      if (rows.length === 0) break;
      for (const row of rows) {
        const eventData = String(row.event_data);
        const parsed = parseEventLine(eventData);
        const derived = parsed.ok ? deriveFields(parsed.event) : null;
        insert.run({
          id: row.id,
          file_name: row.file_name,
          line_number: row.line_number,
          event_data: eventData,
          user_name: row.user_name ?? userName,
          inserted_at: row.inserted_at ?? new Date().toISOString(),
          git_remote_url: row.git_remote_url ?? null,
          git_commit_hash: row.git_commit_hash ?? null,
          synced_at: row.synced_at ?? null,
          ...Object.fromEntries(DERIVED_COLUMNS.map((c) => [c, derived ? derived[c] : null])),
        });
        lastId = Number(row.id);
      }
    }

    db.exec("DROP TABLE events");
    db.exec(`ALTER TABLE ${SHADOW_TABLE} RENAME TO events`);
    db.exec(EVENTS_INDEXES_SQL);
    db.exec(FTS_TABLE_SQL);
    db.exec(FTS_TRIGGERS_SQL);

    for (const view of views) {
      if (view.sql) {
        log.info(`Migration: recreating view '${view.name}'`);
        db.exec(view.sql);
      }
    }
  })();

  log.info(`Migration: complete (${rowCount.toLocaleString()} rows migrated)`);
}
