/**
 * Per-file line cursor: how many lines of each session file have been
 * ingested. Lives in the file_state table of the events database.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync, readFileSync, renameSync } from "fs";
import { dirname, join } from "path";
import { describeError, log } from "../log.js";
import { fileIdentity, listJsonlFiles, splitLines } from "../ingest/files.js";
import { FILE_STATE_TABLE_SQL } from "./schema.js";
import { getTrackedFileCount } from "./queries.js";

export const LEGACY_STATE_FILE = "state.json";

export class CursorTracker {
  readonly db: Database.Database;

  /**
   * Track cursors in an already open database. The file_state table is
   * created if needed, and a legacy state.json beside the file is imported.
   */
  constructor(db: Database.Database) {
    this.db = db;
    this.db.exec(FILE_STATE_TABLE_SQL);
    if (!db.memory) {
      this.importLegacyState(join(dirname(db.name), LEGACY_STATE_FILE));
    }
    log.debug(`Cursor tracker ready: ${this.fileCount()} files tracked`);
  }

  /**
   * Open a database file just for cursors, for when the event store is
   * unavailable.
   */
  static open(dbPath: string): CursorTracker {
    mkdirSync(dirname(dbPath), { recursive: true });
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.pragma("busy_timeout = 30000");
    return new CursorTracker(db);
  }

  getLastLine(fileName: string): number {
    const row = this.db
      .prepare("SELECT last_line FROM file_state WHERE file_name = ?")
      .get(fileName) as { last_line: number } | undefined;
    return row?.last_line ?? 0;
  }

  /**
   * Record progress for a file. A value below the stored one is ignored.
   */
  setLastLine(fileName: string, lastLine: number): void {
    this.db.prepare(`
      INSERT INTO file_state (file_name, last_line, updated_at)
      VALUES (?, ?, CURRENT_TIMESTAMP)
      ON CONFLICT(file_name) DO UPDATE SET
        last_line = excluded.last_line,
        updated_at = CURRENT_TIMESTAMP
      WHERE excluded.last_line > file_state.last_line
    `).run(fileName, lastLine);
  }

  /**
   * Move every matching file's cursor to its current line count without
   * ingesting anything. Returns the number of files touched.
   */
  fastForwardAll(root: string, filter?: string | null): number {
    log.info("Skipping backlog - fast-forwarding to current position...");
    const updates: { fileName: string; lines: number }[] = [];

    for (const path of listJsonlFiles(root)) {
      const fileName = fileIdentity(root, path);
      if (filter && !fileName.startsWith(filter)) continue;
      let lines: number;
      try {
        lines = splitLines(readFileSync(path, "utf-8")).length;
      } catch (err) {
        log.error(`Error reading ${fileName}: ${describeError(err)}`);
        continue;
      }
      if (lines === 0) continue;
      updates.push({ fileName, lines });
      log.debug(`Skipped ${lines} lines in ${fileName}`);
    }

    const stmt = this.db.prepare(`
      INSERT INTO file_state (file_name, last_line, updated_at)
      VALUES (?, ?, CURRENT_TIMESTAMP)
      ON CONFLICT(file_name) DO UPDATE SET
        last_line = excluded.last_line,
        updated_at = CURRENT_TIMESTAMP
      WHERE excluded.last_line > file_state.last_line
    `);
    this.db.transaction(() => {
      for (const u of updates) stmt.run(u.fileName, u.lines);
    })();

    log.info(`Fast-forwarded ${updates.length} file(s). Monitoring will start from current position.`);
    return updates.length;
  }

  fileCount(): number {
    return getTrackedFileCount(this.db);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private importLegacyState(legacyPath: string): void {
    if (!existsSync(legacyPath)) return;

    let entries: [string, number][];
    try {
      const parsed: unknown = JSON.parse(readFileSync(legacyPath, "utf-8"));
      if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
        throw new Error("expected an object of file names to line numbers");
      }
      entries = Object.entries(parsed).flatMap(([file, line]): [string, number][] =>
        typeof line === "number" && Number.isInteger(line) && line >= 0 ? [[file, line]] : [],
      );
    } catch (err) {
      log.warn(`Could not migrate from ${LEGACY_STATE_FILE}: ${describeError(err)}`);
      return;
    }
    if (entries.length === 0) return;

    if (this.fileCount() > 0) {
      log.info(`Cursor state already migrated, archiving ${LEGACY_STATE_FILE} without importing it`);
    } else {
      log.info(`Migrating ${entries.length} entries from ${LEGACY_STATE_FILE}...`);
      const stmt = this.db.prepare("INSERT OR REPLACE INTO file_state (file_name, last_line) VALUES (?, ?)");
      this.db.transaction(() => {
        for (const [file, line] of entries) stmt.run(file, line);
      })();
    }

    const backupPath = legacyPath.replace(/\.json$/, ".json.bak");
    renameSync(legacyPath, backupPath);
    log.info(`Legacy ${LEGACY_STATE_FILE} backed up to ${backupPath}`);
  }
}
