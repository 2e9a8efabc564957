/**
 * Ingestion pipeline: turns the new lines of one session file into stored
 * events and advances that file's cursor.
 *
 * The cursor only moves after the batch write has landed. Malformed and
 * blank lines still count toward it, so a bad line is never retried.
 */

import { appendFileSync, existsSync, mkdirSync } from "fs";
import { readFile } from "fs/promises";
import { dirname } from "path";
import { NoSinkError } from "../errors.js";
import { describeError, log } from "../log.js";
import { redactEvent } from "../redact/redact.js";
import { classify } from "../redact/classifier.js";
import type { Classifier } from "../redact/classifier.js";
import { resolveGitContext } from "../git/resolver.js";
import type { GitContext, GitResolver } from "../git/resolver.js";
import type { CursorTracker } from "../db/cursor.js";
import type { EventStore, NewEvent } from "../db/database.js";
import type { Outbox } from "../sync/outbox.js";
import type { MalformedLinePolicy } from "../config/schema.js";
import { parseEventLine } from "./extract.js";
import type { JsonObject } from "./extract.js";
import { fileIdentity, isJsonlPath, splitLines } from "./files.js";

export interface PipelineOptions {
  /** Watched root; file identities are relative to it. */
  root: string;
  cursor: CursorTracker;
  store?: EventStore | null;
  /** Used when there is no store. */
  outbox?: Outbox | null;
  resolveGit?: GitResolver;
  classifier?: Classifier;
  debugFilterProject?: string | null;
  malformedLines?: MalformedLinePolicy;
  /** Required when malformedLines is "quarantine". */
  quarantinePath?: string;
}

export interface ProcessResult {
  fileName: string;
  /** Lines read past the cursor in this pass. */
  newLines: number;
  stored: number;
  /** Blank and malformed lines. */
  skipped: number;
  /** Cursor after the pass. */
  lastLine: number;
}

interface ParsedEntry {
  lineNumber: number;
  raw: string;
  event: JsonObject;
}

export class IngestionPipeline {
  private readonly root: string;
  private readonly cursor: CursorTracker;
  private readonly store: EventStore | null;
  private readonly outbox: Outbox | null;
  private readonly resolveGit: GitResolver;
  private readonly classifier: Classifier;
  private readonly filter: string | null;
  private readonly malformedLines: MalformedLinePolicy;
  private readonly quarantinePath: string | null;

  constructor(options: PipelineOptions) {
    this.store = options.store ?? null;
    this.outbox = options.outbox ?? null;
    if (!this.store && !this.outbox) throw new NoSinkError();

    this.malformedLines = options.malformedLines ?? "skip";
    this.quarantinePath = options.quarantinePath ?? null;
    if (this.malformedLines === "quarantine" && !this.quarantinePath) {
      throw new Error("quarantinePath is required when malformed lines are quarantined");
    }

    this.root = options.root;
    this.cursor = options.cursor;
    this.resolveGit = options.resolveGit ?? ((dir) => resolveGitContext(dir));
    this.classifier = options.classifier ?? classify;
    this.filter = options.debugFilterProject ?? null;
  }

  /**
   * Ingest whatever was appended to a file since the last pass. Returns null
   * when the file is not ours to read (wrong suffix, gone, filtered out).
   * A failed batch write leaves the cursor where it was and rethrows.
   */
  async processFile(path: string): Promise<ProcessResult | null> {
    if (!isJsonlPath(path) || !existsSync(path)) return null;

    const fileName = fileIdentity(this.root, path);
    if (this.filter && !fileName.startsWith(this.filter)) return null;

    const lastLine = this.cursor.getLastLine(fileName);

    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }

    const lines = splitLines(text);
    const newLines = lines.slice(lastLine);
    // An unterminated last line that does not parse yet is still being
    // written; leave it for the next pass.
    if (newLines.length > 0 && !text.endsWith("\n")) {
      const tail = newLines[newLines.length - 1].trim();
      if (tail && !parseEventLine(tail).ok) {
        log.debug(`Waiting for the rest of line ${lastLine + newLines.length} in ${fileName}`);
        newLines.pop();
      }
    }
    if (newLines.length === 0) {
      // Track empty files so they show up as seen.
      if (lastLine === 0 && lines.length === 0) this.cursor.setLastLine(fileName, 0);
      return { fileName, newLines: 0, stored: 0, skipped: 0, lastLine };
    }

    log.info(`Processing ${newLines.length} new line(s) from ${fileName}`);

    const parsed: ParsedEntry[] = [];
    let skipped = 0;
    newLines.forEach((line, idx) => {
      const lineNumber = lastLine + idx + 1;
      const trimmed = line.trim();
      if (!trimmed) {
        skipped++;
        return;
      }
      const result = parseEventLine(trimmed);
      if (!result.ok) {
        log.warn(`Invalid JSON at ${fileName}:${lineNumber}: ${result.reason}`);
        skipped++;
        this.quarantine(fileName, lineNumber, line, result.reason);
        return;
      }
      parsed.push({ lineNumber, raw: line, event: result.event });
    });
    const finalLine = lastLine + newLines.length;

    const git = await this.gitContextFor(parsed);
    const stored = this.write(fileName, parsed, git);

    this.cursor.setLastLine(fileName, finalLine);

    if (stored > 0) {
      log.info(`Stored ${stored} event(s) from ${fileName}${this.outbox && !this.store ? " (queued for sync)" : ""}`);
    }
    return { fileName, newLines: newLines.length, stored, skipped, lastLine: finalLine };
  }

  private async gitContextFor(entries: ParsedEntry[]): Promise<GitContext | null> {
    const withCwd = entries.find((e) => typeof e.event.cwd === "string" && e.event.cwd.length > 0);
    const cwd = withCwd?.event.cwd;
    if (typeof cwd !== "string") return null;
    return this.resolveGit(cwd);
  }

  private write(fileName: string, entries: ParsedEntry[], git: GitContext | null): number {
    if (entries.length === 0) return 0;
    const gitRemoteUrl = git?.remoteUrl ?? null;
    const gitCommitHash = git?.commitHash ?? null;

    if (this.store) {
      const batch: NewEvent[] = entries.map((e) => ({
        fileName,
        lineNumber: e.lineNumber,
        raw: e.raw,
        event: e.event,
        gitRemoteUrl,
        gitCommitHash,
      }));
      return this.store.insertBatch(batch);
    }

    if (this.outbox) {
      return this.outbox.enqueue(entries.map((e) => ({
        fileName,
        lineNumber: e.lineNumber,
        eventData: redactEvent(e.event, this.classifier),
        gitRemoteUrl,
        gitCommitHash,
      })));
    }
    return 0;
  }

  private quarantine(fileName: string, lineNumber: number, line: string, reason: string): void {
    if (this.malformedLines !== "quarantine" || !this.quarantinePath) return;
    // The line is skipped either way; a failed write only loses the copy.
    try {
      mkdirSync(dirname(this.quarantinePath), { recursive: true });
      appendFileSync(
        this.quarantinePath,
        JSON.stringify({ file_name: fileName, line_number: lineNumber, reason, line, quarantined_at: new Date().toISOString() }) + "\n",
      );
    } catch (err) {
      log.error(`Could not quarantine ${fileName}:${lineNumber} to ${this.quarantinePath}: ${describeError(err)}`);
    }
  }
}
