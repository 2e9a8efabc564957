import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "path";
import { tmpdir } from "os";
import { appendFileSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { CursorTracker } from "../../src/db/cursor.js";
import { EventStore } from "../../src/db/database.js";
import { NoSinkError } from "../../src/errors.js";
import { IngestionPipeline } from "../../src/ingest/pipeline.js";
import type { PipelineOptions } from "../../src/ingest/pipeline.js";
import { Outbox } from "../../src/sync/outbox.js";
import { SECRET_SENTINEL } from "../../src/redact/classifier.js";
import type { GitContext } from "../../src/git/resolver.js";

const USER = '{"type":"user","sessionId":"s1","message":{"role":"user","content":"hello"}}';
const ASSISTANT = '{"type":"assistant","sessionId":"s1","message":{"content":[{"type":"text","text":"hi there"}]}}';
const AWS_KEY = "AKIA" + "TESTKEY".padEnd(16, "X");
const SECRET_LINE = JSON.stringify({
  type: "user",
  message: { role: "user", content: [{ type: "text", text: `my key is ${AWS_KEY}` }] },
});

let dir: string;
let root: string;
let store: EventStore;
let cursor: CursorTracker;
let gitCalls: string[];

const noGit = async (cwd: string): Promise<GitContext | null> => {
  gitCalls.push(cwd);
  return null;
};

function pipeline(overrides: Partial<PipelineOptions> = {}): IngestionPipeline {
  return new IngestionPipeline({ root, cursor, store, resolveGit: noGit, ...overrides });
}

function write(name: string, text: string): string {
  const path = join(root, name);
  mkdirSync(join(path, ".."), { recursive: true });
  writeFileSync(path, text);
  return path;
}

function storedLines(): { line_number: number; event_data: string }[] {
  return store.db.prepare("SELECT line_number, event_data FROM events ORDER BY line_number").all() as {
    line_number: number;
    event_data: string;
  }[];
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "session-shipper-pipeline-"));
  root = join(dir, "projects");
  mkdirSync(root, { recursive: true });
  store = new EventStore(join(dir, "events.db"), "tester");
  cursor = new CursorTracker(store.db);
  gitCalls = [];
});

afterEach(() => {
  store.close();
  rmSync(dir, { recursive: true, force: true });
});

describe("IngestionPipeline", () => {
  it("stores good lines, skips a malformed one and advances past all three", async () => {
    const path = write("a.jsonl", `${USER}\nnot json at all\n${ASSISTANT}\n`);

    const result = await pipeline().processFile(path);

    expect(result).toEqual({ fileName: "a.jsonl", newLines: 3, stored: 2, skipped: 1, lastLine: 3 });
    expect(storedLines()).toEqual([
      { line_number: 1, event_data: USER },
      { line_number: 3, event_data: ASSISTANT },
    ]);
    expect(cursor.getLastLine("a.jsonl")).toBe(3);
    expect(store.syncStats()).toEqual({ total: 2, synced: 0, pending: 2 });
  });

  it("re-ingesting an unchanged file changes nothing", async () => {
    const path = write("proj/s.jsonl", `${USER}\n${ASSISTANT}\n`);
    const p = pipeline();
    await p.processFile(path);

    const again = await p.processFile(path);

    expect(again).toEqual({ fileName: "proj/s.jsonl", newLines: 0, stored: 0, skipped: 0, lastLine: 2 });
    expect(storedLines()).toHaveLength(2);
    expect(cursor.getLastLine("proj/s.jsonl")).toBe(2);
  });

  it("reads only lines appended since the last pass", async () => {
    const path = write("s.jsonl", `${USER}\n`);
    const p = pipeline();
    await p.processFile(path);
    appendFileSync(path, `${ASSISTANT}\n`);

    const result = await p.processFile(path);

    expect(result).toEqual({ fileName: "s.jsonl", newLines: 1, stored: 1, skipped: 0, lastLine: 2 });
    expect(storedLines().map((r) => r.line_number)).toEqual([1, 2]);
  });

  it("yields exactly one row per line after a crash between insert and cursor write", async () => {
    class CrashingCursor extends CursorTracker {
      setLastLine(): void {
        throw new Error("simulated crash");
      }
    }
    const path = write("s.jsonl", `${USER}\n${ASSISTANT}\n${USER}\n`);

    await expect(pipeline({ cursor: new CrashingCursor(store.db) }).processFile(path)).rejects.toThrow("simulated crash");
    expect(storedLines()).toHaveLength(3);
    expect(cursor.getLastLine("s.jsonl")).toBe(0);

    const result = await pipeline().processFile(path);
    expect(result?.lastLine).toBe(3);
    expect(storedLines()).toHaveLength(3);
  });

  it("leaves the cursor alone when the batch write fails", async () => {
    const separateCursor = CursorTracker.open(join(dir, "cursors.db"));
    try {
      const path = write("s.jsonl", `${USER}\n`);
      const p = pipeline({ cursor: separateCursor });
      store.close();

      await expect(p.processFile(path)).rejects.toThrow();
      expect(separateCursor.getLastLine("s.jsonl")).toBe(0);
    } finally {
      separateCursor.close();
    }
  });

  it("stores the payload byte-for-byte even when it holds a secret", async () => {
    const path = write("s.jsonl", `${SECRET_LINE}\n`);
    await pipeline().processFile(path);
    expect(storedLines()).toEqual([{ line_number: 1, event_data: SECRET_LINE }]);
  });

  it("counts blank lines toward the cursor", async () => {
    const path = write("s.jsonl", `${USER}\n\n   \n${ASSISTANT}\n`);
    const result = await pipeline().processFile(path);
    expect(result).toEqual({ fileName: "s.jsonl", newLines: 4, stored: 2, skipped: 2, lastLine: 4 });
    expect(storedLines().map((r) => r.line_number)).toEqual([1, 4]);
  });

  it("waits for an unterminated last line to be completed", async () => {
    const path = write("s.jsonl", `${USER}\n{"type":"assis`);
    const p = pipeline();

    const first = await p.processFile(path);
    expect(first).toEqual({ fileName: "s.jsonl", newLines: 1, stored: 1, skipped: 0, lastLine: 1 });

    appendFileSync(path, `tant"}\n`);
    const second = await p.processFile(path);
    expect(second).toEqual({ fileName: "s.jsonl", newLines: 1, stored: 1, skipped: 0, lastLine: 2 });
    expect(storedLines()[1]).toEqual({ line_number: 2, event_data: '{"type":"assistant"}' });
  });

  it("takes an unterminated last line that already parses", async () => {
    const path = write("s.jsonl", `${USER}\n${ASSISTANT}`);
    const result = await pipeline().processFile(path);
    expect(result?.lastLine).toBe(2);
  });

  it("resolves git context once, from the first event with a cwd", async () => {
    const calls: string[] = [];
    const resolveGit = async (cwd: string): Promise<GitContext | null> => {
      calls.push(cwd);
      return { remoteUrl: "https://example.com/team/repo.git", commitHash: "0123abcd" };
    };
    const path = write("s.jsonl", [
      '{"type":"summary","summary":"x"}',
      '{"type":"user","cwd":"/work/repo","message":{"content":"a"}}',
      '{"type":"user","cwd":"/work/other","message":{"content":"b"}}',
    ].join("\n") + "\n");

    await pipeline({ resolveGit }).processFile(path);

    expect(calls).toEqual(["/work/repo"]);
    const rows = store.db.prepare("SELECT DISTINCT git_remote_url, git_commit_hash FROM events").all();
    expect(rows).toEqual([{ git_remote_url: "https://example.com/team/repo.git", git_commit_hash: "0123abcd" }]);
  });

  it("does not look up git when no event has a cwd", async () => {
    const path = write("s.jsonl", `${USER}\n`);
    await pipeline().processFile(path);
    expect(gitCalls).toEqual([]);
  });

  it("ignores files that are not .jsonl or no longer exist", async () => {
    const p = pipeline();
    expect(await p.processFile(write("notes.txt", `${USER}\n`))).toBeNull();
    expect(await p.processFile(join(root, "gone.jsonl"))).toBeNull();
  });

  it("skips files outside the project filter", async () => {
    const p = pipeline({ debugFilterProject: "proj-a" });
    expect(await p.processFile(write("proj-b/s.jsonl", `${USER}\n`))).toBeNull();
    expect((await p.processFile(write("proj-a/s.jsonl", `${USER}\n`)))?.stored).toBe(1);
  });

  it("tracks a new empty file at line 0", async () => {
    const path = write("empty.jsonl", "");
    const result = await pipeline().processFile(path);
    expect(result).toEqual({ fileName: "empty.jsonl", newLines: 0, stored: 0, skipped: 0, lastLine: 0 });
    expect(cursor.fileCount()).toBe(1);
  });

  it("uses the base name for files outside the root", async () => {
    const outside = join(dir, "elsewhere");
    mkdirSync(outside);
    const path = join(outside, "loose.jsonl");
    writeFileSync(path, `${USER}\n`);
    expect((await pipeline().processFile(path))?.fileName).toBe("loose.jsonl");
  });

  it("quarantines malformed lines when asked to", async () => {
    const quarantinePath = join(dir, "quarantine.jsonl");
    const path = write("q.jsonl", `${USER}\n[1,2]\n`);

    await pipeline({ malformedLines: "quarantine", quarantinePath }).processFile(path);

    const entries = readFileSync(quarantinePath, "utf-8").trim().split("\n").map((l) => JSON.parse(l) as Record<string, unknown>);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      file_name: "q.jsonl",
      line_number: 2,
      reason: "expected a JSON object, got array",
      line: "[1,2]",
    });
    expect(cursor.getLastLine("q.jsonl")).toBe(2);
  });

  it("still skips a malformed line when the quarantine file cannot be written", async () => {
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "");
    const path = write("q.jsonl", `not json\n${USER}\n`);

    const result = await pipeline({ malformedLines: "quarantine", quarantinePath: join(blocker, "quarantine.jsonl") }).processFile(path);

    expect(result).toEqual({ fileName: "q.jsonl", newLines: 2, stored: 1, skipped: 1, lastLine: 2 });
  });

  it("requires a quarantine path for the quarantine policy", () => {
    expect(() => pipeline({ malformedLines: "quarantine" })).toThrow(/quarantinePath/);
  });

  it("requires somewhere to put events", () => {
    expect(() => new IngestionPipeline({ root, cursor, store: null })).toThrow(NoSinkError);
  });
});

describe("IngestionPipeline without a store", () => {
  it("queues redacted copies in the outbox and advances the cursor", async () => {
    const outbox = new Outbox(cursor.db);
    const path = write("s.jsonl", `${SECRET_LINE}\n${USER}\n`);

    const result = await pipeline({ store: null, outbox }).processFile(path);

    expect(result).toEqual({ fileName: "s.jsonl", newLines: 2, stored: 2, skipped: 0, lastLine: 2 });
    expect(storedLines()).toEqual([]);
    const [userEvent, secretEvent] = outbox.getUnsynced(10);
    expect(userEvent.eventData).toEqual(JSON.parse(USER));
    expect(secretEvent.eventData).toEqual({
      type: "user",
      message: { role: "user", content: [{ type: "text", text: SECRET_SENTINEL }] },
    });
    expect(cursor.getLastLine("s.jsonl")).toBe(2);
  });
});
