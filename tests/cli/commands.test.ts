import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "path";
import { tmpdir } from "os";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { EventStore } from "../../src/db/database.js";
import { parseConfig } from "../../src/config/loader.js";
import { repoName, runSearch } from "../../src/cli/search.js";
import { runStatus } from "../../src/cli/status.js";
import { runSkipBacklog } from "../../src/cli/skip-backlog.js";
import { CursorTracker } from "../../src/db/cursor.js";
import type { JsonObject } from "../../src/ingest/extract.js";

let dir: string;
let dbPath: string;
let output: string[];

function seed(): void {
  const store = new EventStore(dbPath, "tester");
  const events: JsonObject[] = [
    { type: "user", sessionId: "s1", gitBranch: "main", timestamp: "2025-03-01T09:00:00Z", message: { content: "rotate the webhook secret" } },
    { type: "assistant", sessionId: "s1", timestamp: "2025-03-01T09:00:05Z", message: { content: [{ type: "text", text: "Done" }] } },
  ];
  store.insertBatch(events.map((event, i) => ({
    fileName: "proj/s1.jsonl",
    lineNumber: i + 1,
    raw: JSON.stringify(event),
    event,
    gitRemoteUrl: "https://example.com/team/shop.git",
    gitCommitHash: "abc",
  })));
  store.close();
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "session-shipper-cli-"));
  dbPath = join(dir, "events.db");
  output = [];
  vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
    output.push(String(line ?? ""));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe("runStatus", () => {
  it("reports counts and the latest session", () => {
    seed();
    runStatus(parseConfig({ sqlite: { databasePath: dbPath } }), join(dir, "config.json"));

    expect(output).toContain("  Events:        2");
    expect(output).toContain("  Synced:        0");
    expect(output).toContain("  Pending:       2");
    expect(output).toContain("  Tracked files: 0");
    expect(output).toContain("\nLatest session: s1 (proj/s1.jsonl)");
    expect(output).toContain("  Messages:      1 user, 1 assistant, 2 events");
    expect(output).toContain("  Repository:    https://example.com/team/shop.git (main)");
  });

  it("says so when there is no database", () => {
    runStatus(parseConfig({ sqlite: { databasePath: dbPath } }), join(dir, "config.json"));
    expect(output[output.length - 1]).toBe("\nNo database found. Run 'session-shipper run' first.");
  });
});

describe("runSearch", () => {
  it("prints matching messages", () => {
    seed();
    runSearch({ dbPath, query: "webhook" });

    expect(output).toEqual([
      'Search results for "webhook":\n',
      "  [1] 2025-03-01 09:00:00 (user) shop proj/s1.jsonl:1",
      "       rotate the webhook secret",
    ]);
  });

  it("reports an empty result", () => {
    seed();
    runSearch({ dbPath, query: "kubernetes" });
    expect(output).toEqual(["No results found for 'kubernetes'."]);
  });
});

describe("repoName", () => {
  it("takes the last path segment without .git", () => {
    expect(repoName("https://example.com/team/shop.git")).toBe("shop");
    expect(repoName("git@example.com:team/shop")).toBe("shop");
  });
});

describe("runSkipBacklog", () => {
  it("fast-forwards cursors without storing events", () => {
    const root = join(dir, "projects");
    mkdirSync(join(root, "proj"), { recursive: true });
    writeFileSync(join(root, "proj", "s.jsonl"), '{"type":"user"}\n{"type":"assistant"}\n');

    const count = runSkipBacklog(parseConfig({ monitor: { conversationDir: root }, sqlite: { databasePath: dbPath } }));

    expect(count).toBe(1);
    expect(output).toEqual(["Fast-forwarded 1 file(s)."]);
    const store = new EventStore(dbPath, "tester");
    try {
      expect(new CursorTracker(store.db).getLastLine("proj/s.jsonl")).toBe(2);
      expect(store.syncStats().total).toBe(0);
    } finally {
      store.close();
    }
  });
});
