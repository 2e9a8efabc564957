import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "path";
import { tmpdir } from "os";
import { appendFileSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { FileWatcher } from "../../src/watch/watcher.js";
import type { FileProcessor } from "../../src/watch/watcher.js";
import type { ProcessResult } from "../../src/ingest/pipeline.js";

class RecordingProcessor implements FileProcessor {
  readonly calls: string[] = [];
  active = 0;
  maxActive = 0;
  failOn: string | null = null;
  onProcess: ((path: string) => void) | null = null;

  async processFile(path: string): Promise<ProcessResult | null> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await new Promise((resolve) => setTimeout(resolve, 5));
      this.calls.push(path);
      this.onProcess?.(path);
      if (this.failOn && path.endsWith(this.failOn)) throw new Error("disk full");
      return null;
    } finally {
      this.active--;
    }
  }
}

let root: string;
let processor: RecordingProcessor;
let watcher: FileWatcher | null;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "session-shipper-watch-"));
  processor = new RecordingProcessor();
  watcher = null;
});

afterEach(async () => {
  if (watcher) await watcher.close();
  rmSync(root, { recursive: true, force: true });
});

describe("FileWatcher.sweep", () => {
  it("visits existing .jsonl files in path order", async () => {
    mkdirSync(join(root, "b"));
    mkdirSync(join(root, "a"));
    writeFileSync(join(root, "b", "2.jsonl"), "");
    writeFileSync(join(root, "a", "1.jsonl"), "");
    writeFileSync(join(root, "a", "notes.md"), "");
    watcher = new FileWatcher({ root, pipeline: processor });

    expect(await watcher.sweep()).toBe(2);
    expect(processor.calls).toEqual([join(root, "a", "1.jsonl"), join(root, "b", "2.jsonl")]);
  });

  it("yields nothing for a missing root", async () => {
    watcher = new FileWatcher({ root: join(root, "missing"), pipeline: processor });
    expect(await watcher.sweep()).toBe(0);
  });
});

describe("FileWatcher.enqueue", () => {
  it("processes one file at a time", async () => {
    watcher = new FileWatcher({ root, pipeline: processor });
    await Promise.all([
      watcher.enqueue(join(root, "x.jsonl")),
      watcher.enqueue(join(root, "y.jsonl")),
      watcher.enqueue(join(root, "x.jsonl")),
    ]);
    expect(processor.maxActive).toBe(1);
    expect(processor.calls).toEqual([join(root, "x.jsonl"), join(root, "y.jsonl"), join(root, "x.jsonl")]);
  });

  it("keeps going after a file fails", async () => {
    processor.failOn = "bad.jsonl";
    watcher = new FileWatcher({ root, pipeline: processor });

    await expect(watcher.enqueue(join(root, "bad.jsonl"))).resolves.toBeUndefined();
    await watcher.enqueue(join(root, "good.jsonl"));
    expect(processor.calls).toEqual([join(root, "bad.jsonl"), join(root, "good.jsonl")]);
  });

  it("idle waits for queued work", async () => {
    watcher = new FileWatcher({ root, pipeline: processor });
    void watcher.enqueue(join(root, "a.jsonl"));
    void watcher.enqueue(join(root, "b.jsonl"));
    await watcher.idle();
    expect(processor.calls).toHaveLength(2);
  });
});

describe("FileWatcher.start", () => {
  it("sweeps, then picks up new and appended files", async () => {
    const existing = join(root, "old.jsonl");
    writeFileSync(existing, '{"type":"user"}\n');
    watcher = new FileWatcher({ root, pipeline: processor, awaitWriteFinish: false, usePolling: true });

    await watcher.start();
    expect(processor.calls).toEqual([existing]);

    const created = join(root, "new.jsonl");
    writeFileSync(created, '{"type":"user"}\n');
    writeFileSync(join(root, "ignored.txt"), "x\n");
    await vi.waitFor(() => expect(processor.calls).toContain(created), { timeout: 5_000, interval: 50 });

    const before = processor.calls.filter((p) => p === existing).length;
    appendFileSync(existing, '{"type":"assistant"}\n');
    await vi.waitFor(
      () => expect(processor.calls.filter((p) => p === existing).length).toBeGreaterThan(before),
      { timeout: 5_000, interval: 50 },
    );

    await watcher.close();
    watcher = null;
    expect(processor.calls.some((p) => p.endsWith(".txt"))).toBe(false);
  });

  it("catches files written while the sweep is running", async () => {
    const existing = join(root, "old.jsonl");
    const late = join(root, "late.jsonl");
    writeFileSync(existing, '{"type":"user"}\n');
    processor.onProcess = (path) => {
      if (path === existing) writeFileSync(late, '{"type":"user"}\n');
    };
    watcher = new FileWatcher({ root, pipeline: processor, awaitWriteFinish: false, usePolling: true });

    await watcher.start();

    await vi.waitFor(() => expect(processor.calls).toContain(late), { timeout: 5_000, interval: 50 });
    expect(processor.calls[0]).toBe(existing);
  });
});
