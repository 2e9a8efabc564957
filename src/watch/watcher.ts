/**
 * Watches the session directory and feeds changed .jsonl files to the
 * ingestion pipeline, one file at a time.
 */

import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import { existsSync } from "fs";
import { describeError, log } from "../log.js";
import { isJsonlPath, listJsonlFiles } from "../ingest/files.js";
import type { ProcessResult } from "../ingest/pipeline.js";
import { Semaphore } from "../util/semaphore.js";

export interface FileProcessor {
  processFile(path: string): Promise<ProcessResult | null>;
}

export interface FileWatcherOptions {
  root: string;
  pipeline: FileProcessor;
  /** Wait for writes to settle before reporting a change. */
  awaitWriteFinish?: boolean;
  usePolling?: boolean;
}

export class FileWatcher {
  private readonly root: string;
  private readonly pipeline: FileProcessor;
  private readonly awaitWriteFinish: boolean;
  private readonly usePolling: boolean;
  private readonly queue = new Semaphore(1);
  private readonly inflight = new Set<Promise<void>>();
  private watcher: FSWatcher | null = null;

  constructor(options: FileWatcherOptions) {
    this.root = options.root;
    this.pipeline = options.pipeline;
    this.awaitWriteFinish = options.awaitWriteFinish ?? true;
    this.usePolling = options.usePolling ?? false;
  }

  /**
   * Watch for additions and changes, then sweep existing files. Writes made
   * while the sweep runs are queued behind it. Resolves once the sweep is
   * done.
   */
  async start(): Promise<void> {
    if (this.watcher) return;
    if (!existsSync(this.root)) {
      log.warn(`Conversation directory does not exist yet: ${this.root}`);
    }

    const watcher = chokidar.watch(this.root, {
      persistent: true,
      ignoreInitial: true,
      usePolling: this.usePolling,
      awaitWriteFinish: this.awaitWriteFinish ? { stabilityThreshold: 100, pollInterval: 50 } : false,
    });
    this.watcher = watcher;

    const onChange = (path: string) => {
      if (!isJsonlPath(path)) return;
      log.debug(`Detected change: ${path}`);
      void this.enqueue(path);
    };
    watcher
      .on("add", onChange)
      .on("change", onChange)
      .on("error", (error) => log.error(`Watcher error for ${this.root}: ${describeError(error)}`));

    await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
    log.info(`Watching: ${this.root}`);

    const count = await this.sweep();
    log.info(`Processed ${count} existing file(s)`);
  }

  /**
   * Run every .jsonl file under the root through the pipeline in path
   * order. Returns the number of files visited.
   */
  async sweep(): Promise<number> {
    const files = listJsonlFiles(this.root);
    for (const path of files) {
      await this.enqueue(path);
    }
    return files.length;
  }

  /**
   * Queue one file. The returned promise settles when it has been processed;
   * it never rejects.
   */
  enqueue(path: string): Promise<void> {
    const task = this.queue.run(() => this.process(path));
    this.inflight.add(task);
    void task.finally(() => this.inflight.delete(task));
    return task;
  }

  /** Resolves once nothing is queued or running. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  async close(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
    await this.idle();
  }

  private async process(path: string): Promise<void> {
    try {
      await this.pipeline.processFile(path);
    } catch (err) {
      log.error(`Error processing ${path}: ${describeError(err)}`);
    }
  }
}
