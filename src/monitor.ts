/**
 * Wires the shipper together: store, cursor, pipeline, watcher and the
 * optional sync worker. Owns startup order and shutdown.
 */

import Database from "better-sqlite3";
import { dirname, join } from "path";
import { NoSinkError } from "./errors.js";
import { describeError, log } from "./log.js";
import { CursorTracker } from "./db/cursor.js";
import { openEventStore } from "./db/database.js";
import type { EventStore, SyncSource } from "./db/database.js";
import { IngestionPipeline } from "./ingest/pipeline.js";
import { Outbox } from "./sync/outbox.js";
import { RemoteClient } from "./sync/client.js";
import type { RemoteCollector } from "./sync/client.js";
import { SyncWorker } from "./sync/worker.js";
import { FileWatcher } from "./watch/watcher.js";
import { DEFAULT_DATA_DIR } from "./config/loader.js";
import type { AppConfig } from "./config/schema.js";
import type { GitResolver } from "./git/resolver.js";

export const QUARANTINE_FILE = "quarantine.jsonl";
export const PENDING_DB = "pending.db";

export interface MonitorOptions {
  config: AppConfig;
  skipBacklog?: boolean;
  /** Replaces the HTTP client, e.g. in tests. */
  collector?: RemoteCollector;
  resolveGit?: GitResolver;
  awaitWriteFinish?: boolean;
  /**
   * Where cursors and queued events go when the event store cannot open.
   * Independent of the database path, which may be what failed.
   */
  dataDir?: string;
}

/**
 * Cursor database for store-less runs. Falls back to memory, for this run
 * only, when the data directory is unusable too.
 */
function openFallbackCursor(dataDir: string): CursorTracker {
  const path = join(dataDir, PENDING_DB);
  try {
    return CursorTracker.open(path);
  } catch (err) {
    log.warn(`Could not open ${path} (${describeError(err)}); cursors and queued events are kept in memory for this run`);
    return new CursorTracker(new Database(":memory:"));
  }
}

export class Monitor {
  readonly store: EventStore | null;
  readonly cursor: CursorTracker;
  readonly outbox: Outbox | null;
  readonly pipeline: IngestionPipeline;
  readonly watcher: FileWatcher;
  private readonly config: AppConfig;
  private readonly skipBacklog: boolean;
  private readonly collector: RemoteCollector | null;
  private readonly healthCheck: (() => Promise<boolean>) | null;
  private worker: SyncWorker | null = null;
  private stopped = false;

  constructor(options: MonitorOptions) {
    const { config } = options;
    this.config = config;
    this.skipBacklog = options.skipBacklog ?? false;

    const apiEnabled = config.api.enabled;
    if (options.collector) {
      this.collector = options.collector;
      this.healthCheck = null;
    } else if (apiEnabled) {
      const client = new RemoteClient({ url: config.api.url, apiKey: config.api.apiKey, timeoutMs: config.api.timeoutMs });
      this.collector = client;
      this.healthCheck = () => client.healthCheck();
    } else {
      this.collector = null;
      this.healthCheck = null;
      log.info("Remote API recording is disabled");
    }

    const dbPath = config.sqlite.databasePath;
    const dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
    this.store = config.sqlite.enabled ? openEventStore(dbPath, config.sqlite.userName) : null;
    if (!this.store && !this.collector) {
      throw new NoSinkError();
    }

    if (this.store) {
      this.cursor = new CursorTracker(this.store.db);
      this.outbox = null;
    } else {
      log.warn("Local recording disabled; events are queued for the remote collector only");
      this.cursor = openFallbackCursor(dataDir);
      this.outbox = new Outbox(this.cursor.db);
    }

    this.pipeline = new IngestionPipeline({
      root: config.monitor.conversationDir,
      cursor: this.cursor,
      store: this.store,
      outbox: this.outbox,
      resolveGit: options.resolveGit,
      debugFilterProject: config.monitor.debugFilterProject,
      malformedLines: config.monitor.malformedLines,
      quarantinePath: join(this.store ? dirname(dbPath) : dataDir, QUARANTINE_FILE),
    });
    this.watcher = new FileWatcher({
      root: config.monitor.conversationDir,
      pipeline: this.pipeline,
      awaitWriteFinish: options.awaitWriteFinish,
    });

    const destinations: string[] = [];
    if (this.collector) destinations.push(`remote (${config.api.url || "custom collector"})`);
    if (this.store) destinations.push(`local (${dbPath})`);
    log.info(`Recording destinations: ${destinations.join(", ")}`);
  }

  get syncSource(): SyncSource | null {
    return this.store ?? this.outbox;
  }

  get syncWorker(): SyncWorker | null {
    return this.worker;
  }

  /**
   * Sweep and start watching; start syncing when a collector is configured.
   */
  async start(): Promise<void> {
    const root = this.config.monitor.conversationDir;
    log.info(`Monitoring: ${root}`);
    if (this.config.monitor.debugFilterProject) {
      log.info(`Only processing files under: ${this.config.monitor.debugFilterProject}`);
    }

    if (this.skipBacklog) {
      this.cursor.fastForwardAll(root, this.config.monitor.debugFilterProject);
    }

    if (this.collector) {
      if (this.healthCheck && !(await this.healthCheck())) {
        log.warn("Remote API is not reachable yet; events will sync once it is");
      }
      const source = this.syncSource;
      if (source) {
        const sync = this.config.sync;
        this.worker = new SyncWorker({
          source,
          collector: this.collector,
          batchSize: sync.batchSize,
          idleMs: sync.idleMs,
          throttleMs: sync.throttleMs,
          initialBackoffMs: sync.initialBackoffMs,
          maxBackoffMs: sync.maxBackoffMs,
          stopTimeoutMs: sync.stopTimeoutMs,
        });
        this.worker.start();
      }
    }

    await this.watcher.start();
  }

  /**
   * Stop watching, let queued files finish, stop the worker, close storage.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    log.info("Shutting down...");
    await this.watcher.close();
    if (this.worker) await this.worker.stop();
    const queued = this.outbox?.size ?? 0;
    if (queued > 0) {
      if (this.cursor.db.memory) {
        log.warn(`${queued} event(s) were never synced and are lost`);
      } else {
        log.info(`${queued} event(s) still queued; they will be sent on the next start`);
      }
    }
    this.cursor.close();
    this.store?.close();
    log.info("Stopped");
  }
}
