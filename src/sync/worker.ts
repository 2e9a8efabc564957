/**
 * Background loop that forwards unsynced events to the remote collector.
 *
 * Each poll takes a batch of pending events, redacts and posts them one at a
 * time, and acknowledges each success in the source. Stopping aborts the
 * request in flight. Any failure ends the
 * batch and doubles the backoff up to its cap; a success resets it.
 */

import { RemoteError } from "../errors.js";
import { describeError, log } from "../log.js";
import { redactEvent } from "../redact/redact.js";
import { classify } from "../redact/classifier.js";
import type { Classifier } from "../redact/classifier.js";
import type { PendingEvent, SyncSource } from "../db/database.js";
import type { RemoteCollector, RemoteEventPayload } from "./client.js";

export interface SyncWorkerOptions {
  source: SyncSource;
  collector: RemoteCollector;
  classifier?: Classifier;
  batchSize?: number;
  idleMs?: number;
  throttleMs?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  stopTimeoutMs?: number;
}

/** What one poll did: sent its batch, found nothing, or hit a failure. */
export type PollOutcome = "sent" | "idle" | "failed";

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted || ms <= 0) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

export function toPayload(event: PendingEvent, classifier: Classifier): RemoteEventPayload {
  return {
    file_name: event.fileName,
    line_number: event.lineNumber,
    event_data: redactEvent(event.eventData, classifier),
    git_remote_url: event.gitRemoteUrl,
    git_commit_hash: event.gitCommitHash,
  };
}

export class SyncWorker {
  private readonly source: SyncSource;
  private readonly collector: RemoteCollector;
  private readonly classifier: Classifier;
  private readonly batchSize: number;
  private readonly idleMs: number;
  private readonly throttleMs: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly stopTimeoutMs: number;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private backoff: number;
  private failures = 0;
  private sentTotal = 0;

  constructor(options: SyncWorkerOptions) {
    this.source = options.source;
    this.collector = options.collector;
    this.classifier = options.classifier ?? classify;
    this.batchSize = options.batchSize ?? 50;
    this.idleMs = options.idleMs ?? 60_000;
    this.throttleMs = options.throttleMs ?? 100;
    this.initialBackoffMs = options.initialBackoffMs ?? 100;
    this.maxBackoffMs = options.maxBackoffMs ?? 300_000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5_000;
    this.backoff = this.initialBackoffMs;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /** Delay applied after the most recent failure. */
  get backoffMs(): number {
    return this.backoff;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get sent(): number {
    return this.sentTotal;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    log.info("Background sync worker started");
    this.loop = this.run(controller.signal)
      .catch((err: unknown) => {
        log.error(`Sync worker stopped unexpectedly: ${describeError(err)}`);
      })
      .finally(() => {
        this.loop = null;
        this.controller = null;
      });
  }

  /**
   * Ask the loop to exit and wait for it. Resolves false if it is still
   * busy (an in-flight request) when the timeout passes.
   */
  async stop(timeoutMs = this.stopTimeoutMs): Promise<boolean> {
    const loop = this.loop;
    if (!loop) return true;
    this.controller?.abort();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const exited = await Promise.race([loop.then(() => true), timedOut]);
    clearTimeout(timer);

    if (exited) log.info("Background sync worker stopped");
    else log.warn(`Sync worker did not stop within ${timeoutMs}ms`);
    return exited;
  }

  /**
   * One poll of the source. On failure the backoff is raised but not slept.
   */
  async pollOnce(signal: AbortSignal = new AbortController().signal): Promise<PollOutcome> {
    let events: PendingEvent[];
    try {
      events = this.source.getUnsynced(this.batchSize);
    } catch (err) {
      log.error(`Could not read unsynced events: ${describeError(err)}`);
      this.recordFailure();
      return "failed";
    }
    if (events.length === 0) return "idle";

    log.debug(`Syncing ${events.length} event(s) to remote API`);
    for (const event of events) {
      if (signal.aborted) break;
      try {
        await this.collector.submitEvent(toPayload(event, this.classifier), signal);
      } catch (err) {
        if (signal.aborted) {
          log.debug(`Sync of event ${event.id} interrupted by shutdown; it stays unsynced`);
          return "failed";
        }
        this.reportSendFailure(event, err);
        this.recordFailure();
        return "failed";
      }

      try {
        this.source.markSynced(event.id);
      } catch (err) {
        log.error(`Could not mark event ${event.id} as synced: ${describeError(err)}`);
        this.recordFailure();
        return "failed";
      }
      this.sentTotal++;
      this.backoff = this.initialBackoffMs;
      this.failures = 0;
      await sleep(this.throttleMs, signal);
    }
    return "sent";
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const outcome = await this.pollOnce(signal);
      if (outcome === "idle") await sleep(this.idleMs, signal);
      else if (outcome === "failed") await sleep(this.backoff, signal);
    }
  }

  private recordFailure(): void {
    this.failures++;
    this.backoff = Math.min(this.backoff * 2, this.maxBackoffMs);
  }

  private reportSendFailure(event: PendingEvent, err: unknown): void {
    if (err instanceof RemoteError && err.permanent) {
      log.warn(
        `Remote collector rejected the API key (HTTP ${err.status}); event ${event.id} stays unsynced. Check api.apiKey in the config.`,
      );
      return;
    }
    log.warn(`Failed to sync event ${event.id} (${event.fileName}:${event.lineNumber}): ${describeError(err)}`);
  }
}
