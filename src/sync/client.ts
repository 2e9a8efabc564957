/**
 * HTTP client for the remote event collector.
 */

import { RemoteError } from "../errors.js";
import { describeError, log } from "../log.js";
import { VERSION } from "../version.js";
import type { JsonObject } from "../ingest/extract.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const LEGACY_ENTRYPOINT = "/api.php";
const MAX_ERROR_BODY = 500;

/** Body of POST /events. */
export interface RemoteEventPayload {
  file_name: string;
  line_number: number;
  event_data: JsonObject;
  git_remote_url?: string | null;
  git_commit_hash?: string | null;
}

/**
 * Anything the sync worker can hand events to.
 */
export interface RemoteCollector {
  /** Must reject promptly once `signal` aborts. */
  submitEvent(payload: RemoteEventPayload, signal?: AbortSignal): Promise<void>;
}

export interface RemoteClientOptions {
  url: string;
  apiKey: string;
  timeoutMs?: number;
}

export class RemoteClient implements RemoteCollector {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private endpoint: string;

  constructor(options: RemoteClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, "");
    this.endpoint = this.baseUrl;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /** Base URL requests currently go to. */
  get currentEndpoint(): string {
    return this.endpoint;
  }

  /**
   * GET /health. If that fails and the URL is not already the PHP entry
   * point, try <url>/api.php and keep using it when it answers.
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.request("GET", this.endpoint, "/health");
      log.info(`Connected to API server: ${this.endpoint}`);
      return true;
    } catch (err) {
      if (!this.endpoint.endsWith(LEGACY_ENTRYPOINT)) {
        const fallback = `${this.baseUrl}${LEGACY_ENTRYPOINT}`;
        try {
          await this.request("GET", fallback, "/health");
          this.endpoint = fallback;
          log.info(`Connected to API server: ${this.endpoint}`);
          return true;
        } catch (fallbackErr) {
          log.debug(`Health check via ${fallback} failed: ${describeError(fallbackErr)}`);
        }
      }
      log.warn(`Could not connect to remote API: ${describeError(err)}`);
      return false;
    }
  }

  /**
   * POST one event. Resolves on any 2xx; throws RemoteError otherwise,
   * including when `signal` aborts the request.
   */
  async submitEvent(payload: RemoteEventPayload, signal?: AbortSignal): Promise<void> {
    await this.request("POST", this.endpoint, "/events", payload, signal);
  }

  private async request(
    method: "GET" | "POST",
    base: string,
    path: string,
    body?: RemoteEventPayload,
    signal?: AbortSignal,
  ): Promise<string> {
    const url = `${base}${path}`;
    const timeout = AbortSignal.timeout(this.timeoutMs);
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          "X-API-Key": this.apiKey,
          "Content-Type": "application/json",
          "Accept": "application/json",
          "User-Agent": `session-shipper/${VERSION}`,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      throw new RemoteError(`${method} ${url} failed: ${describeError(err)}`, 0);
    }

    const text = await response.text().catch((err: unknown) => `<unreadable body: ${describeError(err)}>`);
    if (!response.ok) {
      throw new RemoteError(
        `${method} ${url} returned ${response.status} ${response.statusText}`,
        response.status,
        text.slice(0, MAX_ERROR_BODY),
      );
    }
    return text;
  }
}
