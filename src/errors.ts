/**
 * Error types surfaced by the shipper.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Neither the local store nor remote sync can take events.
 */
export class NoSinkError extends Error {
  constructor(message = "No recording destination available: local store failed to open and remote sync is disabled") {
    super(message);
    this.name = "NoSinkError";
  }
}

export class RemoteError extends Error {
  /** HTTP status, or 0 for network errors and timeouts. */
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body = "") {
    super(message);
    this.name = "RemoteError";
    this.status = status;
    this.body = body;
  }

  /** The collector refused our key; retrying will not help until it changes. */
  get permanent(): boolean {
    return this.status === 401 || this.status === 403;
  }
}
