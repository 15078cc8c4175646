/**
 * Bridge error taxonomy.
 *
 * Expected misses (cache miss, unknown correlation) are `null` returns, not
 * errors. These classes cover real failures so callers can tell a transient
 * transport problem from a rejection that must not be retried.
 */

export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Stream closed, HTTP timeout, connection refused. Retried at the supervisor. */
export class TransientNetworkError extends BridgeError {}

/** The remote answered with a 4xx other than "too long". Never retried. */
export class RemoteRejectedError extends BridgeError {
  constructor(
    message: string,
    readonly status: number,
    readonly detail?: string,
  ) {
    super(message);
  }
}

/** The remote refused the content as too long. Resending unmodified is pointless. */
export class TooLongError extends BridgeError {}

/** A frame from the push stream failed JSON parsing or schema validation. */
export class FrameValidationError extends BridgeError {
  constructor(
    message: string,
    readonly raw: string,
  ) {
    super(message);
  }
}

/** An attachment could not be fetched, even after the proxy URL retry. */
export class DownloadFailedError extends BridgeError {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Configuration is missing or malformed. Raised at startup. */
export class ConfigError extends BridgeError {}
