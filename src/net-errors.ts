/**
 * Network error classifier.
 *
 * Separates transient transport failures (worth a reconnect or a retry at
 * the supervisor) from permanent ones. Shared by the websocket supervisor,
 * the Matrix sync loop and the heartbeat pinger.
 */

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "EPIPE",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ECONNABORTED",
  "ERR_NETWORK",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const TRANSIENT_ERROR_NAMES = new Set([
  "AbortError",
  "TimeoutError",
  "TransientNetworkError",
]);

const TRANSIENT_MESSAGE_SNIPPETS = [
  "socket hang up",
  "network error",
  "getaddrinfo",
  "timeout",
  "timed out",
  "unexpected server response: 5",
];

function prop(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function getErrorCode(err: unknown): string | undefined {
  const code = prop(err, "code");
  if (typeof code === "string") return code;
  const errno = prop(err, "errno");
  if (typeof errno === "string") return errno;
  return undefined;
}

function getErrorName(err: unknown): string {
  const name = prop(err, "name");
  return name === undefined ? "" : String(name);
}

export function formatErrorMessage(err: unknown): string {
  if (!err) return "";
  if (typeof err === "string") return err;
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Walk the error chain: err -> err.cause -> err.reason -> err.errors[].
 * AggregateError from dual-stack connects lands in errors[].
 */
function collectErrorCandidates(err: unknown): unknown[] {
  const queue = [err];
  const seen = new Set<unknown>();
  const candidates: unknown[] = [];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current == null || seen.has(current)) continue;
    seen.add(current);
    candidates.push(current);

    const cause = prop(current, "cause");
    if (cause && !seen.has(cause)) queue.push(cause);

    const reason = prop(current, "reason");
    if (reason && typeof reason === "object" && !seen.has(reason)) queue.push(reason);

    const errors = prop(current, "errors");
    if (Array.isArray(errors)) {
      for (const nested of errors) {
        if (nested && !seen.has(nested)) queue.push(nested);
      }
    }
  }

  return candidates;
}

/**
 * True if the error is a transient network failure. Message matching can be
 * turned off where a message snippet could hide a real delivery error.
 */
export function isTransientNetworkError(
  err: unknown,
  options: { allowMessageMatch?: boolean } = {},
): boolean {
  if (!err) return false;
  const allowMessageMatch = options.allowMessageMatch ?? true;

  for (const candidate of collectErrorCandidates(err)) {
    const code = getErrorCode(candidate)?.trim().toUpperCase();
    if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

    const name = getErrorName(candidate);
    if (name && TRANSIENT_ERROR_NAMES.has(name)) return true;

    if (allowMessageMatch) {
      const message = formatErrorMessage(candidate).toLowerCase();
      if (message && TRANSIENT_MESSAGE_SNIPPETS.some((s) => message.includes(s))) return true;
    }
  }

  return false;
}

/**
 * HTTP status carried by an axios-style error (`err.response.status`), if any.
 */
export function httpStatusOf(err: unknown): number | undefined {
  const status = prop(prop(err, "response"), "status");
  return typeof status === "number" ? status : undefined;
}
