/**
 * Error reporting through Sentry.
 *
 * `initSentry` is called once by the runtime; before that (and in tests) the
 * capture helpers are no-ops on the Sentry side and only log in development.
 */
import * as Sentry from "@sentry/node";
import type { ErrorEvent } from "@sentry/node";

const SECRET_KEYS = /secret|token|password|authorization|api[-_]?key/i;
const REDACTED = "[REDACTED]";

function scrubRecord(record: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!record) return record;
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    output[key] = SECRET_KEYS.test(key) ? REDACTED : value;
  }
  return output;
}

/** Drop credential-looking values from an event before it leaves the process. */
export function scrubSecrets(event: ErrorEvent): ErrorEvent {
  event.extra = scrubRecord(event.extra);
  if (event.request?.headers) {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(event.request.headers)) {
      headers[key] = SECRET_KEYS.test(key) ? REDACTED : value;
    }
    event.request.headers = headers;
  }
  return event;
}

export function initSentry(options: { dsn?: string; environment: string }): boolean {
  if (!options.dsn) return false;

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    tracesSampleRate: 0.1,
    sendDefaultPii: false,
    beforeSend: scrubSecrets,
  });
  return true;
}

/** Flush queued events; used on shutdown. */
export async function flushSentry(timeoutMs = 2_000): Promise<void> {
  await Sentry.flush(timeoutMs);
}

/**
 * Capture an error to Sentry with context.
 * Use in catch blocks to report errors for monitoring.
 */
export function captureError(
  error: unknown,
  context?: { tags?: Record<string, string>; extra?: Record<string, unknown> },
): void {
  if (process.env.NODE_ENV === "development") {
    console.error("[Sentry] Error captured:", error, context);
  }

  Sentry.captureException(error, {
    tags: context?.tags,
    extra: context?.extra,
  });
}
