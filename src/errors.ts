/**
 * Error taxonomy for a sync run.
 *
 * Fatal errors (ConfigError, FeedFetchError, a whole-feed FeedParseError) abort the run.
 * Per-entry FeedParseErrors and ApiErrors are recorded per event and never stop the batch.
 */
export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SyncError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.problems = problems;
  }
}

export class FeedFetchError extends SyncError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Could not read feed ${source}: ${message}`, options);
    this.source = source;
  }
}

export class FeedParseError extends SyncError {
  /** UID of the offending entry, when one could be read */
  readonly uid: string | null;

  constructor(message: string, uid: string | null = null) {
    super(message);
    this.uid = uid;
  }
}

export class ApiError extends SyncError {
  readonly status: number;
  readonly body: string;
  readonly method: string;
  readonly path: string;
  /** Wait requested by the server through Retry-After, in milliseconds */
  readonly retryAfterMs: number | null;

  constructor(method: string, path: string, status: number, body: string, retryAfterMs: number | null = null) {
    super(`${method} ${path} failed: ${status} ${body}`);
    this.method = method;
    this.path = path;
    this.status = status;
    this.body = body;
    this.retryAfterMs = retryAfterMs;
  }

  /** 429 and 5xx are worth retrying; any other 4xx is a client or auth error. */
  get isTransient(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
