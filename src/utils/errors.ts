/**
 * Error hierarchy for the tracker sync.
 *
 * - ConfigurationError: something the user has to set up first (API key,
 *   tracker client, a config value). Raised before any remote call is made.
 * - TransportError: a single remote call failed (HTTP status, GraphQL error
 *   payload, timeout, unexpected response shape).
 */
export class TaskHeaderError extends Error {
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { cause?: unknown; context?: Record<string, unknown> },
  ) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.context = options?.context;
  }
}

export class ConfigurationError extends TaskHeaderError {}

export class TransportError extends TaskHeaderError {
  public readonly status?: number;

  constructor(
    message: string,
    options?: { cause?: unknown; context?: Record<string, unknown>; status?: number },
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `code` of a Node system error (ENOENT, EEXIST, ...), if any. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
