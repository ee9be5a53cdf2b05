/** Bad volume, feed type, limit, date or configuration. The caller must correct the input. */
export class ValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationError";
  }
}

/** A time expression that could not be understood. The caller must rephrase it. */
export class TimeParseError extends Error {
  readonly expression: string;

  constructor(expression: string, message?: string) {
    super(message ?? `Could not understand the time "${expression}"`);
    this.name = "TimeParseError";
    this.expression = expression;
  }
}

/** The store is unreachable or corrupt. The operation was aborted without a partial write. */
export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** Relay session failed. Handled inside the gateway by reconnecting. */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }
}

/** The spawned tool process died or could not be started. */
export class ProcessError extends Error {
  readonly exitCode: number | null;
  readonly signal: string | null;

  constructor(
    message: string,
    details: { exitCode?: number | null; signal?: string | null } = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ProcessError";
    this.exitCode = details.exitCode ?? null;
    this.signal = details.signal ?? null;
  }
}

/** Errors a tool reports back to the agent as a structured, recoverable result */
export type ToolFacingError = ValidationError | TimeParseError | StorageError;

export function isToolFacingError(err: unknown): err is ToolFacingError {
  return (
    err instanceof ValidationError ||
    err instanceof TimeParseError ||
    err instanceof StorageError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
