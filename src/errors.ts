export type ErrorCode =
  | 'INVALID_INTERVAL'
  | 'NOT_FOUND'
  | 'DUPLICATE_ID'
  | 'PERSISTENCE_FAILURE'
  | 'ALREADY_CLOCKED_IN'
  | 'NOT_CLOCKED_IN';

export class TimecardError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** endTime is not strictly after startTime. */
export class InvalidIntervalError extends TimecardError {
  readonly startTime: string;
  readonly endTime: string;

  constructor(startTime: string, endTime: string) {
    super('INVALID_INTERVAL', `[record] end ${endTime} must be after start ${startTime}`);
    this.startTime = startTime;
    this.endTime = endTime;
  }
}

export class NotFoundError extends TimecardError {
  constructor(what: string) {
    super('NOT_FOUND', `[store] not found: ${what}`);
  }
}

export class PersistenceError extends TimecardError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('PERSISTENCE_FAILURE', `[persist] failed to write ${path}: ${describeError(cause)}`, {
      cause,
    });
    this.path = path;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
