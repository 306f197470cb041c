export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: number | string) {
    super(404, 'NOT_FOUND', `${resource} with id ${id} not found`);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * A persisted baseline or daily-record file could not be parsed. Never
 * replaced with defaults: the file holds history that cannot be rebuilt.
 */
export class MalformedPersistedStateError extends AppError {
  constructor(
    public filePath: string,
    reason: string
  ) {
    super(500, 'MALFORMED_PERSISTED_STATE', `Malformed persisted state in ${filePath}: ${reason}`, {
      filePath,
    });
    this.name = 'MalformedPersistedStateError';
  }
}

/** One device endpoint failed after retries. */
export class SourceUnavailableError extends AppError {
  constructor(
    public source: string,
    cause: string
  ) {
    super(502, 'SOURCE_UNAVAILABLE', `Source ${source} unavailable: ${cause}`, { source });
    this.name = 'SourceUnavailableError';
  }
}
