// ──────────────────────────────────────────
// Shared error types
// ──────────────────────────────────────────

export class ValidationError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/** Raised by the CSV reader when a file cannot be read as a table at all. */
export class NotTabularError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotTabularError';
  }
}

export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
