/**
 * Error taxonomy shared by services and routes. The global error handler in
 * app.ts maps each class onto an HTTP status.
 */

/** Caller supplied something unusable. Nothing was changed. */
export class InputError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 400) {
    super(message);
    this.name = 'InputError';
    this.statusCode = statusCode;
  }

  static notFound(what: string, id: string): InputError {
    return new InputError(`${what} not found: ${id}`, 404);
  }
}

/**
 * A collaborator returned output that could not be used. Recovered locally
 * by the caller and never surfaced over HTTP.
 */
export class GenerationFailure extends Error {
  readonly request: string;

  constructor(request: string, message: string) {
    super(`${request}: ${message}`);
    this.name = 'GenerationFailure';
    this.request = request;
  }
}

/** Stored records violate a structural invariant (e.g. an item without progress). */
export class InconsistentStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InconsistentStateError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
