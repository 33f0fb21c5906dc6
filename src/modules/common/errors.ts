/** A caller mistake, answered with its status and message. */
export abstract class RequestError extends Error {
  abstract readonly status: 400 | 404;
}

export class ValidationError extends RequestError {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** The request names a member or book that does not exist. */
export class NotFoundError extends RequestError {
  readonly status = 404;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
