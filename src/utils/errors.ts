export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

/**
 * An error that maps directly onto an HTTP response.
 * `detail` is sent to the client as `{ "detail": ... }`.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly detail: string | ValidationIssue[],
    message: string = typeof detail === 'string' ? detail : 'Request validation failed'
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class NotFoundError extends HttpError {
  constructor(detail: string) {
    super(404, detail);
    this.name = 'NotFoundError';
  }
}

// Roster conflicts are published as 400, not 409
export class ConflictError extends HttpError {
  constructor(detail: string) {
    super(400, detail);
    this.name = 'ConflictError';
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(readonly allow: string) {
    super(405, 'Method Not Allowed');
    this.name = 'MethodNotAllowedError';
  }
}

export class ValidationError extends HttpError {
  constructor(readonly issues: ValidationIssue[]) {
    super(422, issues);
    this.name = 'ValidationError';
  }
}

export const isHttpError = (error: unknown): error is HttpError => error instanceof HttpError;
