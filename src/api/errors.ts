/**
 * Analytics API errors
 *
 * Every error thrown by the client or a resource extends ClientError,
 * so callers can catch the whole family or branch on a specific kind.
 */

export class ClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClientError";
  }
}

/** Server answered 400, or a required argument was missing before any request was made */
export class InvalidRequestError extends ClientError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

/** Server answered 404 */
export class NotFoundError extends ClientError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** Network failure or a non-2xx status without a more specific error */
export class TransportError extends ClientError {
  status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "TransportError";
    this.status = options?.status;
  }
}

export class TimeoutError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "TimeoutError";
  }
}
