/**
 * Error taxonomy for the intake core.
 *
 * Session and extraction errors are recovered inside the conductor; only
 * BadRequestError and RequestAbortedError ever reach a handler response.
 */

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'internal_error',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string = 'Solicitud inválida') {
    super(message, 400, 'bad_request');
  }
}

export class RequestAbortedError extends AppError {
  constructor(message: string = 'Request aborted before completion') {
    super(message, 504, 'request_aborted');
  }
}

/** The session store could not be read or written. */
export class SessionUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 503, 'session_unavailable', { cause });
  }
}

/** The conditional write lost against a concurrent writer. */
export class SessionVersionConflictError extends AppError {
  constructor(userId: string, expectedVersion: number | null) {
    super(
      `Session for ${userId} changed since version ${expectedVersion ?? 'none'}`,
      409,
      'session_version_conflict',
    );
  }
}

/** The model call failed, timed out or returned output we could not parse. */
export class ExtractionFailedError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, 'extraction_failed', { cause });
  }
}
