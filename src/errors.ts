/**
 * Application error hierarchy. The Express error middleware renders any
 * AppError with its own status code and machine-readable code.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly isOperational: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed input, such as a MAC address without exactly 12 hex digits. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class DuplicateError extends AppError {
  constructor(message: string) {
    super(message, 409, 'DUPLICATE_DEVICE');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

/**
 * The magic packet could not be handed to the local network stack.
 * Absence of this error does not mean the target woke up.
 */
export class WakeSendError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, 'WOL_SEND_FAILED', true, { cause });
  }
}
