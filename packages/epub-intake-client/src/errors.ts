export class EpubIntakeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly raw?: unknown,
  ) {
    super(message);
    this.name = 'EpubIntakeError';
    Object.setPrototypeOf(this, EpubIntakeError.prototype);
  }
}

export class AuthenticationError extends EpubIntakeError {
  constructor(message = 'Invalid or missing API key', raw?: unknown) {
    super(message, 'UNAUTHORIZED', 401, raw);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class InvalidRequestError extends EpubIntakeError {
  constructor(message: string, code = 'INVALID_REQUEST', raw?: unknown) {
    super(message, code, 400, raw);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export class MethodNotAllowedError extends EpubIntakeError {
  constructor(message = 'Method not allowed', raw?: unknown) {
    super(message, 'METHOD_NOT_ALLOWED', 405, raw);
    this.name = 'MethodNotAllowedError';
    Object.setPrototypeOf(this, MethodNotAllowedError.prototype);
  }
}

export class ServerError extends EpubIntakeError {
  constructor(message: string, code: string, statusCode = 500, raw?: unknown) {
    super(message, code, statusCode, raw);
    this.name = 'ServerError';
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}
