export class IntakeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IntakeError';
    Object.setPrototypeOf(this, IntakeError.prototype);
  }
}

export class MethodError extends IntakeError {
  constructor() {
    super('Method not allowed', 'METHOD_NOT_ALLOWED', 405);
    this.name = 'MethodError';
    Object.setPrototypeOf(this, MethodError.prototype);
  }
}

export class AuthError extends IntakeError {
  constructor() {
    super('Invalid API key', 'UNAUTHORIZED', 401);
    this.name = 'AuthError';
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

export class DecodeError extends IntakeError {
  constructor(cause?: unknown) {
    super('File too large or invalid form', 'INVALID_FORM', 400, { cause });
    this.name = 'DecodeError';
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

export class MissingFileError extends IntakeError {
  constructor() {
    super('Failed to get uploaded file', 'MISSING_FILE', 400);
    this.name = 'MissingFileError';
    Object.setPrototypeOf(this, MissingFileError.prototype);
  }
}

export class ExtensionError extends IntakeError {
  constructor() {
    super('File must be an EPUB', 'INVALID_EXTENSION', 400);
    this.name = 'ExtensionError';
    Object.setPrototypeOf(this, ExtensionError.prototype);
  }
}

export class InvalidFilenameError extends IntakeError {
  constructor() {
    super('Invalid filename', 'INVALID_FILENAME', 400);
    this.name = 'InvalidFilenameError';
    Object.setPrototypeOf(this, InvalidFilenameError.prototype);
  }
}

/** The destination file could not be opened; nothing was written. */
export class StorageCreateError extends IntakeError {
  constructor(cause: unknown) {
    super('Failed to save file', 'STORAGE_CREATE_FAILED', 500, { cause });
    this.name = 'StorageCreateError';
    Object.setPrototypeOf(this, StorageCreateError.prototype);
  }
}

/** The copy failed after the destination was opened; the partial file has been discarded. */
export class StorageWriteError extends IntakeError {
  constructor(cause: unknown) {
    super('Failed to save file', 'STORAGE_WRITE_FAILED', 500, { cause });
    this.name = 'StorageWriteError';
    Object.setPrototypeOf(this, StorageWriteError.prototype);
  }
}

export class NotFoundError extends IntakeError {
  constructor(method: string, path: string) {
    super(`Route ${method} ${path} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
