export class FormatsServiceError extends Error {
  public readonly statusCode: number;

  public readonly code: string;

  constructor(message: string, statusCode: number, code: string, cause?: unknown) {
    super(message);
    this.name = 'FormatsServiceError';
    this.statusCode = statusCode;
    this.code = code;
    this.cause = cause;
  }
}

export class FormatsUnavailableError extends FormatsServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, 'FORMATS_UNAVAILABLE', cause);
    this.name = 'FormatsUnavailableError';
  }
}

export class FormatsTimeoutError extends FormatsServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 504, 'FORMATS_TIMEOUT', cause);
    this.name = 'FormatsTimeoutError';
  }
}

export class FormatsResponseError extends FormatsServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, 'FORMATS_BAD_RESPONSE', cause);
    this.name = 'FormatsResponseError';
  }
}
