export default class ApiError extends Error {
  public statusCode: number;

  public details?: unknown;

  public code?: string;

  constructor(statusCode: number, message: string, details?: unknown, code?: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.details = details;
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError);
    }
  }

  static notFound(resource: string, id: string): ApiError {
    return new ApiError(404, `${resource} not found`, { id }, 'NOT_FOUND');
  }

  static conflict(message: string, code: string, details?: unknown): ApiError {
    return new ApiError(409, message, details, code);
  }
}
