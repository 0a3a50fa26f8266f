export interface ApiError extends Error {
  statusCode?: number;
}

// Rejected request payload, reported as HTTP 400
export class ValidationError extends Error implements ApiError {
  readonly statusCode = 400;

  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}
