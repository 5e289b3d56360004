export class ValidationError extends Error {
  constructor(message: string, public statusCode: number = 400) {
    super(message);
    this.name = 'ValidationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends Error {
  constructor(message: string, public statusCode: number = 400) {
    super(message);
    this.name = 'ConfigError';
    Error.captureStackTrace(this, this.constructor);
  }
}

// Raised by primary catalog searches; the scan that triggered it is abandoned.
export class LookupFailure extends Error {
  constructor(
    message: string,
    public path: string,
    public status?: number,
    public originalError?: unknown,
    public statusCode: number = 502
  ) {
    super(message);
    this.name = 'LookupFailure';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
