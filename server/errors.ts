import { ZodError } from "zod";

// Required credential or identifier missing at startup
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure reported by the vector store service or the generation provider.
 * `status` follows HTTP semantics; timeouts are 504 and connection failures 503.
 */
export class RemoteServiceError extends Error {
  readonly status: number;
  readonly operation: string;

  constructor(operation: string, status: number, message: string) {
    super(message);
    this.name = 'RemoteServiceError';
    this.operation = operation;
    this.status = status;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }

  static fromZod(error: ZodError): ValidationError {
    const first = error.issues[0];
    return new ValidationError(first ? first.message : 'Invalid input');
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

// Local and remote state disagree after a partial failure
export class ConsistencyError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConsistencyError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function httpStatusFor(error: unknown): number {
  if (error instanceof ValidationError || error instanceof ZodError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof RemoteServiceError) return 502;
  return 500;
}
