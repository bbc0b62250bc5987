import type { SourceKind } from './record.js';

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly isOperational: boolean;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Validation Error: ${message}`, context);
  }
}

/**
 * A single record that cannot take part in matching. Collected per run and
 * reported in the batch summary; never thrown across the batch.
 */
export class InvalidRecordError extends AppError {
  readonly statusCode = 422;
  readonly isOperational = true;

  constructor(
    readonly source: SourceKind,
    readonly recordId: string,
    readonly issues: string[]
  ) {
    super(`Invalid ${source} record ${recordId}: ${issues.join('; ')}`, {
      source,
      recordId,
      issues,
    });
  }
}

export class StoreError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Store Error: ${message}`, context);
  }
}

export class IndexBuildError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = false;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Index Build Error: ${message}`, context);
  }
}
