/**
 * Application error hierarchy.
 * Handlers throw these; the error-handler middleware maps them to JSON envelopes.
 * LLM failures are not in here: they travel as values (see providers/ILlmProvider).
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

/**
 * A structural assumption about the catalog or derived data broke,
 * e.g. a domain with no questions. Never expected at runtime.
 */
export class InvariantViolationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVARIANT_VIOLATION', message, 500, details);
  }
}

/** Raised at startup for unusable environment configuration. */
export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
