/**
 * Workday Signals - Error Utilities
 *
 * Standardized error handling for the analyzers and the API.
 */

import type { RejectedInput } from '../types/common';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class SignalsError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(
    code: string,
    message: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SignalsError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.timestamp = Date.now();

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// SPECIFIC ERROR TYPES
// =============================================================================

/**
 * Request payload does not match its schema
 */
export class ValidationError extends SignalsError {
  public readonly field?: string;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, { ...details, field });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * A single event, work item or day window carries a malformed or missing
 * timestamp or an impossible span. Names the offending item.
 */
export class InvalidInputError extends SignalsError {
  public readonly itemId: string;
  public readonly field?: string;

  constructor(itemId: string, message: string, field?: string) {
    super('INVALID_INPUT', `${itemId}: ${message}`, 422, { itemId, field });
    this.name = 'InvalidInputError';
    this.itemId = itemId;
    this.field = field;
  }

  toRejected(): RejectedInput {
    return { itemId: this.itemId, field: this.field, message: this.message };
  }
}

export class NotFoundError extends SignalsError {
  public readonly resource: string;

  constructor(resource: string) {
    super('NOT_FOUND', `${resource} not found`, 404, { resource });
    this.name = 'NotFoundError';
    this.resource = resource;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

export function isSignalsError(error: unknown): error is SignalsError {
  return error instanceof SignalsError;
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

/**
 * Wrap unknown errors in SignalsError
 */
export function wrapError(error: unknown): SignalsError {
  if (isSignalsError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SignalsError('INTERNAL_ERROR', error.message, 500, {
      originalName: error.name,
    });
  }

  return new SignalsError('INTERNAL_ERROR', String(error), 500);
}
