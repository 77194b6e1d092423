/**
 * Error types for the negotiation core.
 *
 * Only failures the caller must act on are thrown. Policy violations, compliance blocks and
 * generator failures are data and never surface as exceptions.
 */

import { z, ZodError, type ZodTypeAny } from 'zod';

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_STATE = 'INVALID_STATE',
  PERSISTENCE_FAILED = 'PERSISTENCE_FAILED',
  TURN_CANCELLED = 'TURN_CANCELLED',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly retryable: boolean = false,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed or unknown caller input. Nothing has been mutated when this is thrown.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCode.VALIDATION_ERROR) {
    super(message, code, false, details);
    this.name = 'ValidationError';
  }

  static notFound(entity: string, id: string): ValidationError {
    return new ValidationError(`${entity} ${id} not found`, { entity, id }, ErrorCode.NOT_FOUND);
  }

  static fromZod(error: ZodError): ValidationError {
    const { message, fields } = mapZodError(error);
    return new ValidationError(message, { fields });
  }
}

/**
 * A transactional write failed and was rolled back. Safe to retry the whole operation.
 */
export class PersistenceError extends AppError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, ErrorCode.PERSISTENCE_FAILED, true);
    this.name = 'PersistenceError';
  }
}

export class TurnCancelledError extends AppError {
  constructor(conversationId: string) {
    super(`Turn for conversation ${conversationId} was cancelled`, ErrorCode.TURN_CANCELLED, true, { conversationId });
    this.name = 'TurnCancelledError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Maps Zod validation errors to field messages
 */
export function mapZodError(error: ZodError): { message: string; fields: Record<string, string[]> } {
  const fields: Record<string, string[]> = {};

  error.issues.forEach(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    if (!fields[path]) {
      fields[path] = [];
    }

    let message = issue.message;
    switch (issue.code) {
      case 'invalid_type':
        message = issue.received === 'undefined' ? 'Required.' : `Invalid format. Expected ${issue.expected}.`;
        break;
      case 'too_small':
        if (issue.type === 'string') {
          message = `Must be at least ${issue.minimum} characters.`;
        } else if (issue.type === 'number') {
          message = `Must be at least ${issue.minimum}.`;
        }
        break;
      case 'too_big':
        if (issue.type === 'string') {
          message = `Must be at most ${issue.maximum} characters.`;
        } else if (issue.type === 'number') {
          message = `Must be at most ${issue.maximum}.`;
        }
        break;
    }

    fields[path].push(message);
  });

  const keys = Object.keys(fields);
  const message = keys.length === 1
    ? `${keys[0]}: ${fields[keys[0]][0]}`
    : `Please correct ${keys.length} validation errors.`;

  return { message, fields };
}

/**
 * Parse caller input, throwing a ValidationError with field messages on failure
 */
export function parseInput<S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}
