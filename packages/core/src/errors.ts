/**
 * Custom error classes for the records core
 * These errors carry safe, non-PII messages; patient names never appear in them
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for callers (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid input (malformed date, missing field)
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown, code = 'VALIDATION_ERROR') {
    super(message, code, 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * A key argument of the wrong runtime type
 */
export class InvalidArgumentError extends ValidationError {
  public readonly argument: string;
  public readonly receivedType: string;

  constructor(argument: string, expected: string, received: unknown) {
    const receivedType = received === null ? 'null' : typeof received;
    super(
      `Argument ${argument} must be ${expected}. Received type is ${receivedType}.`,
      undefined,
      'INVALID_ARGUMENT'
    );
    this.name = 'InvalidArgumentError';
    this.argument = argument;
    this.receivedType = receivedType;
  }
}

/**
 * Record names an appointment variant that does not exist, or none at all
 */
export class UnknownVariantError extends AppError {
  public readonly variant: unknown;

  constructor(variant: unknown) {
    super(
      variant === undefined || variant === null
        ? 'Record is missing its appointment type'
        : `Unknown appointment type: ${String(variant)}`,
      'UNKNOWN_VARIANT',
      400
    );
    this.name = 'UnknownVariantError';
    this.variant = variant;
  }
}

/**
 * A stored record that could not be turned back into a patient and appointment
 */
export class RecordCorruptError extends AppError {
  public readonly recordIndex: number;
  public readonly originalError: Error | undefined;

  constructor(recordIndex: number, reason: string, originalError?: Error) {
    super(`Record ${recordIndex} is corrupt: ${reason}`, 'RECORD_CORRUPT', 422);
    this.name = 'RecordCorruptError';
    this.recordIndex = recordIndex;
    this.originalError = originalError;
  }
}

export type StorageOperation = 'read' | 'write';

/**
 * Records file missing its expected shape, unreadable or unwritable
 */
export class StorageUnavailableError extends AppError {
  public readonly path: string;
  public readonly operation: StorageOperation;
  public readonly originalError: Error | undefined;

  constructor(path: string, operation: StorageOperation, message: string, originalError?: Error) {
    super(`Cannot ${operation} records at ${path}: ${message}`, 'STORAGE_UNAVAILABLE', 503);
    this.name = 'StorageUnavailableError';
    this.path = path;
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
