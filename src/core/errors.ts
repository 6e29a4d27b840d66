/**
 * killfeed Error Handling
 * Errors raised by the store itself. Driver errors are passed through as-is.
 */

import { ZodError } from 'zod';

// ============================================================================
// ERROR CODES
// ============================================================================

export const ErrorCodes = {
  // Lookups
  NOT_FOUND: 'NOT_FOUND',

  // Lifecycle
  NOT_CONNECTED: 'NOT_CONNECTED',

  // Result handling
  ROW_SCAN_ERROR: 'ROW_SCAN_ERROR',
  STATEMENT_ERROR: 'STATEMENT_ERROR',

  // Entities
  INVALID_ENTITY: 'INVALID_ENTITY',

  // Input
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR'
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class StoreError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

/** Zero rows where exactly one was expected */
export class NotFoundError extends StoreError {
  constructor(resource: string, id?: number | string, details?: Record<string, unknown>) {
    super(
      ErrorCodes.NOT_FOUND,
      id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`,
      details
    );
    this.name = 'NotFoundError';
  }
}

export class NotConnectedError extends StoreError {
  constructor() {
    super(ErrorCodes.NOT_CONNECTED, 'Store is not connected; call connect() first');
    this.name = 'NotConnectedError';
  }
}

/** A result row that does not match its metadata */
export class RowScanError extends StoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.ROW_SCAN_ERROR, message, details);
    this.name = 'RowScanError';
  }
}

export class StatementError extends StoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.STATEMENT_ERROR, message, details);
    this.name = 'StatementError';
  }
}

export class InvalidEntityError extends StoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_ENTITY, message, details);
    this.name = 'InvalidEntityError';
  }
}

export class ValidationError extends StoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.VALIDATION_ERROR, message, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends StoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.CONFIG_ERROR, message, details);
    this.name = 'ConfigError';
  }

  static fromZod(error: ZodError): ConfigError {
    const issues = error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    const summary = issues.map(i => `${i.path || '(root)'}: ${i.message}`).join('; ');
    return new ConfigError(`Invalid configuration: ${summary}`, { issues });
  }
}
