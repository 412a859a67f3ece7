/**
 * Typed error class for failures that abort an operation.
 * Expected outcomes (missing task, bad form input) use result unions instead.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CONFIG_ERROR'
  | 'AUTH_ERROR';

export class DuetrackError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'DuetrackError';
    this.code = code;
  }

  static notFound(entity: string, id: string | number): DuetrackError {
    return new DuetrackError('NOT_FOUND', `${entity} not found: ${id}`);
  }

  static validation(message: string): DuetrackError {
    return new DuetrackError('VALIDATION_ERROR', message);
  }

  static config(message: string): DuetrackError {
    return new DuetrackError('CONFIG_ERROR', message);
  }

  static auth(message: string): DuetrackError {
    return new DuetrackError('AUTH_ERROR', message);
  }
}
