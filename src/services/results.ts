import { ZodError } from 'zod';
import { EntityErrorCode, Result } from '../types';
import logger from '../utils/logger';

/**
 * Builds a failed result and logs it.
 * Domain failures are reported through the result, never thrown.
 */
export function failure<T>(
  code: EntityErrorCode,
  message: string,
  details?: Record<string, unknown>
): Result<T> {
  logger.warn(message, { code, ...details });
  return {
    success: false,
    error: { code, message, details }
  };
}

export function success<T>(data: T): Result<T> {
  return { success: true, data };
}

/** Maps a schema validation error to an INVALID_RECORD result */
export function invalidRecord<T>(error: ZodError): Result<T> {
  const issues = error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message
  }));
  return failure(EntityErrorCode.INVALID_RECORD, getErrorMessage(EntityErrorCode.INVALID_RECORD), {
    issues
  });
}

/**
 * Gets human-readable error message
 */
export function getErrorMessage(code: EntityErrorCode): string {
  const messages: Record<EntityErrorCode, string> = {
    [EntityErrorCode.DUPLICATE_KEY]: 'ID already exists',
    [EntityErrorCode.NOT_FOUND]: 'Record not found',
    [EntityErrorCode.INVALID_REFERENCE]: 'Invalid reference',
    [EntityErrorCode.INVALID_RECORD]: 'Invalid record fields',
    [EntityErrorCode.CORRUPT_STORAGE]: 'Invalid data in document'
  };

  return messages[code];
}
