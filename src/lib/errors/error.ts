import { ErrorCode } from '@/lib/errors/error-codes';

import type { ErrorCodeType } from '@/lib/errors/error-codes';

export type JsonValue = string | number | boolean | null | { [key: string]: JsonValue } | JsonValue[];

export type ErrorCategory =
  | 'auth'
  | 'permission'
  | 'config'
  | 'network'
  | 'parse'
  | 'capability'
  | 'rejected'
  | 'cancelled'
  | 'unknown';

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, JsonValue>;
};

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  // Minimal structural check; codes are not validated here.
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    typeof err.code === 'string' &&
    typeof err.category === 'string' &&
    typeof err.message === 'string' &&
    typeof err.retryable === 'boolean'
  );
}

/** Errors thrown by the HMC and array clients carry the mapped AppError. */
export class AppErrorException extends Error {
  readonly appError: AppError;

  constructor(appError: AppError) {
    super(appError.message);
    this.name = 'AppErrorException';
    this.appError = appError;
  }
}

export function errorCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toAppError(err: unknown, stage: string): AppError {
  if (err instanceof AppErrorException) return err.appError;
  if (isAppError(err)) return err;
  return {
    code: ErrorCode.INTERNAL_ERROR,
    category: 'unknown',
    message: 'Internal error',
    retryable: false,
    redacted_context: { stage, cause: errorCause(err) },
  };
}

export function toPublicError(err: unknown): AppError {
  if (err instanceof AppErrorException) return err.appError;
  if (isAppError(err)) return err;
  return { code: ErrorCode.INTERNAL_ERROR, category: 'unknown', message: 'Internal error', retryable: false };
}
