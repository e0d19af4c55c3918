import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError } from '@/lib/errors/error';
import type { CommandResult } from './types';

function excerpt(text: string, limit = 500): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

function looksLikeAuthFailure(text: string): boolean {
  const lower = text.toLowerCase();
  return (
    lower.includes('all configured authentication methods failed') ||
    lower.includes('authentication failed') ||
    lower.includes('permission denied')
  );
}

/**
 * True when the HMC rejected the listing itself (resource subtype or attribute unknown at this
 * firmware level) rather than failing to run it.
 */
export function looksLikeUnsupportedListing(stderr: string): boolean {
  const lower = stderr.toLowerCase();
  return (
    lower.includes('not supported') ||
    lower.includes('is not valid') ||
    lower.includes('invalid attribute') ||
    lower.includes('invalid parameter') ||
    lower.includes('unknown attribute') ||
    lower.includes('rsubtype')
  );
}

/** The listing ran but this HMC level does not offer it. */
export function toHmcCapabilityError(result: CommandResult, stage: string): AppError {
  return {
    code: ErrorCode.HMC_CAPABILITY_UNSUPPORTED,
    category: 'capability',
    message: 'hmc listing not supported',
    retryable: false,
    redacted_context: { stage, exit_code: result.exitCode, stderr_excerpt: excerpt(result.stderr) },
  };
}

export function toHmcCommandError(result: CommandResult, stage: string): AppError {
  const context = { stage, exit_code: result.exitCode, stderr_excerpt: excerpt(result.stderr) };

  if (result.transport === 'aborted') {
    return { code: ErrorCode.RUN_CANCELLED, category: 'cancelled', message: 'run cancelled', retryable: true };
  }

  if (result.transport === 'timeout') {
    return {
      code: ErrorCode.HMC_TIMEOUT,
      category: 'network',
      message: 'hmc command timed out',
      retryable: true,
      redacted_context: context,
    };
  }

  if (result.transport === 'connect') {
    if (looksLikeAuthFailure(result.stderr)) {
      return {
        code: ErrorCode.HMC_AUTH_FAILED,
        category: 'auth',
        message: 'hmc authentication failed',
        retryable: false,
        redacted_context: context,
      };
    }
    return {
      code: ErrorCode.HMC_NETWORK_ERROR,
      category: 'network',
      message: 'hmc unreachable',
      retryable: true,
      redacted_context: context,
    };
  }

  return {
    code: ErrorCode.HMC_COMMAND_FAILED,
    category: 'unknown',
    message: 'hmc command failed',
    retryable: false,
    redacted_context: context,
  };
}
