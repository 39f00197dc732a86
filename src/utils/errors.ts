/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - TransientError / PermanentError / FatalError: the retry taxonomy
 * - classifyFailure: maps any thrown value onto the taxonomy
 */

import { createHash } from 'crypto';

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Error codes raised inside the intake pipeline and its collaborators. */
export const ErrorCodes = {
  MAILBOX_IO: 'MAILBOX_IO',
  MESSAGE_UNPARSEABLE: 'MESSAGE_UNPARSEABLE',
  REASONER_TIMEOUT: 'REASONER_TIMEOUT',
  REASONER_TRANSPORT: 'REASONER_TRANSPORT',
  REASONER_REJECTED: 'REASONER_REJECTED',
  OUTPUT_EXTRACTION_FAILED: 'OUTPUT_EXTRACTION_FAILED',
  OUTPUT_SCHEMA_INVALID: 'OUTPUT_SCHEMA_INVALID',
  MAILER_TRANSPORT: 'MAILER_TRANSPORT',
  MAILER_REJECTED: 'MAILER_REJECTED',
  RECONNECT_EXHAUSTED: 'RECONNECT_EXHAUSTED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Retryable failure: network timeout, remote 5xx, connection reset,
 * malformed-but-plausibly-recoverable reasoning output.
 */
export class TransientError extends AppError {
  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message, code, true, context);
    this.name = 'TransientError';
  }
}

/**
 * Locally detected unsupported input. Retrying cannot help, so the
 * message is poisoned on first occurrence.
 */
export class PermanentError extends AppError {
  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message, code, false, context);
    this.name = 'PermanentError';
  }
}

/**
 * Unrecoverable daemon-level failure (reconnect budget exhausted).
 * Propagates to the process supervisor.
 */
export class FatalError extends AppError {
  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message, code, false, context);
    this.name = 'FatalError';
  }
}

/**
 * Raised when no structured result can be pulled out of a reasoning response.
 * Carries a fingerprint of the raw text so repeated identical failures
 * can be recognised.
 */
export class ExtractionError extends TransientError {
  constructor(
    message: string,
    public readonly fingerprint: string,
    code: ErrorCode = ErrorCodes.OUTPUT_EXTRACTION_FAILED
  ) {
    super(message, code, { fingerprint });
    this.name = 'ExtractionError';
  }
}

export type FailureKind = 'transient' | 'permanent';

/** A thrown value after it has been placed in the taxonomy. */
export type ClassifiedFailure = {
  kind: FailureKind;
  code: string;
  reason: string;
  fingerprint?: string;
};

/**
 * Short stable digest of a text, used to compare failures without storing content.
 */
export function fingerprintText(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Place any thrown value into the transient/permanent taxonomy.
 * AppErrors carry their own recoverability; anything else is treated as transient.
 */
export function classifyFailure(error: unknown): ClassifiedFailure {
  if (error instanceof ExtractionError) {
    return {
      kind: 'transient',
      code: error.code,
      reason: error.message,
      fingerprint: error.fingerprint,
    };
  }

  if (error instanceof AppError) {
    return {
      kind: error.recoverable ? 'transient' : 'permanent',
      code: error.code,
      reason: error.message,
    };
  }

  return {
    kind: 'transient',
    code: ErrorCodes.UNKNOWN,
    reason: errorMessage(error),
  };
}
