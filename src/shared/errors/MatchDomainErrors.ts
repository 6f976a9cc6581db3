/**
 * Match Domain Errors - Structured error types for the match domain
 *
 * These errors are shared by the rule engines (configuration and move
 * legality) and the server-side orchestration (store lookups, timeout
 * pre-emption). Every error carries a machine-readable code, a context
 * object for logs and an HTTP status for whatever transport surfaces it.
 *
 * Usage:
 * ```typescript
 * import { IllegalMoveError, MatchErrorCode } from './MatchDomainErrors';
 *
 * throw new IllegalMoveError(MatchErrorCode.MOVE_NOT_YOUR_TURN, 'Not your turn', {
 *   participantId: 'user:2',
 * });
 * ```
 *
 * @module MatchDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error codes are prefixed by category:
 * - CONFIGURATION_*: rule set / participant list problems at creation
 * - MATCH_*: match lookup and lifecycle errors
 * - MOVE_*: move rejection reasons
 */
export enum MatchErrorCode {
  CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
  CONFIGURATION_UNKNOWN_KIND = 'CONFIGURATION_UNKNOWN_KIND',

  MATCH_NOT_FOUND = 'MATCH_NOT_FOUND',
  MATCH_ALREADY_IN_PROGRESS = 'MATCH_ALREADY_IN_PROGRESS',
  MATCH_CORRUPT_STATE = 'MATCH_CORRUPT_STATE',

  MOVE_NOT_PARTICIPANT = 'MOVE_NOT_PARTICIPANT',
  MOVE_NOT_YOUR_TURN = 'MOVE_NOT_YOUR_TURN',
  MOVE_GAME_OVER = 'MOVE_GAME_OVER',
  MOVE_TIME_EXPIRED = 'MOVE_TIME_EXPIRED',
  MOVE_MALFORMED = 'MOVE_MALFORMED',
  MOVE_ILLEGAL = 'MOVE_ILLEGAL',
  MOVE_TIMEOUT_PREEMPTED = 'MOVE_TIMEOUT_PREEMPTED',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/** Codes a move validation can be rejected with. */
export type MoveRejectionCode =
  | MatchErrorCode.MOVE_NOT_PARTICIPANT
  | MatchErrorCode.MOVE_NOT_YOUR_TURN
  | MatchErrorCode.MOVE_GAME_OVER
  | MatchErrorCode.MOVE_TIME_EXPIRED
  | MatchErrorCode.MOVE_MALFORMED
  | MatchErrorCode.MOVE_ILLEGAL;

export const ERROR_HTTP_STATUS: Record<MatchErrorCode, number> = {
  [MatchErrorCode.CONFIGURATION_INVALID]: 400,
  [MatchErrorCode.CONFIGURATION_UNKNOWN_KIND]: 400,

  [MatchErrorCode.MATCH_NOT_FOUND]: 404,
  [MatchErrorCode.MATCH_ALREADY_IN_PROGRESS]: 409,
  [MatchErrorCode.MATCH_CORRUPT_STATE]: 500,

  [MatchErrorCode.MOVE_NOT_PARTICIPANT]: 403,
  [MatchErrorCode.MOVE_NOT_YOUR_TURN]: 403,
  [MatchErrorCode.MOVE_GAME_OVER]: 409,
  [MatchErrorCode.MOVE_TIME_EXPIRED]: 409,
  [MatchErrorCode.MOVE_MALFORMED]: 400,
  [MatchErrorCode.MOVE_ILLEGAL]: 400,
  [MatchErrorCode.MOVE_TIMEOUT_PREEMPTED]: 408,

  [MatchErrorCode.INTERNAL_ERROR]: 500,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all match domain errors.
 */
export class MatchError extends Error {
  readonly code: MatchErrorCode;

  readonly context: Record<string, unknown>;

  readonly timestamp: Date;

  constructor(code: MatchErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'MatchError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, MatchError.prototype);
  }

  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.code] ?? 500;
  }

  /** Serialize to a JSON-safe object for API responses */
  toJSON(): MatchErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface MatchErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Invalid rule set, unknown game kind or participant count out of bounds.
 * Fatal to match creation only.
 */
export class ConfigurationError extends MatchError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    code: MatchErrorCode = MatchErrorCode.CONFIGURATION_INVALID
  ) {
    super(code, message, context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class MatchNotFoundError extends MatchError {
  constructor(matchId: string, context: Record<string, unknown> = {}) {
    super(MatchErrorCode.MATCH_NOT_FOUND, `Match not found: ${matchId}`, {
      matchId,
      ...context,
    });
    this.name = 'MatchNotFoundError';
    Object.setPrototypeOf(this, MatchNotFoundError.prototype);
  }
}

export class MatchConflictError extends MatchError {
  constructor(matchId: string, context: Record<string, unknown> = {}) {
    super(MatchErrorCode.MATCH_ALREADY_IN_PROGRESS, `Match ${matchId} is already in progress`, {
      matchId,
      ...context,
    });
    this.name = 'MatchConflictError';
    Object.setPrototypeOf(this, MatchConflictError.prototype);
  }
}

/**
 * A stored document failed schema validation on load.
 */
export class CorruptMatchStateError extends MatchError {
  constructor(matchId: string, reason: string, context: Record<string, unknown> = {}) {
    super(MatchErrorCode.MATCH_CORRUPT_STATE, `Stored match ${matchId} is unreadable: ${reason}`, {
      matchId,
      reason,
      ...context,
    });
    this.name = 'CorruptMatchStateError';
    Object.setPrototypeOf(this, CorruptMatchStateError.prototype);
  }
}

/**
 * A submitted move was rejected. The caller may let the participant retry.
 */
export class IllegalMoveError extends MatchError {
  readonly reason: MoveRejectionCode;

  constructor(reason: MoveRejectionCode, message: string, context: Record<string, unknown> = {}) {
    super(reason, message, context);
    this.name = 'IllegalMoveError';
    this.reason = reason;
    Object.setPrototypeOf(this, IllegalMoveError.prototype);
  }
}

/**
 * The acting participant's clock had already run out when the move arrived.
 * The timeout consequence was applied and persisted instead of the move;
 * `outcome` describes what happened.
 */
export class TimeoutPreemptedError<TOutcome = unknown> extends MatchError {
  readonly outcome: TOutcome;

  constructor(message: string, outcome: TOutcome, context: Record<string, unknown> = {}) {
    super(MatchErrorCode.MOVE_TIMEOUT_PREEMPTED, message, context);
    this.name = 'TimeoutPreemptedError';
    this.outcome = outcome;
    Object.setPrototypeOf(this, TimeoutPreemptedError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isMatchError(error: unknown): error is MatchError {
  return error instanceof MatchError;
}

export function getHttpStatus(error: unknown): number {
  if (isMatchError(error)) {
    return error.httpStatus;
  }
  return 500;
}

/**
 * Wrap an unknown error in a MatchError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): MatchError {
  if (isMatchError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new MatchError(MatchErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
