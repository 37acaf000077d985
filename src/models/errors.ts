/**
 * Application Error Models
 *
 * Common error types used across the engine. NotFound and Conflict errors are
 * definitive outcomes for the caller; TransientStoreError is the only
 * retryable one.
 */

/**
 * Unknown player or candidate
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Invalid input to an engine operation
 */
export class ValidationError extends Error {
  constructor(message: string, public details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * A conditional write lost its race, or a game rule rejected the write
 */
export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

/**
 * The candidate is already held by a player for the year
 */
export class AlreadyDraftedError extends ConflictError {
  constructor(
    public readonly candidateId: string,
    public readonly year: number,
    public readonly holderPlayerId: string
  ) {
    super(`Candidate ${candidateId} was already drafted in ${year} by player ${holderPlayerId}`);
    this.name = 'AlreadyDraftedError';
  }
}

/**
 * The player has no draft slots left for the year
 */
export class CapacityExceededError extends ConflictError {
  constructor(
    public readonly playerId: string,
    public readonly year: number,
    public readonly activePickCount: number,
    public readonly maxPicks: number
  ) {
    super(`Player ${playerId} already has ${activePickCount} of ${maxPicks} active picks for ${year}`);
    this.name = 'CapacityExceededError';
  }
}

/**
 * A season-transition invariant does not hold after the writes
 */
export class ValidationFailureError extends Error {
  constructor(message: string, public readonly errors: string[]) {
    super(message);
    this.name = 'ValidationFailureError';
  }
}

/**
 * Retryable store failure (throttling, timeout, service error)
 */
export class TransientStoreError extends Error {
  constructor(message: string, public readonly originalError?: Error) {
    super(message);
    this.name = 'TransientStoreError';
  }
}
