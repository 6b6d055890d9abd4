/**
 * Workday Signals - Common Types
 *
 * Shared type definitions used by the schedule analyzer and the
 * staleness evaluator.
 */

// =============================================================================
// TIME
// =============================================================================

/**
 * Milliseconds since the Unix epoch. Every instant is normalized to this
 * once it has passed the input boundary.
 */
export type EpochMs = number;

/**
 * Accepted timestamp shapes at the input boundary.
 * - number: epoch milliseconds
 * - string: ISO 8601, `YYYY-MM-DD HH:MM:SS` or `YYYY-MM-DD` (UTC when no offset)
 * - Date
 */
export type TimestampInput = number | string | Date;

/**
 * Half-open span [startAt, endAt).
 */
export interface TimeSpan {
  startAt: EpochMs;
  endAt: EpochMs;
}

// =============================================================================
// BATCH RESULTS
// =============================================================================

/**
 * An input that failed normalization while the rest of its batch continued.
 */
export interface RejectedInput {
  itemId: string;
  field?: string;
  message: string;
}

/**
 * Options shared by every batch operation.
 */
export interface BatchOptions {
  /** Throw on the first invalid item instead of collecting it in `rejected` */
  failFast?: boolean;
}
