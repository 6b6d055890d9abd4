/**
 * Workday Signals - Work Item Types
 *
 * Work items are created by the capture routine and persisted elsewhere
 * (markdown); the evaluator only reads them.
 */

import type { EpochMs, RejectedInput, TimestampInput } from './common';

export type WorkItemStatus = 'open' | 'done';

export interface WorkItemInput {
  id?: string;
  description: string;
  addedAt?: TimestampInput | null;
  lastTouchedAt?: TimestampInput | null;
  status?: WorkItemStatus;
}

export interface WorkItem {
  readonly id: string;
  readonly description: string;
  readonly addedAt: EpochMs;
  readonly lastTouchedAt: EpochMs;
  readonly status: WorkItemStatus;
}

export type StalenessLevel = 'fresh' | 'aging' | 'stale';

/**
 * Which rule produced the level.
 * - recent_activity: touched within the fresh window
 * - no_progress: old enough to age and never touched since it was added
 * - idle: touched at some point, but not recently
 * - inactive: untouched past the stale threshold
 */
export type StalenessReason = 'recent_activity' | 'no_progress' | 'idle' | 'inactive';

export interface StalenessResult {
  itemId: string;
  description: string;
  level: StalenessLevel;
  reason: StalenessReason;
  daysSinceAdded: number;
  daysSinceTouched: number;
}

export interface StalenessReport {
  evaluatedAt: EpochMs;
  results: StalenessResult[];
  counts: Record<StalenessLevel, number>;
  skipped: string[];
  rejected: RejectedInput[];
}
