/**
 * Workday Signals - Staleness Evaluator
 *
 * Classifies work items by how long they have gone without progress.
 *
 * Rules, in precedence order (the longer-inactivity signal wins):
 * 1. stale  - last touched more than `staleAfterDays` ago, whatever addedAt is
 * 2. aging  - added more than `agingAfterDays` ago and never touched since
 * 3. fresh  - touched within `freshWithinDays`
 * 4. aging  - anything else (touched once, then left idle)
 */

import { DEFAULT_ANALYZER_CONFIG, type AnalyzerConfig } from '../config';
import type { BatchOptions, EpochMs, RejectedInput, TimestampInput } from '../types/common';
import type {
  StalenessLevel,
  StalenessReport,
  StalenessResult,
  WorkItem,
  WorkItemInput,
} from '../types/workItem';
import { isInvalidInputError } from '../utils/errors';
import { daysToMs, parseTimestamp, wholeDaysBetween } from '../utils/time';

export type StalenessConfig = Pick<AnalyzerConfig, 'freshWithinDays' | 'agingAfterDays' | 'staleAfterDays'>;

export interface EvaluateOptions extends BatchOptions {
  config?: Partial<StalenessConfig>;
  /** Classify done items too instead of listing them in `skipped` */
  includeDone?: boolean;
}

function resolveConfig(overrides?: Partial<StalenessConfig>): StalenessConfig {
  return {
    freshWithinDays: overrides?.freshWithinDays ?? DEFAULT_ANALYZER_CONFIG.freshWithinDays,
    agingAfterDays: overrides?.agingAfterDays ?? DEFAULT_ANALYZER_CONFIG.agingAfterDays,
    staleAfterDays: overrides?.staleAfterDays ?? DEFAULT_ANALYZER_CONFIG.staleAfterDays,
  };
}

export function workItemIdFor(input: WorkItemInput, index: number): string {
  return input.id && input.id.length > 0 ? input.id : `item[${index}]`;
}

/**
 * @throws InvalidInputError when addedAt or lastTouchedAt is missing or malformed
 */
export function normalizeWorkItem(input: WorkItemInput, index: number): WorkItem {
  const id = workItemIdFor(input, index);
  return {
    id,
    description: input.description,
    addedAt: parseTimestamp(input.addedAt, id, 'addedAt'),
    lastTouchedAt: parseTimestamp(input.lastTouchedAt, id, 'lastTouchedAt'),
    status: input.status ?? 'open',
  };
}

/**
 * Classify one item. Depends only on now, addedAt and lastTouchedAt.
 */
export function classifyWorkItem(
  now: EpochMs,
  item: WorkItem,
  config?: Partial<StalenessConfig>
): StalenessResult {
  const { freshWithinDays, agingAfterDays, staleAfterDays } = resolveConfig(config);

  const sinceAddedMs = now - item.addedAt;
  const sinceTouchedMs = now - item.lastTouchedAt;

  const base = {
    itemId: item.id,
    description: item.description,
    daysSinceAdded: wholeDaysBetween(item.addedAt, now),
    daysSinceTouched: wholeDaysBetween(item.lastTouchedAt, now),
  };

  if (sinceTouchedMs > daysToMs(staleAfterDays)) {
    return { ...base, level: 'stale', reason: 'inactive' };
  }
  if (sinceAddedMs > daysToMs(agingAfterDays) && item.lastTouchedAt === item.addedAt) {
    return { ...base, level: 'aging', reason: 'no_progress' };
  }
  if (sinceTouchedMs <= daysToMs(freshWithinDays)) {
    return { ...base, level: 'fresh', reason: 'recent_activity' };
  }
  return { ...base, level: 'aging', reason: 'idle' };
}

/**
 * Classify a batch of items. Invalid items are collected in `rejected`
 * unless `failFast` is set; an empty batch yields an empty report.
 *
 * @throws InvalidInputError naming `now` when it is malformed
 */
export function evaluateWorkItems(
  now: TimestampInput,
  items: readonly WorkItemInput[],
  options: EvaluateOptions = {}
): StalenessReport {
  const evaluatedAt = parseTimestamp(now, 'now', 'now');
  const results: StalenessResult[] = [];
  const skipped: string[] = [];
  const rejected: RejectedInput[] = [];
  const counts: Record<StalenessLevel, number> = { fresh: 0, aging: 0, stale: 0 };

  items.forEach((input, index) => {
    let item: WorkItem;
    try {
      item = normalizeWorkItem(input, index);
    } catch (error) {
      if (options.failFast || !isInvalidInputError(error)) throw error;
      rejected.push(error.toRejected());
      return;
    }

    if (item.status === 'done' && !options.includeDone) {
      skipped.push(item.id);
      return;
    }

    const result = classifyWorkItem(evaluatedAt, item, options.config);
    counts[result.level]++;
    results.push(result);
  });

  return { evaluatedAt, results, counts, skipped, rejected };
}
