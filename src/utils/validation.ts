/**
 * Workday Signals - Validation Utilities
 *
 * Request validation helpers using Zod schemas.
 *
 * Schemas check the shape of a payload only. Whether a timestamp actually
 * parses is decided per item by the analyzers, so one bad event or work
 * item is rejected on its own instead of failing the whole request.
 */

import { z } from 'zod';
import { ValidationError } from './errors';

// =============================================================================
// COMMON SCHEMAS
// =============================================================================

/**
 * Epoch ms or a date/time string; nullable so a missing value reaches the
 * analyzer and is reported against its item.
 */
export const TimestampInputSchema = z.union([z.number(), z.string()]).nullish();

export const CalendarEventKindSchema = z.enum(['meeting', 'focusTime', 'workingLocation', 'other']);

export const WorkItemStatusSchema = z.enum(['open', 'done']);

/**
 * Per-request threshold overrides, merged over the server configuration
 */
export const ThresholdOverridesSchema = z.object({
  minFreeGapMinutes: z.number().min(0),
  meetingHeavyMinutes: z.number().min(0),
  backToBackGapMinutes: z.number().min(0),
  focusBlockMinutes: z.number().min(0),
  freshWithinDays: z.number().min(0),
  agingAfterDays: z.number().min(0),
  staleAfterDays: z.number().min(0),
  workdayStartMinutes: z.number().int().min(0).max(24 * 60),
  workdayEndMinutes: z.number().int().min(0).max(24 * 60),
  utcOffsetMinutes: z.number().int().min(-14 * 60).max(14 * 60),
}).partial().strict();

// =============================================================================
// API REQUEST SCHEMAS
// =============================================================================

export const CalendarEventInputSchema = z.object({
  id: z.string().optional(),
  title: z.string().max(1000).default(''),
  start: TimestampInputSchema,
  end: TimestampInputSchema,
  attendees: z.array(z.string()).optional(),
  kind: CalendarEventKindSchema.optional(),
});

const DayWindowSchema = z.object({
  id: z.string().optional(),
  date: z.string().optional(),
  dayStart: TimestampInputSchema,
  dayEnd: TimestampInputSchema,
  events: z.array(CalendarEventInputSchema).max(1000).default([]),
});

/**
 * POST /v1/schedule/day
 */
export const AnalyzeDayRequestSchema = DayWindowSchema.extend({
  failFast: z.boolean().optional(),
  config: ThresholdOverridesSchema.optional(),
});

/**
 * POST /v1/schedule/days
 */
export const AnalyzeDaysRequestSchema = z.object({
  days: z.array(DayWindowSchema).min(1).max(31),
  failFast: z.boolean().optional(),
  config: ThresholdOverridesSchema.optional(),
});

export const WorkItemInputSchema = z.object({
  id: z.string().optional(),
  description: z.string().max(10000).default(''),
  addedAt: TimestampInputSchema,
  lastTouchedAt: TimestampInputSchema,
  status: WorkItemStatusSchema.optional(),
});

/**
 * POST /v1/work-items/staleness
 */
export const StalenessRequestSchema = z.object({
  now: z.union([z.number(), z.string()]).optional(),
  items: z.array(WorkItemInputSchema).max(5000),
  failFast: z.boolean().optional(),
  includeDone: z.boolean().optional(),
  config: ThresholdOverridesSchema.optional(),
});

export type AnalyzeDayRequest = z.infer<typeof AnalyzeDayRequestSchema>;
export type AnalyzeDaysRequest = z.infer<typeof AnalyzeDaysRequestSchema>;
export type StalenessRequest = z.infer<typeof StalenessRequestSchema>;

// =============================================================================
// VALIDATION HELPERS
// =============================================================================

/**
 * Validate data against a Zod schema
 *
 * @example
 * ```typescript
 * const body = validate(StalenessRequestSchema, req.body);
 * ```
 */
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  fieldName?: string
): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    const firstError = result.error.issues[0];
    const field = fieldName || (firstError ? firstError.path.join('.') : undefined);
    throw new ValidationError(firstError ? firstError.message : 'Invalid request', field, {
      errors: result.error.issues,
    });
  }

  return result.data;
}
