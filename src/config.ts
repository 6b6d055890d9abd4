/**
 * Workday Signals - Configuration
 *
 * Thresholds for the schedule analyzer and staleness evaluator, plus the
 * API server settings. All values can be overridden via environment variables.
 */

import { logger, isLogLevel, type LogLevel } from './utils/logger';
import { parseClockMinutes } from './utils/time';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

export interface AnalyzerConfig {
  /** Shortest gap reported as free time (SIGNALS_MIN_FREE_GAP_MINUTES) */
  minFreeGapMinutes: number;

  /** Meeting load above which a day is meeting-heavy (SIGNALS_MEETING_HEAVY_MINUTES) */
  meetingHeavyMinutes: number;

  /** Gaps below this between consecutive meetings are back-to-back (SIGNALS_BACK_TO_BACK_GAP_MINUTES) */
  backToBackGapMinutes: number;

  /** A day with meetings but no free block this long is fragmented (SIGNALS_FOCUS_BLOCK_MINUTES) */
  focusBlockMinutes: number;

  /** Items touched within this many days are fresh (SIGNALS_FRESH_WITHIN_DAYS) */
  freshWithinDays: number;

  /** Untouched items older than this are aging (SIGNALS_AGING_AFTER_DAYS) */
  agingAfterDays: number;

  /** Items untouched for longer than this are stale (SIGNALS_STALE_AFTER_DAYS) */
  staleAfterDays: number;

  /** Workday start, minutes after local midnight (SIGNALS_WORKDAY_START, HH:MM) */
  workdayStartMinutes: number;

  /** Workday end, minutes after local midnight (SIGNALS_WORKDAY_END, HH:MM) */
  workdayEndMinutes: number;

  /** Offset of local time from UTC (SIGNALS_UTC_OFFSET_MINUTES) */
  utcOffsetMinutes: number;
}

export interface ServerConfig {
  port: number;
  version: string;
  corsOrigins: string[];
  logLevel: LogLevel;
  /** Service name stamped on every log entry (SERVICE_NAME) */
  serviceName: string;
}

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  minFreeGapMinutes: 30,
  meetingHeavyMinutes: 240,         // 4 hours
  backToBackGapMinutes: 5,
  focusBlockMinutes: 60,
  freshWithinDays: 7,
  agingAfterDays: 7,
  staleAfterDays: 14,
  workdayStartMinutes: 9 * 60,      // 09:00
  workdayEndMinutes: 17 * 60,       // 17:00
  utcOffsetMinutes: 0,
};

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3000,
  version: '1.0.0',
  corsOrigins: ['http://localhost:3000'],
  logLevel: 'info',
  serviceName: 'workday-signals',
};

// =============================================================================
// ENVIRONMENT VARIABLE PARSING
// =============================================================================

type Env = Record<string, string | undefined>;

function parseIntEnv(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    logger.warn(`Invalid integer value for ${key}, using default`, { value, defaultValue });
    return defaultValue;
  }
  return parsed;
}

function parseClockEnv(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseClockMinutes(value);
  if (parsed === null) {
    logger.warn(`Invalid HH:MM value for ${key}, using default`, { value, defaultValue });
    return defaultValue;
  }
  return parsed;
}

function parseListEnv(env: Env, key: string, defaultValue: string[]): string[] {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

// =============================================================================
// CONFIGURATION LOADERS
// =============================================================================

/**
 * Lay `overrides` over `base`. Keys that are absent or explicitly undefined
 * keep the base value.
 */
export function mergeAnalyzerConfig(
  base: AnalyzerConfig,
  overrides?: Partial<AnalyzerConfig>
): AnalyzerConfig {
  if (!overrides) return { ...base };
  return {
    minFreeGapMinutes: overrides.minFreeGapMinutes ?? base.minFreeGapMinutes,
    meetingHeavyMinutes: overrides.meetingHeavyMinutes ?? base.meetingHeavyMinutes,
    backToBackGapMinutes: overrides.backToBackGapMinutes ?? base.backToBackGapMinutes,
    focusBlockMinutes: overrides.focusBlockMinutes ?? base.focusBlockMinutes,
    freshWithinDays: overrides.freshWithinDays ?? base.freshWithinDays,
    agingAfterDays: overrides.agingAfterDays ?? base.agingAfterDays,
    staleAfterDays: overrides.staleAfterDays ?? base.staleAfterDays,
    workdayStartMinutes: overrides.workdayStartMinutes ?? base.workdayStartMinutes,
    workdayEndMinutes: overrides.workdayEndMinutes ?? base.workdayEndMinutes,
    utcOffsetMinutes: overrides.utcOffsetMinutes ?? base.utcOffsetMinutes,
  };
}

/**
 * Load analyzer thresholds from the environment, falling back to defaults.
 */
export function loadAnalyzerConfig(
  overrides?: Partial<AnalyzerConfig>,
  env: Env = process.env
): AnalyzerConfig {
  const d = DEFAULT_ANALYZER_CONFIG;
  const fromEnv: AnalyzerConfig = {
    minFreeGapMinutes: parseIntEnv(env, 'SIGNALS_MIN_FREE_GAP_MINUTES', d.minFreeGapMinutes),
    meetingHeavyMinutes: parseIntEnv(env, 'SIGNALS_MEETING_HEAVY_MINUTES', d.meetingHeavyMinutes),
    backToBackGapMinutes: parseIntEnv(env, 'SIGNALS_BACK_TO_BACK_GAP_MINUTES', d.backToBackGapMinutes),
    focusBlockMinutes: parseIntEnv(env, 'SIGNALS_FOCUS_BLOCK_MINUTES', d.focusBlockMinutes),
    freshWithinDays: parseIntEnv(env, 'SIGNALS_FRESH_WITHIN_DAYS', d.freshWithinDays),
    agingAfterDays: parseIntEnv(env, 'SIGNALS_AGING_AFTER_DAYS', d.agingAfterDays),
    staleAfterDays: parseIntEnv(env, 'SIGNALS_STALE_AFTER_DAYS', d.staleAfterDays),
    workdayStartMinutes: parseClockEnv(env, 'SIGNALS_WORKDAY_START', d.workdayStartMinutes),
    workdayEndMinutes: parseClockEnv(env, 'SIGNALS_WORKDAY_END', d.workdayEndMinutes),
    utcOffsetMinutes: parseIntEnv(env, 'SIGNALS_UTC_OFFSET_MINUTES', d.utcOffsetMinutes),
  };

  return mergeAnalyzerConfig(fromEnv, overrides);
}

export function loadServerConfig(
  overrides?: Partial<ServerConfig>,
  env: Env = process.env
): ServerConfig {
  const level = env.LOG_LEVEL;
  const config: ServerConfig = {
    port: parseIntEnv(env, 'PORT', DEFAULT_SERVER_CONFIG.port),
    version: env.APP_VERSION || DEFAULT_SERVER_CONFIG.version,
    corsOrigins: parseListEnv(env, 'CORS_ORIGINS', DEFAULT_SERVER_CONFIG.corsOrigins),
    logLevel: isLogLevel(level) ? level : DEFAULT_SERVER_CONFIG.logLevel,
    serviceName: env.SERVICE_NAME || DEFAULT_SERVER_CONFIG.serviceName,
  };

  if (overrides) {
    Object.assign(config, overrides);
  }

  return config;
}

// =============================================================================
// CONFIGURATION VALIDATION
// =============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function validateAnalyzerConfig(config: AnalyzerConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const nonNegative: Array<keyof AnalyzerConfig> = [
    'minFreeGapMinutes',
    'meetingHeavyMinutes',
    'backToBackGapMinutes',
    'focusBlockMinutes',
    'freshWithinDays',
    'agingAfterDays',
    'staleAfterDays',
  ];
  for (const key of nonNegative) {
    if (config[key] < 0) {
      errors.push(`${key} cannot be negative`);
    }
  }

  if (config.staleAfterDays < config.freshWithinDays) {
    errors.push('staleAfterDays must be at least freshWithinDays');
  }

  if (config.workdayEndMinutes <= config.workdayStartMinutes) {
    errors.push('Workday end must be after workday start');
  }

  if (Math.abs(config.utcOffsetMinutes) > 14 * 60) {
    errors.push('utcOffsetMinutes must be within +/-14 hours');
  }

  if (config.minFreeGapMinutes === 0) {
    warnings.push('minFreeGapMinutes of 0 reports every sliver between meetings as free time');
  }
  if (config.backToBackGapMinutes === 0) {
    warnings.push('backToBackGapMinutes of 0 disables back-to-back warnings');
  }
  if (config.meetingHeavyMinutes > config.workdayEndMinutes - config.workdayStartMinutes) {
    warnings.push('meetingHeavyMinutes exceeds the workday length; a workday window can never be meeting-heavy');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =============================================================================
// CONFIGURATION LOGGING
// =============================================================================

export function getLoggableConfig(
  analyzer: AnalyzerConfig,
  server: ServerConfig
): Record<string, unknown> {
  return {
    ...analyzer,
    port: server.port,
    version: server.version,
    corsOrigins: server.corsOrigins,
    logLevel: server.logLevel,
    serviceName: server.serviceName,
  };
}
