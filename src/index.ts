/**
 * Workday Signals
 *
 * Calendar free-time analysis and work item staleness for a personal
 * work-management assistant.
 */

export * from './types';
export * from './schedule';
export * from './staleness';
export {
  DEFAULT_ANALYZER_CONFIG,
  DEFAULT_SERVER_CONFIG,
  loadAnalyzerConfig,
  loadServerConfig,
  mergeAnalyzerConfig,
  validateAnalyzerConfig,
  type AnalyzerConfig,
  type ServerConfig,
} from './config';
export { InvalidInputError, SignalsError, ValidationError, isSignalsError } from './utils/errors';
export { parseTimestamp } from './utils/time';
export { createServer, startServer } from './api/server';
