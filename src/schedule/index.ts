export { analyzeDay, analyzeDays, type AnalyzeOptions } from './analyzer';
export { buildDayWindow, type WorkdayOptions } from './window';
export { describeDay } from './summary';
export { normalizeEvent, normalizeEvents } from './events';
export { clipToWindow, complementWithin, mergeSpans, sortSpans, sumDurationMs } from './intervals';
