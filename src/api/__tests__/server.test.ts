/**
 * Workday Signals - API Server Tests
 *
 * Runs the Express app in-process on an ephemeral port.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import { createServer as createHttpServer, type Server } from 'http';
import { createServer, startServer } from '../server';
import { DEFAULT_ANALYZER_CONFIG, DEFAULT_SERVER_CONFIG } from '../../config';
import { ChildLogger, logger as rootLogger, type LogSink } from '../../utils/logger';

// =============================================================================
// TEST FIXTURES
// =============================================================================

interface LogRecord {
  level: string;
  message: string;
  context?: Record<string, unknown>;
}

const records: LogRecord[] = [];

const recordingLogger: LogSink = {
  debug: (message, context) => { records.push({ level: 'debug', message, context }); },
  info: (message, context) => { records.push({ level: 'info', message, context }); },
  warn: (message, context) => { records.push({ level: 'warn', message, context }); },
  error: (message, context) => { records.push({ level: 'error', message, context }); },
  child: (context) => new ChildLogger(recordingLogger, context),
};

const listenOnFreePort = (target: Server) =>
  new Promise<number>((resolve, reject) => {
    target.listen(0, () => {
      const address = target.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      resolve(address.port);
    });
  });

let server: Server;
let baseUrl: string;

const post = (path: string, body: unknown) =>
  fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });

// Response.json() is typed as unknown under Node's fetch types
const readBody = async (res: Response) => JSON.parse(await res.text());

beforeAll(async () => {
  const app = createServer({
    analyzerConfig: DEFAULT_ANALYZER_CONFIG,
    serverConfig: DEFAULT_SERVER_CONFIG,
    logger: recordingLogger,
  });

  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

beforeEach(() => {
  records.length = 0;
});

// =============================================================================
// HEALTH
// =============================================================================

describe('GET /v1/health', () => {
  it('should report healthy with the configured version', async () => {
    const res = await fetch(`${baseUrl}/v1/health`);
    const body = await readBody(res);

    expect(res.status).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.version).toBe('1.0.0');
    expect(res.headers.get('x-request-id')).toBeTruthy();
  });

  it('should echo a caller-supplied request id', async () => {
    const res = await fetch(`${baseUrl}/v1/health`, { headers: { 'X-Request-ID': 'req-42' } });
    expect(res.headers.get('x-request-id')).toBe('req-42');
  });
});

// =============================================================================
// SCHEDULE
// =============================================================================

describe('POST /v1/schedule/day', () => {
  it('should analyze an explicit day window', async () => {
    const res = await post('/v1/schedule/day', {
      dayStart: '2024-01-15T09:00:00Z',
      dayEnd: '2024-01-15T17:00:00Z',
      events: [
        { id: 'standup', title: 'Standup', start: '2024-01-15T09:00:00Z', end: '2024-01-15T09:20:00Z' },
        { id: 'review', title: 'Design review', start: '2024-01-15T10:30:00Z', end: '2024-01-15T11:20:00Z' },
      ],
    });
    const body = await readBody(res);

    expect(res.status).toBe(200);
    expect(body.totalMeetingMinutes).toBe(70);
    expect(body.freeIntervals).toEqual([
      { startAt: Date.UTC(2024, 0, 15, 9, 20), endAt: Date.UTC(2024, 0, 15, 10, 30), durationMinutes: 70 },
      { startAt: Date.UTC(2024, 0, 15, 11, 20), endAt: Date.UTC(2024, 0, 15, 17), durationMinutes: 340 },
    ]);
    expect(body.meetingHeavy).toBe(false);
    expect(body.summary).toBe('2 meetings (1h 10m), 2 free blocks, longest 5h 40m.');
  });

  it('should expand a date with per-request overrides', async () => {
    const res = await post('/v1/schedule/day', {
      date: '2024-01-15',
      events: [],
      config: { utcOffsetMinutes: 60 },
    });
    const body = await readBody(res);

    expect(res.status).toBe(200);
    expect(body.dayStart).toBe(Date.UTC(2024, 0, 15, 8));
    expect(body.dayEnd).toBe(Date.UTC(2024, 0, 15, 16));
  });

  it('should reject bad events and log them', async () => {
    const res = await fetch(`${baseUrl}/v1/schedule/day`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Request-ID': 'req-rejects' },
      body: JSON.stringify({
        date: '2024-01-15',
        events: [{ id: 'bad', title: 'Broken', start: 'tomorrow', end: '2024-01-15T10:00:00Z' }],
      }),
    });
    const body = await readBody(res);

    expect(res.status).toBe(200);
    expect(body.rejected).toEqual([{ itemId: 'bad', field: 'start', message: "bad: cannot parse start 'tomorrow'" }]);

    const warnings = records.filter((r) => r.level === 'warn');
    expect(warnings.map((r) => r.message)).toEqual(['Rejected events']);
    expect(warnings[0].context?.requestId).toBe('req-rejects');
    expect(warnings[0].context?.count).toBe(1);
  });

  it('should return 400 for contradictory threshold overrides', async () => {
    const res = await post('/v1/schedule/day', {
      date: '2024-01-15',
      events: [],
      config: { freshWithinDays: 20, staleAfterDays: 14 },
    });
    const body = await readBody(res);

    expect(res.status).toBe(400);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.message).toBe('Invalid configuration: staleAfterDays must be at least freshWithinDays');
    expect(body.error.details.field).toBe('config');
  });

  it('should return 400 for an override that inverts the workday', async () => {
    const res = await post('/v1/schedule/days', {
      days: [{ date: '2024-01-15', events: [] }],
      config: { workdayStartMinutes: 600, workdayEndMinutes: 540 },
    });
    const body = await readBody(res);

    expect(res.status).toBe(400);
    expect(body.error.message).toBe('Invalid configuration: Workday end must be after workday start');
  });

  it('should return 422 for a bad event in fail-fast mode', async () => {
    const res = await post('/v1/schedule/day', {
      date: '2024-01-15',
      failFast: true,
      events: [{ id: 'bad', title: 'Broken', start: 'tomorrow', end: '2024-01-15T10:00:00Z' }],
    });
    const body = await readBody(res);

    expect(res.status).toBe(422);
    expect(body.error.code).toBe('INVALID_INPUT');
    expect(body.error.details).toEqual({ itemId: 'bad', field: 'start' });
  });

  it('should return 422 when no day window is given', async () => {
    const res = await post('/v1/schedule/day', { events: [] });
    const body = await readBody(res);

    expect(res.status).toBe(422);
    expect(body.error.message).toBe('day: missing dayStart');
  });

  it('should return 400 for an invalid payload', async () => {
    const res = await post('/v1/schedule/day', { date: '2024-01-15', events: 'none' });
    const body = await readBody(res);

    expect(res.status).toBe(400);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.details.field).toBe('events');
  });
});

describe('POST /v1/schedule/days', () => {
  it('should analyze each day and report broken ones', async () => {
    const res = await post('/v1/schedule/days', {
      days: [
        { date: '2024-01-15', events: [{ title: 'Standup', start: '2024-01-15T09:00:00Z', end: '2024-01-15T09:15:00Z' }] },
        { id: 'tuesday', date: '2024-01-16T00:00', events: [] },
      ],
    });
    const body = await readBody(res);

    expect(res.status).toBe(200);
    expect(body.days).toHaveLength(2);
    expect(body.days[0].ok).toBe(true);
    expect(body.days[0].analysis.totalMeetingMinutes).toBe(15);
    expect(body.days[0].summary).toBe('1 meeting (15m), 1 free block, longest 7h 45m.');
    expect(body.days[1]).toEqual({
      ok: false,
      error: { itemId: 'tuesday', field: 'date', message: 'tuesday: date must be YYYY-MM-DD' },
    });
  });
});

// =============================================================================
// STALENESS
// =============================================================================

describe('POST /v1/work-items/staleness', () => {
  it('should classify work items', async () => {
    const res = await post('/v1/work-items/staleness', {
      now: '2024-01-10',
      items: [
        { id: 'deck', description: 'Send deck', addedAt: '2024-01-01', lastTouchedAt: '2024-01-01' },
        { id: 'budget', description: 'Review budget', addedAt: '2024-01-08', lastTouchedAt: '2024-01-09' },
        { id: 'offsite', description: 'Offsite agenda', addedAt: '2023-12-01', lastTouchedAt: '2023-12-20' },
      ],
    });
    const body = await readBody(res);

    expect(res.status).toBe(200);
    expect(body.evaluatedAt).toBe(Date.UTC(2024, 0, 10));
    expect(body.counts).toEqual({ fresh: 1, aging: 1, stale: 1 });
    expect(body.results[0]).toEqual({
      itemId: 'deck',
      description: 'Send deck',
      level: 'aging',
      reason: 'no_progress',
      daysSinceAdded: 9,
      daysSinceTouched: 9,
    });
  });

  it('should return an empty report for no items', async () => {
    const res = await post('/v1/work-items/staleness', { now: '2024-01-10', items: [] });
    const body = await readBody(res);

    expect(res.status).toBe(200);
    expect(body.results).toEqual([]);
    expect(body.counts).toEqual({ fresh: 0, aging: 0, stale: 0 });
  });

  it('should return 400 when overrides contradict the server thresholds', async () => {
    const res = await post('/v1/work-items/staleness', { now: '2024-01-10', items: [], config: { staleAfterDays: 3 } });
    const body = await readBody(res);

    expect(res.status).toBe(400);
    expect(body.error.details.errors).toEqual(['staleAfterDays must be at least freshWithinDays']);
  });

  it('should return 400 when items is missing', async () => {
    const res = await post('/v1/work-items/staleness', { now: '2024-01-10' });
    const body = await readBody(res);

    expect(res.status).toBe(400);
    expect(body.error.details.field).toBe('items');
  });
});

// =============================================================================
// ERRORS
// =============================================================================

describe('error handling', () => {
  it('should return 400 for malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/v1/work-items/staleness`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"items": [',
    });
    const body = await readBody(res);

    expect(res.status).toBe(400);
    expect(body.error.message).toBe('Malformed JSON body');
  });

  it('should return 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/v1/nope`);
    const body = await readBody(res);

    expect(res.status).toBe(404);
    expect(body.error.code).toBe('NOT_FOUND');
    expect(body.error.message).toBe('Route GET /v1/nope not found');
  });
});

// =============================================================================
// START-UP
// =============================================================================

describe('startServer', () => {
  it('should log and flag a port that is already taken', async () => {
    const blocker = createHttpServer();
    const port = await listenOnFreePort(blocker);
    const previousPort = process.env.PORT;
    process.env.PORT = String(port);
    const error = vi.spyOn(rootLogger, 'error').mockImplementation(() => undefined);
    vi.spyOn(rootLogger, 'info').mockImplementation(() => undefined);

    try {
      const started = startServer();
      await new Promise((resolve) => started.once('error', resolve));

      expect(error).toHaveBeenCalledWith('Server failed to listen', { port, message: expect.any(String) });
      expect(process.exitCode).toBe(1);
    } finally {
      process.exitCode = undefined;
      if (previousPort === undefined) delete process.env.PORT;
      else process.env.PORT = previousPort;
      vi.restoreAllMocks();
      await new Promise<void>((resolve) => blocker.close(() => resolve()));
    }
  });
});
