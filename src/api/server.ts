/**
 * Workday Signals - API Server
 *
 * Express-based API server exposing the analyzers to the assistant runtime:
 * - Day and multi-day schedule analysis
 * - Work item staleness reports
 * - Health checks
 */

import express, { Router, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { v4 as uuidv4 } from 'uuid';
import { config as loadEnv } from 'dotenv';

import {
  getLoggableConfig,
  loadAnalyzerConfig,
  loadServerConfig,
  mergeAnalyzerConfig,
  validateAnalyzerConfig,
  type AnalyzerConfig,
  type ServerConfig,
} from '../config';
import { analyzeDay, analyzeDays, describeDay } from '../schedule';
import { evaluateWorkItems } from '../staleness';
import type { RejectedInput } from '../types/common';
import { NotFoundError, ValidationError, wrapError } from '../utils/errors';
import { logger as rootLogger, type LogSink } from '../utils/logger';
import {
  AnalyzeDayRequestSchema,
  AnalyzeDaysRequestSchema,
  StalenessRequestSchema,
  validate,
} from '../utils/validation';

// =============================================================================
// TYPES
// =============================================================================

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * API Error response
 */
interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    requestId?: string;
  };
}

/**
 * Health check response
 */
interface HealthResponse {
  status: 'healthy';
  version: string;
  uptime: number;
  timestamp: number;
}

export interface ServerOptions {
  analyzerConfig?: AnalyzerConfig;
  serverConfig?: ServerConfig;
  logger?: LogSink;
}

// =============================================================================
// MIDDLEWARE
// =============================================================================

/**
 * Request ID middleware - adds unique ID to each request
 */
function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  req.requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
  res.setHeader('x-request-id', req.requestId);
  next();
}

/**
 * Request logging middleware
 */
function loggingMiddleware(log: LogSink) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();

    res.on('finish', () => {
      log.child({ requestId: req.requestId }).info('request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });

    next();
  };
}

/**
 * Error handling middleware
 */
function errorHandler(log: LogSink) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    // body-parser reports malformed JSON as a SyntaxError
    const error = wrapError(err instanceof SyntaxError ? new ValidationError('Malformed JSON body') : err);

    if (error.statusCode >= 500) {
      log.child({ requestId: req.requestId }).error('Unhandled error', { message: error.message });
    }

    const response: ApiErrorResponse = {
      error: {
        code: error.code,
        message: error.statusCode >= 500 && process.env.NODE_ENV === 'production'
          ? 'An internal error occurred'
          : error.message,
        details: error.statusCode < 500 ? error.details : undefined,
        requestId: req.requestId,
      },
    };

    res.status(error.statusCode).json(response);
  };
}

/**
 * Not found handler
 */
function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
}

function logRejected(log: LogSink, req: Request, kind: string, rejected: RejectedInput[]): void {
  if (rejected.length === 0) return;
  log.child({ requestId: req.requestId }).warn(`Rejected ${kind}`, { count: rejected.length, rejected });
}

/**
 * Throw a 400 when thresholds contradict each other.
 */
function assertValidConfig(config: AnalyzerConfig): AnalyzerConfig {
  const validation = validateAnalyzerConfig(config);
  if (!validation.valid) {
    throw new ValidationError(`Invalid configuration: ${validation.errors.join('; ')}`, 'config', {
      errors: validation.errors,
    });
  }
  return config;
}

/**
 * Server thresholds with the request's overrides laid over them
 */
function requestConfig(base: AnalyzerConfig, overrides?: Partial<AnalyzerConfig>): AnalyzerConfig {
  return overrides ? assertValidConfig(mergeAnalyzerConfig(base, overrides)) : base;
}

// =============================================================================
// ROUTER SETUP
// =============================================================================

function createRouter(analyzerConfig: AnalyzerConfig, serverConfig: ServerConfig, log: LogSink): Router {
  const router = Router();
  const startedAt = Date.now();

  /**
   * POST /v1/schedule/day
   */
  router.post('/v1/schedule/day', (req: Request, res: Response) => {
    const body = validate(AnalyzeDayRequestSchema, req.body);
    const analysis = analyzeDay(body, {
      config: requestConfig(analyzerConfig, body.config),
      failFast: body.failFast,
    });

    logRejected(log, req, 'events', analysis.rejected);
    res.json({ ...analysis, summary: describeDay(analysis) });
  });

  /**
   * POST /v1/schedule/days
   */
  router.post('/v1/schedule/days', (req: Request, res: Response) => {
    const body = validate(AnalyzeDaysRequestSchema, req.body);
    const results = analyzeDays(body.days, {
      config: requestConfig(analyzerConfig, body.config),
      failFast: body.failFast,
    });

    const days = results.map((result) => {
      if (!result.ok) return result;
      logRejected(log, req, 'events', result.analysis.rejected);
      return { ...result, summary: describeDay(result.analysis) };
    });

    res.json({ days });
  });

  /**
   * POST /v1/work-items/staleness
   */
  router.post('/v1/work-items/staleness', (req: Request, res: Response) => {
    const body = validate(StalenessRequestSchema, req.body);
    const report = evaluateWorkItems(body.now ?? Date.now(), body.items, {
      config: requestConfig(analyzerConfig, body.config),
      failFast: body.failFast,
      includeDone: body.includeDone,
    });

    logRejected(log, req, 'work items', report.rejected);
    res.json(report);
  });

  /**
   * GET /v1/health
   */
  router.get('/v1/health', (_req: Request, res: Response) => {
    const response: HealthResponse = {
      status: 'healthy',
      version: serverConfig.version,
      uptime: Date.now() - startedAt,
      timestamp: Date.now(),
    };
    res.json(response);
  });

  return router;
}

// =============================================================================
// SERVER CREATION
// =============================================================================

export function createServer(options: ServerOptions = {}): express.Application {
  const analyzerConfig = options.analyzerConfig ?? loadAnalyzerConfig();
  const serverConfig = options.serverConfig ?? loadServerConfig();
  const log = options.logger ?? rootLogger;

  const app = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API server
  }));

  app.use(cors({
    origin: serverConfig.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
  }));

  app.use(express.json({ limit: '1mb' }));
  app.use(compression());

  app.use(requestIdMiddleware);
  app.use(loggingMiddleware(log));

  app.use(createRouter(analyzerConfig, serverConfig, log));

  app.use(notFoundHandler);
  app.use(errorHandler(log));

  return app;
}

// =============================================================================
// SERVER START
// =============================================================================

/**
 * Load `.env`, validate configuration and listen on the configured port.
 */
export function startServer(): ReturnType<express.Application['listen']> {
  loadEnv();

  const serverConfig = loadServerConfig();
  const analyzerConfig = loadAnalyzerConfig();
  rootLogger.setLevel(serverConfig.logLevel);
  rootLogger.setServiceName(serverConfig.serviceName);

  for (const warning of validateAnalyzerConfig(analyzerConfig).warnings) {
    rootLogger.warn(warning);
  }
  assertValidConfig(analyzerConfig);

  const app = createServer({ analyzerConfig, serverConfig });

  const server = app.listen(serverConfig.port, () => {
    rootLogger.info('Workday Signals API started', getLoggableConfig(analyzerConfig, serverConfig));
  });

  server.on('error', (error) => {
    rootLogger.error('Server failed to listen', { port: serverConfig.port, message: error.message });
    process.exitCode = 1;
  });

  return server;
}
