import { startServer } from './api/server';
import { logger } from './utils/logger';

try {
  startServer();
} catch (error) {
  logger.error('Failed to start', { message: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
}
