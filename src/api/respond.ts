import type { Response } from 'express';
import { z } from 'zod';
import type { Logger } from '../crawler/komoot/utils/logger.js';
import { JobFatalError, NetworkError } from '../utils/errors.js';

/**
 * Maps an error to { error } with a matching status code
 */
export function sendError(res: Response, error: unknown, logger: Logger, context: string): Response {
  if (error instanceof z.ZodError) {
    return res.status(400).json({ error: error.errors[0]?.message ?? 'Invalid request' });
  }
  if (error instanceof JobFatalError) {
    return res.status(error.statusCode).json({ error: error.message });
  }
  if (error instanceof NetworkError && error.status === 404) {
    return res.status(404).json({ error: 'Not found on the tour service' });
  }

  logger.error(`${context}:`, error);
  return res.status(500).json({
    error: error instanceof Error ? error.message : 'Internal server error',
  });
}
