/**
 * Health Check Endpoints
 *
 * - GET /health: Liveness probe (is process alive?)
 * - GET /ready: Readiness probe (is service ready to accept traffic?)
 *
 * Both are mounted ahead of authentication.
 */

import type { Request, RequestHandler, Response } from 'express';
import { logger } from '../logger';

/**
 * Database readiness check timeout (2 seconds)
 */
const DB_CHECK_TIMEOUT_MS = parseInt(process.env.HEALTH_DB_TIMEOUT_MS || '2000', 10);
const DB_CHECK_CACHE_MS = 5000; // Cache for 5 seconds

export type ReadinessProbe = () => Promise<boolean>;

/**
 * GET /health - Liveness probe
 *
 * Checks process uptime only (no external dependencies)
 */
export function healthCheck(req: Request, res: Response): void {
  res.status(200).json({
    status: 'ok',
    uptime: Math.floor(process.uptime()),
    timestamp: new Date().toISOString(),
  });
}

/**
 * GET /ready - Readiness probe. 200 if the database answers, 503 if not.
 * The probe result is cached briefly to avoid hammering the database.
 */
export function createReadinessCheck(probe: ReadinessProbe): RequestHandler {
  let dbConnected = false;
  let lastDbCheck = 0;

  const checkDatabaseConnectivity = async (): Promise<boolean> => {
    const now = Date.now();
    if (now - lastDbCheck < DB_CHECK_CACHE_MS) {
      return dbConnected;
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Database check timeout')), DB_CHECK_TIMEOUT_MS);
      });
      dbConnected = await Promise.race([probe(), timeoutPromise]);
    } catch (error) {
      dbConnected = false;
      logger.error('Database connectivity check failed', {
        error: error instanceof Error ? error.message : String(error),
        timeout: DB_CHECK_TIMEOUT_MS,
      });
    } finally {
      if (timer) clearTimeout(timer);
    }

    lastDbCheck = now;
    return dbConnected;
  };

  return async (req: Request, res: Response) => {
    const isReady = await checkDatabaseConnectivity();

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not_ready',
      database: isReady ? 'connected' : 'disconnected',
      timestamp: new Date().toISOString(),
    });
  };
}
