/**
 * Graceful Shutdown Handler
 *
 * Handles SIGTERM/SIGINT signals to cleanly shut down the application:
 * 1. Stop accepting new HTTP requests
 * 2. Wait for in-flight requests to complete (with timeout)
 * 3. Drain queued customer notifications
 * 4. Close database connections
 * 5. Exit cleanly
 */

import type { Server } from 'http';
import type { NextFunction, Request, Response } from 'express';
import { parseEnvBoolean } from '../config';
import { logger } from '../logger';

export interface ShutdownHooks {
  drainNotifications: () => Promise<void>;
  closeDatabase: () => Promise<void>;
}

/**
 * Graceful shutdown timeout (30 seconds by default)
 */
const SHUTDOWN_TIMEOUT_MS = parseInt(process.env.GRACEFUL_SHUTDOWN_TIMEOUT_MS || '30000', 10);

/**
 * Check if graceful shutdown is enabled
 */
function isGracefulShutdownEnabled(): boolean {
  return parseEnvBoolean(process.env.FEATURE_GRACEFUL_SHUTDOWN_ENABLED, true);
}

/**
 * Track in-flight requests
 */
let inFlightRequests = 0;

/**
 * Increment in-flight request counter
 */
export function trackRequest(): () => void {
  inFlightRequests++;
  let released = false;
  return () => {
    if (released) return;
    released = true;
    inFlightRequests = Math.max(0, inFlightRequests - 1);
  };
}

/**
 * Express middleware counting a request as in flight until its response ends
 */
export function inFlightTracker(req: Request, res: Response, next: NextFunction): void {
  const release = trackRequest();
  res.on('finish', release);
  res.on('close', release);
  next();
}

/**
 * Setup graceful shutdown handlers
 */
export function setupGracefulShutdown(server: Server, hooks: ShutdownHooks): void {
  if (!isGracefulShutdownEnabled()) {
    logger.info('Graceful shutdown disabled via configuration');
    return;
  }
  
  let isShuttingDown = false;
  
  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress, ignoring signal', { signal });
      return;
    }
    
    isShuttingDown = true;
    
    // Use structured logger without requestId (shutdown is not a request)
    logger.info('Graceful shutdown initiated', {
      signal,
      inFlightRequests,
    });
    
    // Step 1: Stop accepting new HTTP requests
    server.close(() => {
      logger.info('HTTP server closed, no longer accepting connections');
    });
    
    // Step 2: Wait for in-flight operations to complete (with timeout)
    const shutdownStart = Date.now();
    const checkInterval = 100; // Check every 100ms
    
    const waitForInFlight = new Promise<void>((resolve) => {
      const check = () => {
        const elapsed = Date.now() - shutdownStart;
        
        if (inFlightRequests === 0) {
          logger.info('All in-flight requests completed', { elapsed });
          resolve();
        } else if (elapsed >= SHUTDOWN_TIMEOUT_MS) {
          logger.warn('Shutdown timeout reached, forcing exit', {
            elapsed,
            abandonedRequests: inFlightRequests,
          });
          resolve();
        } else {
          setTimeout(check, checkInterval);
        }
      };
      
      check();
    });
    
    await waitForInFlight;

    // Step 3: Let queued notifications settle
    try {
      logger.info('Draining notification queue');
      await hooks.drainNotifications();
      logger.info('Notification queue drained');
    } catch (error) {
      logger.error('Error draining notification queue', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    // Step 4: Close database connections
    try {
      logger.info('Closing database connections');
      await hooks.closeDatabase();
      logger.info('Database connections closed');
    } catch (error) {
      logger.error('Error closing database connections', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    
    // Step 5: Exit cleanly
    const totalElapsed = Date.now() - shutdownStart;
    logger.info('Graceful shutdown complete', { totalElapsed });
    
    process.exit(0);
  };
  
  // Register signal handlers
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
  
  logger.info('Graceful shutdown handlers registered', { timeout: SHUTDOWN_TIMEOUT_MS });
}
