// API layer: Health routes

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { serverLogger, describeError } from '@/utils/logger.js';

export interface HealthProbe {
  ping(): Promise<boolean>;
}

export function createHealthRouter(db: HealthProbe): Router {
  const router = Router();

  /**
   * GET /api/healthchecker
   * Round-trip to the storage engine
   */
  router.get(
    '/healthchecker',
    asyncHandler(async (_req: Request, res: Response) => {
      let message: string;
      try {
        if (await db.ping()) {
          res.json({ success: true, message: 'Contact book API is up' });
          return;
        }
        message = 'Database is not configured correctly';
      } catch (error) {
        serverLogger.error('Health check failed', { error: describeError(error) });
        message = 'Error connecting to the database';
      }

      res.status(500).json({ success: false, error: { code: 'DATABASE_UNAVAILABLE', message } });
    })
  );

  return router;
}
