import { Router, Request, Response, NextFunction } from 'express';
import { MonitorContext } from '../services/context.js';
import { createDevicesRouter } from './devices.js';

/**
 * Require `?key=` or an `x-api-key` header matching the configured API key.
 * With no key configured the API is open.
 */
export function requireApiKey(apiKey: string | null) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const provided = req.header('x-api-key') ?? req.query.key;
    if (provided !== apiKey) {
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }
    next();
  };
}

export function createRoutes(ctx: MonitorContext, apiKey: string | null): Router {
  const router = Router();

  router.use(requireApiKey(apiKey));
  router.use('/devices', createDevicesRouter(ctx));

  return router;
}
