import { Router, Request, Response } from 'express';
import { MonitorContext } from '../services/context.js';
import { processHeartbeat } from '../services/heartbeat.js';

/**
 * GET /channelPing?channel_key=...
 * 400 without a key, 403 for an unknown key, 200 OK otherwise
 */
export function createPingRouter(ctx: MonitorContext): Router {
  const router = Router();

  router.get('/channelPing', async (req: Request, res: Response) => {
    const key = req.query.channel_key;
    if (typeof key !== 'string' || key.length === 0) {
      res.status(400).type('text/plain').send('Missing channel_key parameter');
      return;
    }

    try {
      const result = await processHeartbeat(ctx, key, Date.now());
      if (result.status === 'rejected') {
        res.status(403).type('text/plain').send('Invalid key');
        return;
      }
      res.type('text/plain').send('OK');
    } catch (err) {
      console.error('Error processing heartbeat:', err);
      res.status(503).type('text/plain').send('Temporarily unavailable');
    }
  });

  return router;
}
