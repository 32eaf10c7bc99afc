import { Router, Request, Response } from 'express';
import { MonitorContext } from '../services/context.js';
import {
  createDevice,
  deleteDevice,
  getDeviceOrThrow,
  getKey,
  replaceKey,
  rotateKey,
  setPaused,
  setTimezone,
  transferOwner,
} from '../services/devices.js';
import { formatHistory, formatOwnerSummary, formatStatus } from '../services/messages.js';
import {
  currentState,
  dailyStats,
  exportHistory,
  exportToCsv,
  getHistory,
  ownerSummary,
} from '../services/status.js';
import { sendError } from './errors.js';

/**
 * Parse a numeric external id (channel and user ids may be negative)
 */
export function parseExternalId(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) ? raw : null;
  }
  if (typeof raw !== 'string' || !/^-?\d+$/.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Epoch milliseconds or an ISO-8601 string
 */
export function parseInstant(raw: unknown): number | null {
  if (typeof raw !== 'string' || raw.length === 0) {
    return null;
  }
  const value = /^\d+$/.test(raw) ? Number(raw) : Date.parse(raw);
  return Number.isFinite(value) ? value : null;
}

function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null ? Object.fromEntries(Object.entries(body)) : {};
}

function deviceIdFrom(req: Request, res: Response): number | null {
  const id = parseExternalId(req.params.id);
  if (id === null) {
    res.status(400).json({ success: false, error: `Invalid device id: ${req.params.id}` });
  }
  return id;
}

export function createDevicesRouter(ctx: MonitorContext): Router {
  const router = Router();

  /**
   * POST /devices
   * Body: { id: number, owner_id: number, secret_key?: string }
   */
  router.post('/', async (req: Request, res: Response) => {
    const body = readBody(req);
    const id = parseExternalId(body.id);
    const ownerId = parseExternalId(body.owner_id);

    if (id === null || ownerId === null) {
      res.status(400).json({ success: false, error: 'id and owner_id must be integers' });
      return;
    }
    const secretKey = typeof body.secret_key === 'string' ? body.secret_key : undefined;
    if (body.secret_key !== undefined && secretKey === undefined) {
      res.status(400).json({ success: false, error: 'secret_key must be a string' });
      return;
    }

    try {
      const created = await createDevice(ctx, { id, ownerId, secretKey });
      res.status(201).json({
        success: true,
        data: {
          id: created.deviceId,
          secret_key: created.secretKey,
          ping_url: `/channelPing?channel_key=${encodeURIComponent(created.secretKey)}`,
        },
      });
    } catch (err) {
      sendError(res, err, 'creating device');
    }
  });

  /**
   * GET /devices?owner=123[&format=text]
   */
  router.get('/', async (req: Request, res: Response) => {
    const ownerId = parseExternalId(req.query.owner);
    if (ownerId === null) {
      res.status(400).json({ success: false, error: 'owner parameter is required' });
      return;
    }

    try {
      const summary = await ownerSummary(ctx, ownerId, Date.now());
      if (req.query.format === 'text') {
        res.type('text/plain').send(formatOwnerSummary(summary));
        return;
      }
      res.json({ success: true, data: summary });
    } catch (err) {
      sendError(res, err, 'listing devices');
    }
  });

  /**
   * GET /devices/:id[?format=text]
   */
  router.get('/:id', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    try {
      if (req.query.format === 'text') {
        const device = await getDeviceOrThrow(ctx, id);
        res.type('text/plain').send(formatStatus(device, Date.now()));
        return;
      }
      res.json({ success: true, data: await currentState(ctx, id) });
    } catch (err) {
      sendError(res, err, 'fetching device state');
    }
  });

  /**
   * GET /devices/:id/stats[?as_of=ISO8601|epoch_ms]
   */
  router.get('/:id/stats', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    const asOf = req.query.as_of === undefined ? Date.now() : parseInstant(req.query.as_of);
    if (asOf === null) {
      res.status(400).json({ success: false, error: 'Invalid as_of' });
      return;
    }

    try {
      res.json({ success: true, data: await dailyStats(ctx, id, asOf) });
    } catch (err) {
      sendError(res, err, 'computing daily stats');
    }
  });

  /**
   * GET /devices/:id/history[?limit=10&format=text]
   */
  router.get('/:id/history', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    const limit = parseInt(String(req.query.limit ?? ''), 10) || undefined;

    try {
      const events = await getHistory(ctx, id, limit);
      if (req.query.format === 'text') {
        const device = await getDeviceOrThrow(ctx, id);
        res.type('text/plain').send(formatHistory(events, device.timezone));
        return;
      }
      res.json({ success: true, data: events });
    } catch (err) {
      sendError(res, err, 'fetching history');
    }
  });

  /**
   * GET /devices/:id/export[?format=csv]
   */
  router.get('/:id/export', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    try {
      const data = await exportHistory(ctx, id, Date.now());
      if (req.query.format === 'csv') {
        res
          .type('text/csv')
          .attachment(`device-${id}-history.csv`)
          .send(exportToCsv(data));
        return;
      }
      res.json({ success: true, data });
    } catch (err) {
      sendError(res, err, 'exporting history');
    }
  });

  /**
   * GET /devices/:id/key
   */
  router.get('/:id/key', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    try {
      res.json({ success: true, data: { secret_key: await getKey(ctx, id) } });
    } catch (err) {
      sendError(res, err, 'fetching key');
    }
  });

  /**
   * POST /devices/:id/key
   * Issues a new random key
   */
  router.post('/:id/key', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    try {
      res.json({ success: true, data: { secret_key: await rotateKey(ctx, id) } });
    } catch (err) {
      sendError(res, err, 'rotating key');
    }
  });

  /**
   * PUT /devices/:id/key
   * Body: { secret_key: string }
   */
  router.put('/:id/key', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    const { secret_key } = readBody(req);
    if (typeof secret_key !== 'string') {
      res.status(400).json({ success: false, error: 'secret_key is required' });
      return;
    }

    try {
      await replaceKey(ctx, id, secret_key);
      res.json({ success: true });
    } catch (err) {
      sendError(res, err, 'replacing key');
    }
  });

  /**
   * PUT /devices/:id/timezone
   * Body: { timezone: string }
   */
  router.put('/:id/timezone', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    const { timezone } = readBody(req);
    if (typeof timezone !== 'string') {
      res.status(400).json({ success: false, error: 'timezone is required' });
      return;
    }

    try {
      await setTimezone(ctx, id, timezone);
      res.json({ success: true });
    } catch (err) {
      sendError(res, err, 'setting timezone');
    }
  });

  /**
   * PUT /devices/:id/paused
   * Body: { paused: boolean }
   */
  router.put('/:id/paused', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    const { paused } = readBody(req);
    if (typeof paused !== 'boolean') {
      res.status(400).json({ success: false, error: 'paused must be a boolean' });
      return;
    }

    try {
      await setPaused(ctx, id, paused);
      res.json({ success: true });
    } catch (err) {
      sendError(res, err, 'setting paused');
    }
  });

  /**
   * PUT /devices/:id/owner
   * Body: { owner_id: number }
   */
  router.put('/:id/owner', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    const ownerId = parseExternalId(readBody(req).owner_id);
    if (ownerId === null) {
      res.status(400).json({ success: false, error: 'owner_id must be an integer' });
      return;
    }

    try {
      await transferOwner(ctx, id, ownerId);
      res.json({ success: true });
    } catch (err) {
      sendError(res, err, 'transferring owner');
    }
  });

  /**
   * DELETE /devices/:id
   */
  router.delete('/:id', async (req: Request, res: Response) => {
    const id = deviceIdFrom(req, res);
    if (id === null) return;

    try {
      await deleteDevice(ctx, id);
      res.json({ success: true });
    } catch (err) {
      sendError(res, err, 'deleting device');
    }
  });

  return router;
}
