import express, { Express } from 'express';
import cors from 'cors';
import { MonitorContext } from './services/context.js';
import { createPingRouter } from './routes/ping.js';
import { createRoutes } from './routes/index.js';
import { getClientCount } from './websocket/index.js';

export function createApp(ctx: MonitorContext, apiKey: string | null): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Heartbeats
  app.use(createPingRouter(ctx));

  // REST routes
  app.use('/api', createRoutes(ctx, apiKey));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), clients: getClientCount() });
  });

  return app;
}
