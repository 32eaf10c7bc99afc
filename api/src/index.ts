import 'dotenv/config';
import { createServer } from 'http';
import { WebSocketServer } from 'ws';
import { createApp } from './app.js';
import { getMonitorConfig } from './config/monitor.js';
import { getMqttConfig } from './config/mqtt.js';
import { closePool } from './db/index.js';
import { ensureSchema } from './db/schema.js';
import { closeMqttBridge, MqttNotifier, setupMqttBridge } from './mqtt/bridge.js';
import { createMonitorContext } from './services/context.js';
import { CompositeNotifier } from './services/notifications.js';
import { TimeoutScanner } from './services/scanner.js';
import { TelegramNotifier } from './services/telegram.js';
import { MySqlStorage } from './store/mysql.js';
import { setupWebSocket, WebSocketNotifier } from './websocket/index.js';

const config = getMonitorConfig();
const mqttConfig = getMqttConfig();

// Notification channels
const notifier = new CompositeNotifier([new WebSocketNotifier()]);
if (config.telegramBotToken) {
  notifier.add(new TelegramNotifier(config.telegramBotToken));
} else {
  console.warn('TELEGRAM_BOT_TOKEN not set, Telegram notifications disabled');
}
if (mqttConfig.enabled) {
  notifier.add(new MqttNotifier(mqttConfig.statePrefix));
}

const ctx = createMonitorContext({
  storage: new MySqlStorage(),
  notifier,
  gracePeriodMs: config.gracePeriodMs,
  defaultTimezone: config.defaultTimezone,
});

const app = createApp(ctx, config.apiKey);
const scanner = new TimeoutScanner(ctx, config.scanIntervalMs);

// Create HTTP server
const server = createServer(app);

// Create WebSocket server
const wss = new WebSocketServer({ server, path: '/ws' });
setupWebSocket(wss, ctx);

async function start(): Promise<void> {
  await ensureSchema();

  // Start MQTT bridge
  if (mqttConfig.enabled) {
    setupMqttBridge(ctx, mqttConfig);
  }

  scanner.start();

  server.listen(config.port, () => {
    console.log(`Heartbeat server running on http://localhost:${config.port}`);
    console.log(`Ping endpoint: http://localhost:${config.port}/channelPing?channel_key=<key>`);
    console.log(`WebSocket available at ws://localhost:${config.port}/ws`);
  });
}

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down...`);
  await scanner.stop();
  await closeMqttBridge();
  wss.close();
  server.close(() => {
    console.log('Server closed');
    closePool()
      .catch((err: unknown) => console.error('Error closing database pool:', err))
      .finally(() => process.exit(0));
  });
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((err: unknown) => {
    console.error('Shutdown failed:', err);
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((err: unknown) => {
    console.error('Shutdown failed:', err);
    process.exit(1);
  });
});

start().catch((err: unknown) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
