import { WebSocketServer, WebSocket } from 'ws';
import { Device, DeviceStateMessage, FeedMessage, TransitionNotice } from '../types/index.js';
import { MonitorContext } from '../services/context.js';
import { NotificationDispatcher } from '../services/notifications.js';

// Track all connected clients
const clients = new Set<WebSocket>();

export function toDeviceStateMessage(device: Device): DeviceStateMessage {
  return {
    type: 'device_state',
    device_id: device.id,
    state: device.state,
    last_seen: device.lastSeen,
    last_change: device.lastChange,
    paused: device.paused,
  };
}

/**
 * Set up WebSocket server handlers
 */
export function setupWebSocket(wss: WebSocketServer, ctx: MonitorContext): void {
  wss.on('connection', async (ws) => {
    console.log('WebSocket client connected');
    clients.add(ws);

    ws.on('close', () => {
      console.log('WebSocket client disconnected');
      clients.delete(ws);
    });

    ws.on('error', (err) => {
      console.error('WebSocket error:', err);
      clients.delete(ws);
    });

    // Send current device states on connect
    try {
      const devices = await ctx.storage.devices.findAll();
      for (const device of devices) {
        if (ws.readyState === WebSocket.OPEN) {
          ws.send(JSON.stringify(toDeviceStateMessage(device)));
        }
      }
    } catch (err) {
      console.error('Error sending initial device states:', err);
    }
  });
}

/**
 * Broadcast a message to all connected clients
 */
export function broadcast(message: FeedMessage): void {
  const payload = JSON.stringify(message);

  for (const client of clients) {
    if (client.readyState === WebSocket.OPEN) {
      client.send(payload);
    }
  }
}

/**
 * Get count of connected clients
 */
export function getClientCount(): number {
  return clients.size;
}

/**
 * Pushes transitions to dashboards
 */
export class WebSocketNotifier implements NotificationDispatcher {
  async notify(notice: TransitionNotice): Promise<void> {
    broadcast({
      type: 'power_transition',
      device_id: notice.deviceId,
      direction: notice.direction,
      at: notice.at,
      elapsed_ms: notice.elapsedSincePriorChangeMs,
      daily_stats: notice.dailyStats,
    });
  }
}
