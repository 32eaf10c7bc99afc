import {
  CurrentState,
  DailyStats,
  DeviceId,
  HistoryEvent,
  HistoryExport,
  OwnerDeviceStatus,
  OwnerId,
  OwnerSummary,
} from '../types/index.js';
import { MonitorContext } from './context.js';
import { getDeviceOrThrow } from './devices.js';
import { statsForDevice } from './stats.js';

export const DEFAULT_HISTORY_LIMIT = 10;
export const MAX_HISTORY_LIMIT = 100;

export async function currentState(ctx: MonitorContext, deviceId: DeviceId): Promise<CurrentState> {
  const device = await getDeviceOrThrow(ctx, deviceId);
  return {
    state: device.state,
    lastSeen: device.lastSeen,
    lastChange: device.lastChange,
  };
}

/**
 * Same-day statistics, as of `asOf`, in the device's timezone
 */
export async function dailyStats(
  ctx: MonitorContext,
  deviceId: DeviceId,
  asOf: number = Date.now()
): Promise<DailyStats | null> {
  const device = await getDeviceOrThrow(ctx, deviceId);
  return statsForDevice(ctx.storage, device, asOf);
}

/**
 * Most recent transitions, newest first
 */
export async function getHistory(
  ctx: MonitorContext,
  deviceId: DeviceId,
  limit: number = DEFAULT_HISTORY_LIMIT
): Promise<HistoryEvent[]> {
  await getDeviceOrThrow(ctx, deviceId);
  const clamped = Math.min(Math.max(Math.floor(limit) || DEFAULT_HISTORY_LIMIT, 1), MAX_HISTORY_LIMIT);
  return ctx.storage.history.recent(deviceId, clamped);
}

/**
 * Full transition log, oldest first, plus the period still open at `now`
 */
export async function exportHistory(
  ctx: MonitorContext,
  deviceId: DeviceId,
  now: number = Date.now()
): Promise<HistoryExport> {
  const device = await getDeviceOrThrow(ctx, deviceId);
  const events = await ctx.storage.history.all(deviceId);

  const current =
    device.lastChange === null
      ? null
      : {
          state: device.state,
          since: device.lastChange,
          until: now,
          durationMs: Math.max(0, now - device.lastChange),
        };

  return { deviceId, events, current };
}

/**
 * CSV with one row per period. The last row is the open period and has no end.
 */
export function exportToCsv(data: HistoryExport): string {
  const lines = ['state,start,end,duration_seconds'];

  data.events.forEach((event, i) => {
    const next = data.events[i + 1];
    if (next) {
      const seconds = Math.floor((next.timestamp - event.timestamp) / 1000);
      lines.push(
        `${event.state},${new Date(event.timestamp).toISOString()},${new Date(next.timestamp).toISOString()},${seconds}`
      );
    }
  });

  if (data.current) {
    const seconds = Math.floor(data.current.durationMs / 1000);
    lines.push(`${data.current.state},${new Date(data.current.since).toISOString()},,${seconds}`);
  }

  return lines.join('\n') + '\n';
}

/**
 * Every device of an owner, grouped by what its heartbeats say
 */
export async function ownerSummary(
  ctx: MonitorContext,
  ownerId: OwnerId,
  now: number = Date.now()
): Promise<OwnerSummary> {
  const devices = await ctx.storage.devices.findByOwner(ownerId);
  const summary: OwnerSummary = { total: devices.length, online: [], offline: [], noData: [] };

  for (const device of devices) {
    const status: OwnerDeviceStatus = {
      id: device.id,
      timezone: device.timezone,
      paused: device.paused,
      sinceLastSeenMs: device.lastSeen === null ? null : Math.max(0, now - device.lastSeen),
    };

    if (device.lastSeen === null) {
      summary.noData.push(status);
    } else if (device.state === 'ON') {
      summary.online.push(status);
    } else {
      summary.offline.push(status);
    }
  }

  return summary;
}
