import { DailyStats, Device, HistoryEvent, PowerState } from '../types/index.js';
import { MonitorStorage } from '../store/types.js';
import { localMidnight } from '../utils/time.js';

export interface DailyStatsInput {
  device: Pick<Device, 'state' | 'lastChange'>;
  /** Local midnight of the day containing `asOf` */
  windowStart: number;
  asOf: number;
  /** Latest event strictly before `windowStart` */
  priorEvent: HistoryEvent | null;
  /** Events in [windowStart, asOf], oldest first */
  events: HistoryEvent[];
  /** Whether the log holds any event after `asOf` */
  hasLaterEvents?: boolean;
}

/**
 * Uptime, downtime and outage count for [windowStart, asOf).
 *
 * The window always opens at local midnight. The state in force at midnight
 * comes from the last event before it. Without one, the device's current
 * state is used only when the log has no event after midnight at all;
 * otherwise the device was not yet monitored and counts as unpowered (but
 * not in an outage) until its first event.
 * An outage carried over from the previous day counts once.
 *
 * Returns null when the device has never changed state.
 */
export function computeDailyStats(input: DailyStatsInput): DailyStats | null {
  const { device, windowStart, asOf, priorEvent, events, hasLaterEvents = false } = input;

  if (!priorEvent && events.length === 0 && !hasLaterEvents && device.lastChange === null) {
    return null;
  }

  let state: PowerState;
  if (priorEvent) {
    state = priorEvent.state;
  } else if (events.length === 0 && !hasLaterEvents) {
    state = device.state;
  } else {
    state = 'UNKNOWN';
  }

  let uptimeMs = 0;
  let downtimeMs = 0;
  let outages = state === 'OFF' ? 1 : 0;
  let cursor = windowStart;

  for (const event of events) {
    const span = event.timestamp - cursor;
    if (state === 'ON') {
      uptimeMs += span;
    } else {
      downtimeMs += span;
    }

    if (state === 'ON' && event.state === 'OFF') {
      outages++;
    }

    state = event.state;
    cursor = event.timestamp;
  }

  const trailing = asOf - cursor;
  if (state === 'ON') {
    uptimeMs += trailing;
  } else {
    downtimeMs += trailing;
  }

  return { uptimeMs, downtimeMs, outages, windowStart, asOf };
}

/**
 * Load the history a device's daily stats need and compute them
 */
export async function statsForDevice(
  storage: MonitorStorage,
  device: Device,
  asOf: number
): Promise<DailyStats | null> {
  const windowStart = localMidnight(asOf, device.timezone);
  const [priorEvent, events] = await Promise.all([
    storage.history.lastBefore(device.id, windowStart),
    storage.history.between(device.id, windowStart, asOf),
  ]);

  let hasLaterEvents = false;
  if (!priorEvent && events.length === 0) {
    hasLaterEvents = (await storage.history.firstAfter(device.id, asOf)) !== null;
  }

  return computeDailyStats({ device, windowStart, asOf, priorEvent, events, hasLaterEvents });
}
