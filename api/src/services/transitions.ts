import { DailyStats, Device, TransitionDirection, TransitionNotice } from '../types/index.js';
import { DeviceMutation } from '../store/types.js';
import { MonitorContext } from './context.js';
import { publishTransition } from './notifications.js';
import { statsForDevice } from './stats.js';

/**
 * Transition timestamps are strictly increasing per device. A candidate at or
 * before the last change (one heartbeat followed by silence) moves 1ms past it.
 */
export function nextTransitionTime(device: Pick<Device, 'lastChange'>, candidate: number): number {
  if (device.lastChange !== null && candidate <= device.lastChange) {
    return device.lastChange + 1;
  }
  return candidate;
}

/**
 * Heartbeat accepted: refresh last_seen, and switch to ON unless already ON
 */
export function decideHeartbeat(current: Device, arrivalTime: number): DeviceMutation {
  const lastSeen = current.lastSeen === null ? arrivalTime : Math.max(current.lastSeen, arrivalTime);

  if (current.state === 'ON') {
    return { lastSeen };
  }

  return {
    lastSeen,
    transition: { state: 'ON', at: nextTransitionTime(current, arrivalTime) },
  };
}

/**
 * Silence check: an unpaused ON device last seen before `cutoff` goes OFF,
 * stamped at the moment it was last seen.
 */
export function decideTimeout(current: Device, cutoff: number): DeviceMutation | null {
  if (current.state !== 'ON' || current.paused || current.lastSeen === null) {
    return null;
  }
  if (current.lastSeen >= cutoff) {
    return null;
  }

  return {
    transition: { state: 'OFF', at: nextTransitionTime(current, current.lastSeen) },
  };
}

/**
 * Build the notice for a committed transition and publish it.
 * A stats lookup failure only drops the stats from the notice.
 */
export async function announceTransition(
  ctx: MonitorContext,
  device: Device,
  direction: TransitionDirection,
  at: number,
  elapsedSincePriorChangeMs: number | null,
  asOf: number
): Promise<TransitionNotice> {
  let stats: DailyStats | null = null;
  try {
    stats = await statsForDevice(ctx.storage, device, asOf);
  } catch (err) {
    console.warn(`Could not compute daily stats for device ${device.id}:`, err);
  }

  const notice: TransitionNotice = {
    deviceId: device.id,
    direction,
    at,
    timezone: device.timezone,
    elapsedSincePriorChangeMs,
    dailyStats: stats,
  };

  publishTransition(ctx.notifier, notice);
  return notice;
}
