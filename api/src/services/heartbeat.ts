import { HeartbeatResult } from '../types/index.js';
import { MonitorContext } from './context.js';
import { announceTransition, decideHeartbeat } from './transitions.js';

const REJECTED: HeartbeatResult = { status: 'rejected', reason: 'invalid_key' };

/**
 * Accept a heartbeat authenticated by `secretKey`.
 *
 * Unknown keys are rejected without side effects. Otherwise last_seen is
 * refreshed and a device that was not ON switches to ON, logs the transition
 * and announces the recovery. Repeated heartbeats while ON change nothing
 * but last_seen.
 */
export async function processHeartbeat(
  ctx: MonitorContext,
  secretKey: string,
  arrivalTime: number = Date.now()
): Promise<HeartbeatResult> {
  if (!secretKey) {
    return REJECTED;
  }

  const device = await ctx.storage.devices.findByKey(secretKey);
  if (!device) {
    return REJECTED;
  }

  // The key may have been rotated between the lookup and taking the lock
  const check = { keyMatches: true };
  const result = await ctx.locks.run(device.id, () =>
    ctx.storage.devices.commit(device.id, (current) => {
      if (current.secretKey !== secretKey) {
        check.keyMatches = false;
        return null;
      }
      return decideHeartbeat(current, arrivalTime);
    })
  );

  if (!result || !check.keyMatches) {
    return REJECTED;
  }

  const { before, after, event } = result;
  if (!event) {
    return { status: 'accepted', deviceId: device.id, transitioned: false };
  }

  console.log(`Device ${device.id} power restored (was ${before.state})`);

  const elapsed = before.lastChange === null ? null : event.timestamp - before.lastChange;
  await announceTransition(ctx, after, 'recovered', event.timestamp, elapsed, arrivalTime);

  return { status: 'accepted', deviceId: device.id, transitioned: true };
}
