import { DeviceId } from '../types/index.js';
import { MonitorContext } from './context.js';
import { announceTransition, decideTimeout } from './transitions.js';

export interface SweepReport {
  checked: number;
  transitioned: DeviceId[];
  failed: DeviceId[];
}

/**
 * Re-check one device under its lock and switch it OFF if it is still
 * silent past the grace period. Returns whether it transitioned.
 */
export async function expireDevice(ctx: MonitorContext, deviceId: DeviceId, now: number): Promise<boolean> {
  const cutoff = now - ctx.gracePeriodMs;
  const result = await ctx.locks.run(deviceId, () =>
    ctx.storage.devices.commit(deviceId, (current) => decideTimeout(current, cutoff))
  );

  if (!result || !result.event) {
    return false;
  }

  const { before, after, event } = result;
  console.log(`Device ${deviceId} lost power (silent since ${new Date(event.timestamp).toISOString()})`);

  const elapsed =
    before.lastChange === null || before.lastSeen === null
      ? null
      : Math.max(0, before.lastSeen - before.lastChange);
  await announceTransition(ctx, after, 'lost', event.timestamp, elapsed, now);

  return true;
}

/**
 * Periodic sweep that switches silent devices OFF.
 * Devices are handled concurrently and independently; one failing device
 * is logged and the rest of the sweep carries on.
 */
export class TimeoutScanner {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly ctx: MonitorContext,
    private readonly intervalMs: number,
    private readonly clock: () => number = Date.now
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    console.log(
      `Timeout scanner started (every ${this.intervalMs / 1000}s, grace ${this.ctx.gracePeriodMs / 60000}min)`
    );
  }

  /**
   * Stop scheduling sweeps and wait for the one in progress, if any
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  async sweep(now: number = this.clock()): Promise<SweepReport> {
    const candidates = await this.ctx.storage.devices.findExpired(now - this.ctx.gracePeriodMs);
    const report: SweepReport = { checked: candidates.length, transitioned: [], failed: [] };

    const outcomes = await Promise.allSettled(
      candidates.map((device) => expireDevice(this.ctx, device.id, now))
    );

    outcomes.forEach((outcome, i) => {
      const deviceId = candidates[i].id;
      if (outcome.status === 'rejected') {
        console.error(`Error checking device ${deviceId}:`, outcome.reason);
        report.failed.push(deviceId);
      } else if (outcome.value) {
        report.transitioned.push(deviceId);
      }
    });

    return report;
  }

  private tick(): void {
    if (this.inFlight) {
      console.warn('Previous timeout sweep still running, skipping this tick');
      return;
    }

    this.inFlight = this.sweep(this.clock())
      .then(() => undefined)
      .catch((err: unknown) => {
        console.error('Timeout sweep failed:', err);
      })
      .finally(() => {
        this.inFlight = null;
      });
  }
}
