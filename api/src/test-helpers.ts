import { Device, DeviceId, TransitionNotice } from './types/index.js';
import { MemoryStorage } from './store/memory.js';
import { createMonitorContext, MonitorContext } from './services/context.js';
import { NotificationDispatcher } from './services/notifications.js';

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

/**
 * Records notices as they are handed over, optionally failing delivery
 */
export class RecordingNotifier implements NotificationDispatcher {
  readonly notices: TransitionNotice[] = [];
  failWith: Error | null = null;

  async notify(notice: TransitionNotice): Promise<void> {
    this.notices.push(notice);
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

export interface TestContext {
  ctx: MonitorContext;
  storage: MemoryStorage;
  notifier: RecordingNotifier;
}

export function createTestContext(options: { gracePeriodMs?: number; storage?: MemoryStorage } = {}): TestContext {
  const storage = options.storage ?? new MemoryStorage();
  const notifier = new RecordingNotifier();
  const ctx = createMonitorContext({
    storage,
    notifier,
    gracePeriodMs: options.gracePeriodMs ?? 5 * MINUTE,
    defaultTimezone: 'UTC',
  });
  return { ctx, storage, notifier };
}

/**
 * Insert a device with the given key and timezone
 */
export async function addDevice(
  storage: MemoryStorage,
  id: DeviceId,
  secretKey: string,
  timezone: string = 'UTC'
): Promise<Device> {
  return storage.insert({ id, ownerId: 1, secretKey, timezone, createdAt: 0 });
}
