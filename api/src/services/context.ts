import { DeviceId } from '../types/index.js';
import { MonitorStorage } from '../store/types.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { NotificationDispatcher } from './notifications.js';

/**
 * Everything the monitor services share: storage, the outbound
 * notification channel and the per-device lock table.
 */
export interface MonitorContext {
  storage: MonitorStorage;
  notifier: NotificationDispatcher;
  locks: KeyedMutex<DeviceId>;
  gracePeriodMs: number;
  defaultTimezone: string;
}

export function createMonitorContext(options: {
  storage: MonitorStorage;
  notifier: NotificationDispatcher;
  gracePeriodMs: number;
  defaultTimezone: string;
}): MonitorContext {
  return {
    ...options,
    locks: new KeyedMutex<DeviceId>(),
  };
}
